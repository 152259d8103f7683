/**
 * Maps core failures to a stable kind and a fixed end-user message.
 * Transport detail (status codes, retry counts, upstream messages) never reaches
 * the user. Invalid input additionally names the offending field.
 */

import { PanelError, ValidationError } from '../types/PanelErrors';

export type UserFacingErrorKind =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'CONFLICT'
  | 'TEMPORARILY_UNAVAILABLE'
  | 'INTERNAL';

export interface UserFacingError {
  kind: UserFacingErrorKind;
  message: string;
  field?: string;
}

export const USER_FACING_MESSAGES: Readonly<Record<UserFacingErrorKind, string>> = Object.freeze({
  INVALID_INPUT: 'The request is invalid.',
  NOT_FOUND: 'No subscription found.',
  ALREADY_EXISTS: 'You already have a subscription.',
  CONFLICT: 'This subscription was changed by another request. Please try again.',
  TEMPORARILY_UNAVAILABLE: 'The service is temporarily unavailable. Please try again later.',
  INTERNAL: 'Something went wrong. Please contact support.',
});

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof ValidationError) {
    return { ...fixed('INVALID_INPUT'), field: error.field };
  }
  if (!(error instanceof PanelError)) {
    return fixed('INTERNAL');
  }

  switch (error.error_class) {
    case 'NOT_FOUND':
      return fixed('NOT_FOUND');
    case 'ALREADY_EXISTS':
      return fixed('ALREADY_EXISTS');
    case 'CONFLICT':
      return fixed('CONFLICT');
    case 'UPSTREAM_UNAVAILABLE':
    case 'CIRCUIT_OPEN':
    case 'TRANSIENT':
    case 'TIMEOUT':
    case 'AUTH':
    case 'INVALID_RESPONSE':
      return fixed('TEMPORARILY_UNAVAILABLE');
    default:
      return fixed('INTERNAL');
  }
}

function fixed(kind: UserFacingErrorKind): UserFacingError {
  return { kind, message: USER_FACING_MESSAGES[kind] };
}
