/**
 * Input Validators
 *
 * Pure functions that validate and normalize caller input before it reaches
 * SubscriptionService. Malformed input yields a structured failure, never an
 * exception; exceptions are reserved for contract violations by the caller
 * (e.g. a missing plan table).
 */

import { z } from 'zod';
import type { SubscriptionPlan } from '../../types/SubscriptionTypes';
import { ValidationError } from '../../types/PanelErrors';

export interface ValidationFailure {
  field: string;
  message: string;
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationFailure };

export type CallbackAction =
  | { action: 'trial' }
  | { action: 'status' }
  | { action: 'expiry' }
  | { action: 'renew'; planId: string };

/** Bot platforms cap callback data at 64 bytes */
export const MAX_CALLBACK_PAYLOAD_BYTES = 64;
export const MAX_RENEW_DAYS = 365;

const UserIdSchema = z
  .number({ invalid_type_error: 'must be a number or numeric string', required_error: 'is required' })
  .int('must be an integer')
  .positive('must be positive')
  .max(Number.MAX_SAFE_INTEGER, 'is too large');

const PlanIdSchema = z
  .string({ invalid_type_error: 'must be a string', required_error: 'is required' })
  .trim()
  .min(1, 'is required')
  .max(16, 'is too long')
  .regex(/^[a-z0-9_-]+$/i, 'contains invalid characters');

const RenewDaysSchema = z
  .number({ invalid_type_error: 'must be a number', required_error: 'is required' })
  .int('must be an integer')
  .min(1, 'must be at least 1')
  .max(MAX_RENEW_DAYS, `must be at most ${MAX_RENEW_DAYS}`);

const CallbackSchema = z
  .string({ invalid_type_error: 'must be a string', required_error: 'is required' })
  .min(1, 'is required')
  .refine((value) => Buffer.byteLength(value, 'utf8') <= MAX_CALLBACK_PAYLOAD_BYTES, {
    message: `exceeds ${MAX_CALLBACK_PAYLOAD_BYTES} bytes`,
  });

function fail<T>(field: string, message: string): ValidationResult<T> {
  return { ok: false, error: { field, message } };
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'is invalid';
}

/**
 * Accepts a positive integer or its decimal string form; normalizes to the
 * canonical decimal string used as the record key.
 */
export function validateUserId(input: unknown): ValidationResult<string> {
  let candidate = input;
  if (typeof input === 'string') {
    const trimmed = input.trim();
    if (!/^\d{1,16}$/.test(trimmed)) {
      return fail('userId', 'userId must be a positive decimal integer');
    }
    candidate = Number(trimmed);
  }
  const parsed = UserIdSchema.safeParse(candidate);
  if (!parsed.success) {
    return fail('userId', `userId ${firstIssue(parsed.error)}`);
  }
  return { ok: true, value: String(parsed.data) };
}

export function validatePlanSelection(
  input: unknown,
  plans: Readonly<Record<string, SubscriptionPlan>> | null | undefined
): ValidationResult<SubscriptionPlan> {
  if (!plans || Object.keys(plans).length === 0) {
    throw new Error('validatePlanSelection requires a non-empty plan table');
  }

  const candidate = typeof input === 'number' && Number.isInteger(input) ? String(input) : input;
  const parsed = PlanIdSchema.safeParse(candidate);
  if (!parsed.success) {
    return fail('planId', `planId ${firstIssue(parsed.error)}`);
  }

  const plan = plans[parsed.data];
  if (!plan) {
    return fail('planId', `Unknown plan: ${parsed.data}. Available: ${Object.keys(plans).join(', ')}`);
  }
  return { ok: true, value: plan };
}

/**
 * Parses bot callback data: `trial`, `status`, `expiry` or `renew:<planId>`.
 */
export function validateCallbackPayload(input: unknown): ValidationResult<CallbackAction> {
  const parsed = CallbackSchema.safeParse(input);
  if (!parsed.success) {
    return fail('callbackData', `callbackData ${firstIssue(parsed.error)}`);
  }

  const [action, argument, ...rest] = parsed.data.trim().split(':');
  if (rest.length > 0) {
    return fail('callbackData', 'callbackData has too many segments');
  }

  switch (action) {
    case 'trial':
      return withoutArgument(action, argument, { action: 'trial' });
    case 'status':
      return withoutArgument(action, argument, { action: 'status' });
    case 'expiry':
      return withoutArgument(action, argument, { action: 'expiry' });
    case 'renew': {
      const planId = PlanIdSchema.safeParse(argument ?? '');
      if (!planId.success) {
        return fail('planId', `planId ${firstIssue(planId.error)}`);
      }
      return { ok: true, value: { action: 'renew', planId: planId.data } };
    }
    default:
      return fail('callbackData', `Unknown action: ${action}`);
  }
}

function withoutArgument(
  action: string,
  argument: string | undefined,
  value: CallbackAction
): ValidationResult<CallbackAction> {
  if (argument !== undefined) {
    return fail('callbackData', `Action ${action} takes no argument`);
  }
  return { ok: true, value };
}

export function validateRenewDays(input: unknown): ValidationResult<number> {
  const parsed = RenewDaysSchema.safeParse(input);
  if (!parsed.success) {
    return fail('days', `days ${firstIssue(parsed.error)}`);
  }
  return { ok: true, value: parsed.data };
}

/**
 * Convert a failed result into a ValidationError for service-side callers.
 */
export function unwrapOrThrow<T>(result: ValidationResult<T>): T {
  if (!result.ok) {
    throw new ValidationError(result.error.field, result.error.message);
  }
  return result.value;
}
