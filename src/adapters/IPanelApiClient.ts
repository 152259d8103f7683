/**
 * Panel API Client Interface
 *
 * Domain operations on the upstream panel's user resource. Implementations
 * translate transport outcomes into domain errors and hold no cache or policy.
 */

import type {
  CreatePanelUserInput,
  PanelUser,
  UpdatePanelUserInput,
} from '../types/SubscriptionTypes';

export interface PanelUsage {
  usedTraffic: number;
  dataLimit: number;
  expireAt: number | null;
  status: PanelUser['status'];
}

export interface IPanelApiClient {
  /**
   * @throws ConflictError when the username is taken
   */
  createUser(input: CreatePanelUserInput): Promise<PanelUser>;

  /**
   * @throws NotFoundError when the panel has no such user
   */
  getUser(username: string): Promise<PanelUser>;

  updateUser(username: string, input: UpdatePanelUserInput): Promise<PanelUser>;

  deleteUser(username: string): Promise<void>;

  getUserUsage(username: string): Promise<PanelUsage>;
}
