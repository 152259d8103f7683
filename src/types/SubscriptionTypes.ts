/**
 * Subscription domain types: panel user envelope, stored record, derived status.
 */

import { z } from 'zod';

export const PANEL_USER_STATUSES = ['active', 'disabled', 'limited', 'expired', 'on_hold'] as const;
export type PanelUserStatus = (typeof PANEL_USER_STATUSES)[number];

/**
 * Upstream user envelope. Unlimited traffic comes back as `data_limit: null`.
 */
export const PanelUserResponseSchema = z.object({
  username: z.string().min(1),
  data_limit: z.number().int().nonnegative().nullable(),
  used_traffic: z.number().int().nonnegative(),
  expire: z.number().int().nullable(),
  status: z.enum(PANEL_USER_STATUSES),
  subscription_url: z.string().nullable().optional(),
});

export type PanelUserResponse = z.infer<typeof PanelUserResponseSchema>;

export interface PanelUser {
  username: string;
  /** Bytes; 0 = unlimited */
  dataLimit: number;
  usedTraffic: number;
  /** Unix seconds; null = never expires */
  expireAt: number | null;
  status: PanelUserStatus;
  subscriptionUrl: string;
}

export interface CreatePanelUserInput {
  username: string;
  dataLimit: number;
  expireAt: number;
}

export interface UpdatePanelUserInput {
  dataLimit?: number;
  expireAt?: number;
  status?: 'active' | 'disabled';
}

export type SubscriptionStatus = 'active' | 'expired' | 'disabled';
export type SubscriptionTier = 'trial' | 'paid';

export type LifecycleState = 'NON_EXISTENT' | 'TRIAL' | 'ACTIVE' | 'EXPIRED' | 'DISABLED';

export const SubscriptionRecordSchema = z.object({
  userId: z.string().min(1),
  panelUsername: z.string().min(1),
  tier: z.enum(['trial', 'paid']),
  dataLimit: z.number().int().nonnegative(),
  usedTraffic: z.number().int().nonnegative(),
  expireAt: z.number().int().nullable(),
  status: z.enum(['active', 'expired', 'disabled']),
  subscriptionUrl: z.string(),
  updatedAt: z.string(),
});

export type SubscriptionRecord = z.infer<typeof SubscriptionRecordSchema>;

export interface SubscriptionStatusView {
  userId: string;
  panelUsername: string;
  status: SubscriptionStatus;
  lifecycleState: LifecycleState;
  dataLimit: number;
  usedTraffic: number;
  /** null when traffic is unlimited */
  remainingTraffic: number | null;
  expireAt: number | null;
  /** Whole days until expiry, 0 once expired; null when the subscription never expires */
  daysRemaining: number | null;
  subscriptionUrl: string;
  checkedAt: string;
}

export interface TrafficUsageView {
  userId: string;
  status: SubscriptionStatus;
  dataLimit: number;
  usedTraffic: number;
  /** null when traffic is unlimited */
  remainingTraffic: number | null;
  expireAt: number | null;
  checkedAt: string;
}

export interface TrialResult {
  userId: string;
  panelUsername: string;
  subscriptionUrl: string;
  dataLimit: number;
  expireDays: number;
  expireAt: number;
}

export interface RenewalResult {
  userId: string;
  panelUsername: string;
  previousExpireAt: number | null;
  expireAt: number;
  dataLimit: number;
}

export interface ExpiryCheckResult {
  userId: string;
  status: SubscriptionStatus;
  lifecycleState: LifecycleState;
  expireAt: number | null;
  daysRemaining: number | null;
  expiringSoon: boolean;
}

export interface SubscriptionPlan {
  id: string;
  days: number;
  /** Bytes */
  dataLimit: number;
  price: number;
}
