/**
 * Paid plans offered for renewal, keyed by plan id (months).
 */

import type { SubscriptionPlan } from '../types/SubscriptionTypes';

const GIB = 1024 * 1024 * 1024;

export const SUBSCRIPTION_PLANS: Readonly<Record<string, SubscriptionPlan>> = Object.freeze({
  '1': Object.freeze({ id: '1', days: 30, dataLimit: 100 * GIB, price: 300 }),
  '3': Object.freeze({ id: '3', days: 90, dataLimit: 300 * GIB, price: 750 }),
  '6': Object.freeze({ id: '6', days: 180, dataLimit: 600 * GIB, price: 1000 }),
  '12': Object.freeze({ id: '12', days: 365, dataLimit: 1200 * GIB, price: 2000 }),
});

/**
 * Returns the plan for the given id, or null if not offered.
 */
export function getPlan(planId: string): SubscriptionPlan | null {
  return SUBSCRIPTION_PLANS[planId] ?? null;
}
