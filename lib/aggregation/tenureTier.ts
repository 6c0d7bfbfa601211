/**
 * Long-service award tiers from tenure in days. Thresholds come from policy.
 */

import type { AwardTierThresholds } from '@/lib/config/policy';

export type AwardTier = 'platinum' | 'gold' | 'silver' | 'bronze' | 'none';

/** Highest tier first. */
export const AWARD_TIERS: readonly AwardTier[] = ['platinum', 'gold', 'silver', 'bronze', 'none'];

export function awardTierFromTenure(tenureDays: number | null, thresholds: AwardTierThresholds): AwardTier {
  if (tenureDays == null) return 'none';
  if (tenureDays >= thresholds.platinum) return 'platinum';
  if (tenureDays >= thresholds.gold) return 'gold';
  if (tenureDays >= thresholds.silver) return 'silver';
  if (tenureDays >= thresholds.bronze) return 'bronze';
  return 'none';
}
