/**
 * Policy parameters for metrics, award tiers and the risk heuristic.
 * The numbers are illustrative defaults, not business rules; override per run via resolvePolicy.
 */

export type AwardTierThresholds = {
  /** Minimum tenure in days for each tier. */
  platinum: number;
  gold: number;
  silver: number;
  bronze: number;
};

export type RiskWeights = {
  /** Attendance rate (%) below which the shortfall starts counting. */
  attendanceFloorPct: number;
  attendanceWeight: number;
  /** Training participation (%) below which the shortfall starts counting. */
  trainingFloorPct: number;
  trainingWeight: number;
  negativeFeedbackWeight: number;
  neutralFeedbackWeight: number;
  /** Added per unauthorized absence, uncapped per absence. */
  unauthorizedAbsenceWeight: number;
  /** Score cut-offs: score >= medium → medium band, score >= high → high band. */
  bands: { medium: number; high: number };
};

export type HrPolicy = {
  newHireTenureDays: number;
  longTermTenureDays: number;
  postAssignmentMinDays: number;
  postAssignmentMaxDays: number;
  /** getUTCDay numbering (0=Sun .. 6=Sat). */
  workWeekDays: readonly number[];
  awardTiers: AwardTierThresholds;
  risk: RiskWeights;
};

export type PolicyOverrides = Partial<Omit<HrPolicy, 'awardTiers' | 'risk'>> & {
  awardTiers?: Partial<AwardTierThresholds>;
  risk?: Partial<Omit<RiskWeights, 'bands'>> & { bands?: Partial<RiskWeights['bands']> };
};

export const DEFAULT_POLICY: HrPolicy = {
  newHireTenureDays: 60,
  longTermTenureDays: 365,
  postAssignmentMinDays: 30,
  postAssignmentMaxDays: 60,
  workWeekDays: [1, 2, 3, 4, 5, 6],
  awardTiers: {
    platinum: 3650,
    gold: 1825,
    silver: 1095,
    bronze: 365,
  },
  risk: {
    attendanceFloorPct: 90,
    attendanceWeight: 30,
    trainingFloorPct: 80,
    trainingWeight: 25,
    negativeFeedbackWeight: 25,
    neutralFeedbackWeight: 12.5,
    unauthorizedAbsenceWeight: 20,
    bands: { medium: 30, high: 60 },
  },
};

export function resolvePolicy(overrides?: PolicyOverrides): HrPolicy {
  if (!overrides) return DEFAULT_POLICY;
  const { awardTiers, risk, ...rest } = overrides;
  return {
    ...DEFAULT_POLICY,
    ...rest,
    awardTiers: { ...DEFAULT_POLICY.awardTiers, ...awardTiers },
    risk: {
      ...DEFAULT_POLICY.risk,
      ...risk,
      bands: { ...DEFAULT_POLICY.risk.bands, ...risk?.bands },
    },
  };
}
