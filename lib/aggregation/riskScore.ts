/**
 * Early-attrition risk score: a heuristic, not ground truth.
 * Weighted sum of attendance shortfall, training shortfall, mentor feedback and unauthorized
 * absences, rounded and clamped to 0..100. Weights come from policy.
 */

import type { RiskWeights } from '@/lib/config/policy';
import type { MentorFeedback } from '@/lib/records/types';

export type RiskInputs = {
  attendanceRate: number | null;
  trainingParticipationPct: number | null;
  mentorFeedback: MentorFeedback | null;
  unauthorizedAbsences: number;
};

export type RiskBand = 'low' | 'medium' | 'high';

export const RISK_BANDS: readonly RiskBand[] = ['low', 'medium', 'high'];

export type RiskBreakdown = {
  score: number;
  attendance: number;
  training: number;
  feedback: number;
  unauthorized: number;
};

/** Shortfall below floor as a 0..1 fraction of the floor. */
function shortfall(value: number | null, floor: number): number {
  if (value == null || floor <= 0 || value >= floor) return 0;
  return Math.min(1, (floor - Math.max(0, value)) / floor);
}

export function computeRiskBreakdown(inputs: RiskInputs, weights: RiskWeights): RiskBreakdown {
  const attendance = shortfall(inputs.attendanceRate, weights.attendanceFloorPct) * weights.attendanceWeight;
  const training = shortfall(inputs.trainingParticipationPct, weights.trainingFloorPct) * weights.trainingWeight;
  const feedback =
    inputs.mentorFeedback === 'negative'
      ? weights.negativeFeedbackWeight
      : inputs.mentorFeedback === 'neutral'
        ? weights.neutralFeedbackWeight
        : 0;
  const unauthorized = Math.max(0, inputs.unauthorizedAbsences) * weights.unauthorizedAbsenceWeight;
  const raw = attendance + training + feedback + unauthorized;
  return {
    score: Math.max(0, Math.min(100, Math.round(raw))),
    attendance,
    training,
    feedback,
    unauthorized,
  };
}

export function computeRiskScore(inputs: RiskInputs, weights: RiskWeights): number {
  return computeRiskBreakdown(inputs, weights).score;
}

export function riskBandFromScore(score: number, weights: RiskWeights): RiskBand {
  if (score >= weights.bands.high) return 'high';
  if (score >= weights.bands.medium) return 'medium';
  return 'low';
}
