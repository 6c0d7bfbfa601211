/**
 * Cell coercion and vocabulary lookups used while loading a month snapshot.
 */

import type { Vocabulary } from '@/lib/config/vocabulary';
import { ROLE_TYPES, type AttendanceStatus, type MentorFeedback, type RoleType } from './types';

export function cellToString(v: unknown): string {
  if (v == null) return '';
  if (typeof v === 'number') return Number.isFinite(v) ? String(v) : '';
  return String(v).trim();
}

/** Number or null for blanks and non-numeric text. Strips a trailing "%". */
export function cellToNumber(v: unknown): number | null {
  if (v == null || v === '') return null;
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  const text = String(v).trim().replace(/%$/, '').replace(/,/g, '');
  if (!text) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

/** Uppercase, single-spaced. */
export function normalizeLabel(v: string): string {
  return v.trim().replace(/\s+/g, ' ').toUpperCase();
}

export type TeamLookup =
  | { kind: 'missing' }
  | { kind: 'canonical'; team: string }
  | { kind: 'synonym'; team: string; raw: string }
  | { kind: 'unknown'; team: string };

export function lookupTeam(vocabulary: Vocabulary, raw: unknown): TeamLookup {
  const text = cellToString(raw);
  if (!text) return { kind: 'missing' };
  const label = normalizeLabel(text);
  if (vocabulary.teams.includes(label)) return { kind: 'canonical', team: label };
  const canonical = vocabulary.teamSynonyms[label];
  if (canonical) return { kind: 'synonym', team: canonical, raw: text };
  return { kind: 'unknown', team: label };
}

/** A position is known when it contains one of the vocabulary terms (e.g. "ASSEMBLY LINE INSPECTOR"). */
export function isKnownPosition(vocabulary: Vocabulary, position: string): boolean {
  const label = normalizeLabel(position);
  return vocabulary.positions.some((p) => label.includes(normalizeLabel(p)));
}

export function parseMentorFeedback(v: unknown): MentorFeedback | null {
  const text = cellToString(v).toLowerCase();
  if (text === 'positive' || text === 'neutral' || text === 'negative') return text;
  return null;
}

/** "TYPE-1", "type 2", "TYPE_3" → canonical role type; anything else is null. */
export function parseRoleType(v: unknown): RoleType | null {
  const match = cellToString(v).toUpperCase().match(/^TYPE\s*[-_]?\s*([123])$/);
  if (!match) return null;
  return ROLE_TYPES.find((t) => t === `TYPE-${match[1]}`) ?? null;
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => text.includes(k.toLowerCase()));
}

/**
 * Classify an attendance row from its status cell and free-text reason.
 * Unauthorized reason codes win over the status cell; maternity is an absence with a maternity reason.
 */
export function classifyAttendanceStatus(
  vocabulary: Vocabulary,
  status: unknown,
  reason: unknown
): AttendanceStatus {
  const keywords = vocabulary.attendanceStatus;
  const statusText = cellToString(status).toLowerCase();
  const reasonText = cellToString(reason).toLowerCase();

  if (containsAny(reasonText, keywords.unauthorizedReasons) || containsAny(statusText, keywords.unauthorizedReasons)) {
    return 'absence-unauthorized';
  }
  if (containsAny(statusText, keywords.absentMarkers)) {
    return containsAny(reasonText, keywords.maternityReasons) ? 'maternity-leave' : 'absence-authorized';
  }
  if (containsAny(statusText, keywords.maternityReasons)) return 'maternity-leave';
  if (containsAny(statusText, keywords.presentMarkers)) return 'present';
  return 'unknown';
}
