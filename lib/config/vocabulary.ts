/**
 * Static lookup tables: month names, position vocabulary, canonical teams and their synonyms,
 * attendance status keywords. Defaults live in config/vocabulary.json; callers may pass their own.
 */

import defaults from '@/config/vocabulary.json';

export type AttendanceStatusKeywords = {
  presentMarkers: readonly string[];
  absentMarkers: readonly string[];
  unauthorizedReasons: readonly string[];
  maternityReasons: readonly string[];
};

export type Vocabulary = {
  /** Lowercase month token → month number 1..12. */
  monthNames: Readonly<Record<string, number>>;
  positions: readonly string[];
  teams: readonly string[];
  /** Uppercase synonym → canonical team. */
  teamSynonyms: Readonly<Record<string, string>>;
  attendanceStatus: AttendanceStatusKeywords;
};

export const DEFAULT_VOCABULARY: Vocabulary = defaults;

export function lookupMonthName(vocabulary: Vocabulary, token: string): number | undefined {
  const month = vocabulary.monthNames[token.trim().toLowerCase()];
  return month != null && month >= 1 && month <= 12 ? month : undefined;
}
