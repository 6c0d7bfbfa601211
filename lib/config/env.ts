/**
 * Run settings from the environment. Each getter falls back to a default when the variable is unset.
 */

import { parseMonthKeyOrThrow } from '@/lib/time/parse';
import type { MonthKey } from '@/lib/time';

const DEFAULT_SOURCE_DIR = './input_files';
const DEFAULT_OUTPUT_DIR = './output_files';
const DEFAULT_WINDOW_START = '2025-07';

export function getSourceDir(): string {
  return (process.env.HR_SOURCE_DIR ?? DEFAULT_SOURCE_DIR).replace(/\/+$/, '');
}

export function getOutputDir(): string {
  return (process.env.HR_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR).replace(/\/+$/, '');
}

/** Earliest month the window may reach back to. Throws InvalidMonthKeyError on a malformed value. */
export function getWindowStart(): MonthKey {
  return parseMonthKeyOrThrow(process.env.HR_WINDOW_START ?? DEFAULT_WINDOW_START);
}
