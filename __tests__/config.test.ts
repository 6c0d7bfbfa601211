/**
 * Environment getters, policy overrides and the vocabulary table.
 */

import { getOutputDir, getSourceDir, getWindowStart } from '@/lib/config/env';
import { DEFAULT_POLICY, resolvePolicy } from '@/lib/config/policy';
import { DEFAULT_VOCABULARY, lookupMonthName } from '@/lib/config/vocabulary';
import { InvalidMonthKeyError } from '@/lib/time/parse';

describe('env getters', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('fall back to defaults', () => {
    delete process.env.HR_SOURCE_DIR;
    delete process.env.HR_OUTPUT_DIR;
    delete process.env.HR_WINDOW_START;
    expect(getSourceDir()).toBe('./input_files');
    expect(getOutputDir()).toBe('./output_files');
    expect(getWindowStart()).toBe('2025-07');
  });

  it('read overrides and strip trailing slashes', () => {
    process.env.HR_SOURCE_DIR = '/data/hr/';
    process.env.HR_WINDOW_START = '2026-01';
    expect(getSourceDir()).toBe('/data/hr');
    expect(getWindowStart()).toBe('2026-01');
  });

  it('rejects a malformed window start', () => {
    process.env.HR_WINDOW_START = 'July';
    expect(() => getWindowStart()).toThrow(InvalidMonthKeyError);
  });
});

describe('resolvePolicy', () => {
  it('returns defaults without overrides', () => {
    expect(resolvePolicy()).toBe(DEFAULT_POLICY);
  });

  it('merges nested overrides', () => {
    const policy = resolvePolicy({ newHireTenureDays: 90, awardTiers: { bronze: 180 } });
    expect(policy.newHireTenureDays).toBe(90);
    expect(policy.awardTiers).toEqual({ platinum: 3650, gold: 1825, silver: 1095, bronze: 180 });
    expect(policy.risk).toEqual(DEFAULT_POLICY.risk);
  });
});

describe('lookupMonthName', () => {
  it('maps long, short and Korean month names', () => {
    expect(lookupMonthName(DEFAULT_VOCABULARY, 'September')).toBe(9);
    expect(lookupMonthName(DEFAULT_VOCABULARY, 'sept')).toBe(9);
    expect(lookupMonthName(DEFAULT_VOCABULARY, '12월')).toBe(12);
    expect(lookupMonthName(DEFAULT_VOCABULARY, 'month')).toBeUndefined();
  });
});
