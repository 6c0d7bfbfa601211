/**
 * Month-key validation and the tolerant cell parser used for source rows.
 */

import { InvalidMonthKeyError, parseFlexibleDate, parseMonthKeyOrThrow } from '@/lib/time/parse';

describe('parseMonthKeyOrThrow', () => {
  it('returns the trimmed key for valid input', () => {
    expect(parseMonthKeyOrThrow('2025-07')).toBe('2025-07');
    expect(parseMonthKeyOrThrow(' 2025-12 ')).toBe('2025-12');
  });

  it('rejects other shapes and months out of range', () => {
    expect(() => parseMonthKeyOrThrow('07-2025')).toThrow(InvalidMonthKeyError);
    expect(() => parseMonthKeyOrThrow('2025/07')).toThrow(InvalidMonthKeyError);
    expect(() => parseMonthKeyOrThrow('2025-7')).toThrow(InvalidMonthKeyError);
    expect(() => parseMonthKeyOrThrow('2025-00')).toThrow(InvalidMonthKeyError);
    expect(() => parseMonthKeyOrThrow('2025-13')).toThrow('Invalid month key (expected YYYY-MM, month 01-12): 2025-13');
  });
});

describe('parseFlexibleDate', () => {
  it('accepts ISO-like separators', () => {
    expect(parseFlexibleDate('2025-07-03')).toBe('2025-07-03');
    expect(parseFlexibleDate('2025.7.3')).toBe('2025-07-03');
    expect(parseFlexibleDate('2025/07/03 08:00')).toBe('2025-07-03');
  });

  it('reads slash dates as month/day/year', () => {
    expect(parseFlexibleDate('07/03/2025')).toBe('2025-07-03');
  });

  it('accepts compact YYYYMMDD as text or as a number cell', () => {
    expect(parseFlexibleDate('20250703')).toBe('2025-07-03');
    expect(parseFlexibleDate(20250703)).toBe('2025-07-03');
    expect(parseFlexibleDate(20251340)).toBeNull();
    expect(parseFlexibleDate(123456789)).toBeNull();
  });

  it('converts Excel serial numbers, also when given as text', () => {
    expect(parseFlexibleDate(45839)).toBe('2025-07-01');
    expect(parseFlexibleDate('45839')).toBe('2025-07-01');
  });

  it('accepts Date objects', () => {
    expect(parseFlexibleDate(new Date(Date.UTC(2025, 6, 1)))).toBe('2025-07-01');
  });

  it('returns null for blanks and unreadable values', () => {
    expect(parseFlexibleDate(null)).toBeNull();
    expect(parseFlexibleDate('')).toBeNull();
    expect(parseFlexibleDate('   ')).toBeNull();
    expect(parseFlexibleDate('not a date')).toBeNull();
    expect(parseFlexibleDate('2025-02-30')).toBeNull();
    expect(parseFlexibleDate(0)).toBeNull();
    expect(parseFlexibleDate(true)).toBeNull();
  });
});
