/**
 * Month metrics from one record store, including failure recovery per metric.
 */

import { DEFAULT_POLICY } from '@/lib/config/policy';
import { AggregationIndex } from '@/lib/aggregation/aggregationIndex';
import { isPostAssignmentResignation } from '@/lib/metrics/employeeStatus';
import { computeMetricSnapshot, emptyMetricValues, METRIC_KEYS, ratePct } from '@/lib/metrics/metricEngine';
import { loadRecordStore } from '@/lib/records/recordStore';
import { attendanceRow, employeeRow } from './helpers/rows';

const MONTH = '2025-07';

function julyStore() {
  return loadRecordStore(
    MONTH,
    [
      employeeRow('A', { joinDate: '2024-01-15' }),
      employeeRow('B', { joinDate: '2025-07-10' }),
      employeeRow('C', { joinDate: '2025-06-01', resignationDate: '2025-07-10' }),
      employeeRow('D', { joinDate: '2020-03-01' }),
    ],
    [
      attendanceRow('A', '2025-07-01'),
      attendanceRow('A', '2025-07-02'),
      attendanceRow('B', '2025-07-11', 'Absent', { reason: 'Sick' }),
      attendanceRow('B', '2025-07-12'),
      attendanceRow('C', '2025-07-02', 'Absent', { reason: 'AR1' }),
      attendanceRow('D', '2025-07-03', 'Vắng mặt', { reason: 'Thai sản' }),
      attendanceRow('D', '2025-07-04'),
    ]
  ).store;
}

describe('ratePct', () => {
  it('rounds to one decimal and returns 0 for an empty denominator', () => {
    expect(ratePct(1, 3)).toBe(33.3);
    expect(ratePct(2, 3)).toBe(66.7);
    expect(ratePct(5, 0)).toBe(0);
  });
});

describe('computeMetricSnapshot', () => {
  it('computes every metric for the month', () => {
    const snapshot = computeMetricSnapshot(julyStore());
    expect(snapshot.month).toBe(MONTH);
    expect(snapshot.findings).toEqual([]);
    expect(snapshot.values).toEqual({
      total_employees: 3,
      absence_rate: 33.3,
      absence_rate_excl_maternity: 20,
      unauthorized_absence_rate: 0,
      attendance_rate: 66.7,
      resignation_rate: 33.3,
      retention_rate: 66.7,
      recent_hires: 1,
      recent_resignations: 1,
      under_60_days: 1,
      post_assignment_resignations: 1,
      perfect_attendance: 1,
      long_term_employees: 2,
      average_tenure_days: 854,
      tenure_under_1yr: 1,
      tenure_1_to_3yr: 1,
      tenure_3_to_5yr: 0,
      tenure_over_5yr: 1,
      type1_count: 0,
      type2_count: 0,
      type3_count: 0,
      maternity_leave_count: 1,
      data_errors: 0,
    });
  });

  it('leaves attendance of employees gone by month end out of the rates', () => {
    const { store } = loadRecordStore(
      MONTH,
      [employeeRow('A'), employeeRow('R', { resignationDate: '2025-07-05' })],
      [attendanceRow('A', '2025-07-01'), attendanceRow('R', '2025-07-02', 'Absent', { reason: 'AR1' })]
    );
    const { values } = computeMetricSnapshot(store);
    expect(values.absence_rate).toBe(0);
    expect(values.absence_rate_excl_maternity).toBe(0);
    expect(values.unauthorized_absence_rate).toBe(0);
    expect(values.attendance_rate).toBe(100);
  });

  it('counts a join-anchored resignation only after more than 30 and up to 60 days', () => {
    const resigning = (resignationDate: string) =>
      loadRecordStore(MONTH, [employeeRow('P', { joinDate: '2025-06-01', resignationDate })], []).store;
    expect(computeMetricSnapshot(resigning('2025-07-01')).values.post_assignment_resignations).toBe(0);
    expect(computeMetricSnapshot(resigning('2025-07-02')).values.post_assignment_resignations).toBe(1);
    expect(computeMetricSnapshot(resigning('2025-07-31')).values.post_assignment_resignations).toBe(1);
    const [atThirty] = resigning('2025-07-01').employees;
    const [atSixty] = resigning('2025-07-31').employees;
    expect(isPostAssignmentResignation(atThirty, MONTH, DEFAULT_POLICY)).toBe(false);
    expect(isPostAssignmentResignation(atSixty, MONTH, DEFAULT_POLICY)).toBe(true);
    const { store } = loadRecordStore(
      '2025-08',
      [employeeRow('Q', { joinDate: '2025-06-01', resignationDate: '2025-08-01' })],
      []
    );
    expect(computeMetricSnapshot(store).values.post_assignment_resignations).toBe(0);
  });

  it('computes rates per team and role type with active headcounts', () => {
    const snapshot = computeMetricSnapshot(julyStore());
    expect(snapshot.groups.team).toEqual([
      {
        group: 'ASSEMBLY',
        headcount: 3,
        rates: { resignation_rate: 33.3, absence_rate_excl_maternity: 20, unauthorized_absence_rate: 0 },
      },
    ]);
    const noRates = { resignation_rate: 0, absence_rate_excl_maternity: 0, unauthorized_absence_rate: 0 };
    expect(snapshot.groups.role_type).toEqual([
      { group: 'TYPE-1', headcount: 0, rates: noRates },
      { group: 'TYPE-2', headcount: 0, rates: noRates },
      { group: 'TYPE-3', headcount: 0, rates: noRates },
    ]);
  });

  it('splits counts and rates by role type and team', () => {
    const { store } = loadRecordStore(
      MONTH,
      [
        employeeRow('X', { team: 'CUTTING', roleType: 'TYPE-1' }),
        employeeRow('Y', { team: 'CUTTING', roleType: 'type 2' }),
        employeeRow('Z', { team: '' }),
      ],
      [
        attendanceRow('X', '2025-07-01'),
        attendanceRow('X', '2025-07-02', 'Absent', { reason: 'AR1' }),
        attendanceRow('Y', '2025-07-01'),
        attendanceRow('Z', '2025-07-01', 'Absent', { reason: 'Sick' }),
      ]
    );
    const snapshot = computeMetricSnapshot(store);
    expect([snapshot.values.type1_count, snapshot.values.type2_count, snapshot.values.type3_count]).toEqual([1, 1, 0]);
    expect(snapshot.values.absence_rate).toBe(50);
    expect(snapshot.groups.team).toEqual([
      {
        group: 'CUTTING',
        headcount: 2,
        rates: { resignation_rate: 0, absence_rate_excl_maternity: 33.3, unauthorized_absence_rate: 33.3 },
      },
      {
        group: 'UNASSIGNED',
        headcount: 1,
        rates: { resignation_rate: 0, absence_rate_excl_maternity: 100, unauthorized_absence_rate: 0 },
      },
    ]);
    expect(snapshot.groups.role_type.map((g) => [g.group, g.headcount, g.rates.unauthorized_absence_rate])).toEqual([
      ['TYPE-1', 1, 50],
      ['TYPE-2', 1, 0],
      ['TYPE-3', 0, 0],
    ]);
  });

  it('freezes the snapshot and its values', () => {
    const snapshot = computeMetricSnapshot(julyStore());
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.values)).toBe(true);
    expect(Object.isFrozen(snapshot.groups.team[0].rates)).toBe(true);
    expect(() => Object.assign(snapshot.values, { total_employees: 99 })).toThrow(TypeError);
    const index = new AggregationIndex({ months: [MONTH], snapshots: [snapshot], stores: [], timelines: new Map() });
    const values = index.metricValues(MONTH);
    expect(values).toBeDefined();
    expect(() => Object.assign(values ?? {}, { data_errors: 5 })).toThrow(TypeError);
    expect(index.metricValues(MONTH)?.data_errors).toBe(0);
  });

  it('returns zero for every metric on an empty month', () => {
    const { store } = loadRecordStore(MONTH, [], []);
    expect(computeMetricSnapshot(store).values).toEqual(emptyMetricValues());
  });

  it('counts load findings as data errors', () => {
    const { store } = loadRecordStore(MONTH, [employeeRow('X', { team: '' }), employeeRow('')], []);
    expect(computeMetricSnapshot(store).values.data_errors).toBe(2);
  });

  it('recovers from a failing calculator with a zero value and a finding', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const snapshot = computeMetricSnapshot(julyStore(), {
      calculators: {
        absence_rate: () => {
          throw new Error('boom');
        },
        total_employees: () => Number.NaN,
      },
    });
    expect(snapshot.values.absence_rate).toBe(0);
    expect(snapshot.values.total_employees).toBe(0);
    expect(snapshot.values.recent_hires).toBe(1);
    expect(snapshot.findings.map((f) => [f.severity, f.category, f.detail.metric])).toEqual([
      ['warning', 'metric-calculation', 'total_employees'],
      ['warning', 'metric-calculation', 'absence_rate'],
    ]);
    expect(snapshot.findings[1].description).toBe('Metric absence_rate failed for 2025-07: boom');
    expect(warn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  it('produces a value for every metric key', () => {
    const snapshot = computeMetricSnapshot(julyStore());
    expect(Object.keys(snapshot.values).sort()).toEqual(METRIC_KEYS.slice().sort());
  });
});
