/**
 * Loading one month: normalization, frozen records and validation findings.
 */

import { DataLoadError } from '@/lib/errors';
import { loadRecordStore } from '@/lib/records/recordStore';
import { attendanceRow, employeeRow } from './helpers/rows';

const MONTH = '2025-07';

describe('loadRecordStore: employees', () => {
  it('normalizes a clean row without findings', () => {
    const { store, findings } = loadRecordStore(
      MONTH,
      [
        employeeRow('E001', {
          name: ' Nguyen Van A ',
          position: 'Assembly Line Inspector',
          team: 'assembly',
          roleType: 'type 2',
          attendanceRate: '95%',
          trainingParticipationPct: 80,
          mentorFeedback: 'Positive',
        }),
      ],
      []
    );
    expect(findings).toEqual([]);
    expect(store.employee('E001')).toEqual({
      id: 'E001',
      name: 'Nguyen Van A',
      position: 'Assembly Line Inspector',
      team: 'ASSEMBLY',
      roleType: 'TYPE-2',
      joinDate: '2024-01-15',
      resignationDate: null,
      assignmentDate: null,
      managerId: null,
      reportedAttendanceRate: 95,
      actualWorkingDays: null,
      trainingParticipationPct: 80,
      mentorFeedback: 'positive',
    });
    expect(Object.isFrozen(store.employee('E001'))).toBe(true);
  });

  it('keeps a record whose resignation precedes its join date and flags it critical', () => {
    const { store, findings } = loadRecordStore(
      MONTH,
      [employeeRow('E002', { joinDate: '2025-07-10', resignationDate: '2025-07-01' })],
      []
    );
    expect(store.employee('E002')?.resignationDate).toBe('2025-07-01');
    expect(findings).toEqual([
      {
        severity: 'critical',
        category: 'temporal-inconsistency',
        month: MONTH,
        employeeIds: ['E002'],
        description: 'Resignation date is before join date',
        detail: { rule: 'resignation-before-join', joinDate: '2025-07-10', resignationDate: '2025-07-01' },
      },
    ]);
  });

  it('flags join dates after the month end and assignments before joining', () => {
    const { findings } = loadRecordStore(
      MONTH,
      [
        employeeRow('E003', { joinDate: '2025-08-04' }),
        employeeRow('E004', { joinDate: '2025-05-01', assignmentDate: '2025-04-20' }),
      ],
      []
    );
    expect(findings.map((f) => [f.employeeIds[0], f.detail.rule])).toEqual([
      ['E003', 'join-after-month-end'],
      ['E004', 'assignment-before-join'],
    ]);
  });

  it('skips rows without id and keeps the first of duplicate ids', () => {
    const { store, findings } = loadRecordStore(
      MONTH,
      [
        employeeRow('', { name: 'No Id' }),
        employeeRow('E005', { name: 'First' }),
        employeeRow('E005', { name: 'Second' }),
      ],
      []
    );
    expect(store.size).toBe(1);
    expect(store.employee('E005')?.name).toBe('First');
    expect(findings.map((f) => [f.severity, f.category, f.detail.row])).toEqual([
      ['critical', 'missing-employee-id', 1],
      ['critical', 'duplicate-employee-id', 3],
    ]);
  });

  it('reports a missing join date and an unreadable resignation date', () => {
    const { store, findings } = loadRecordStore(
      MONTH,
      [employeeRow('E006', { joinDate: '', resignationDate: 'soon' })],
      []
    );
    expect(store.employee('E006')?.joinDate).toBeNull();
    expect(findings.map((f) => [f.category, f.detail.field, f.detail.value])).toEqual([
      ['invalid-date', 'joinDate', ''],
      ['invalid-date', 'resignationDate', 'soon'],
    ]);
  });

  it('maps team synonyms and reports missing, synonym and unknown teams', () => {
    const { store, findings } = loadRecordStore(
      MONTH,
      [
        employeeRow('E007', { team: 'Assy' }),
        employeeRow('E008', { team: 'Painting' }),
        employeeRow('E009', { team: '' }),
      ],
      []
    );
    expect(store.employees.map((e) => e.team)).toEqual(['ASSEMBLY', 'PAINTING', null]);
    expect(findings.map((f) => [f.severity, f.category])).toEqual([
      ['warning', 'team-not-normalized'],
      ['info', 'unknown-team'],
      ['warning', 'team-missing'],
    ]);
    expect(findings[0].detail).toEqual({ raw: 'Assy', team: 'ASSEMBLY' });
  });

  it('warns on unknown positions and out-of-range attendance inputs', () => {
    const { findings } = loadRecordStore(
      MONTH,
      [employeeRow('E010', { position: 'Painter', attendanceRate: 120, actualWorkingDays: 28 })],
      []
    );
    expect(findings.map((f) => [f.category, f.detail.rule ?? null])).toEqual([
      ['unknown-position', null],
      ['attendance-range', 'attendance-rate'],
      ['attendance-range', 'working-days'],
    ]);
    expect(findings[2].detail).toEqual({ rule: 'working-days', value: 28, businessDays: 27 });
  });

  it('throws DataLoadError when rows are not a list', () => {
    expect(() => loadRecordStore(MONTH, JSON.parse('{"rows": []}'), [])).toThrow(DataLoadError);
  });
});

describe('loadRecordStore: attendance', () => {
  it('classifies status and reason keywords', () => {
    const { store } = loadRecordStore(
      MONTH,
      [employeeRow('E001')],
      [
        attendanceRow('E001', '2025-07-01', 'Đi làm'),
        attendanceRow('E001', '2025-07-02', 'Vắng mặt', { reason: 'Thai sản' }),
        attendanceRow('E001', '2025-07-03', 'Vắng mặt', { reason: 'AR1' }),
        attendanceRow('E001', '2025-07-04', 'Vắng mặt', { reason: 'Ốm' }),
        attendanceRow('E001', '2025-07-05', 'Absent', { reason: 'Unauthorized' }),
      ]
    );
    expect(store.attendanceFor('E001').map((r) => r.status)).toEqual([
      'present',
      'maternity-leave',
      'absence-unauthorized',
      'absence-authorized',
      'absence-unauthorized',
    ]);
  });

  it('appends attendance findings after employee findings in a fixed order', () => {
    const { store, findings } = loadRecordStore(
      MONTH,
      [
        employeeRow('E001'),
        employeeRow('E002', { joinDate: '2025-07-10', resignationDate: '2025-07-01' }),
      ],
      [
        attendanceRow('E001', '2025-07-01'),
        attendanceRow('E999', '2025-07-01'),
        attendanceRow('E001', '2025-07-02', 'Late'),
        attendanceRow('E001', '2025-07-03', 'Present', { workedHours: -2 }),
        attendanceRow('E999', '2025-07-02'),
      ]
    );
    expect(findings.map((f) => f.category)).toEqual([
      'temporal-inconsistency',
      'attendance-range',
      'orphaned-attendance',
      'unknown-attendance-status',
    ]);
    expect(findings[1].detail).toEqual({ rule: 'worked-time', value: -2, row: 4 });
    expect(findings[2].employeeIds).toEqual(['E999']);
    expect(findings[2].detail).toEqual({ count: 2 });
    expect(findings[3].detail).toEqual({ status: 'Late' });
    expect(store.attendanceFor('E001').map((r) => r.status)).toEqual(['present', 'unknown', 'present']);
    expect(store.attendanceFor('E999')).toEqual([]);
    expect(store.loadFindings).toHaveLength(4);
  });

  it('reports attendance after the resignation date once per employee', () => {
    const { findings } = loadRecordStore(
      MONTH,
      [employeeRow('E003', { resignationDate: '2025-07-20' })],
      [
        attendanceRow('E003', '2025-07-19'),
        attendanceRow('E003', '2025-07-22'),
        attendanceRow('E003', '2025-07-21'),
      ]
    );
    expect(findings).toHaveLength(1);
    expect(findings[0].category).toBe('attendance-after-resignation');
    expect(findings[0].detail).toEqual({ resignationDate: '2025-07-20', firstDate: '2025-07-21', count: 2 });
  });
});
