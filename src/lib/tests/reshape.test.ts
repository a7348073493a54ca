import { calendarKey, reshape, sanitizeColumnName } from '../reshape';
import type { StudentAttendanceRecord } from '../../types';

describe('reshape', () => {
  test('orders date columns by calendar day and rewrites slashes', () => {
    const records: StudentAttendanceRecord[] = [
      {
        rollNo: 'R1',
        studentName: 'Asha',
        section: 'Section A',
        attendanceByDate: { '15/01/2024': 'Present', '02/01/2024': 'Absent', '20/12/2023': 'NotApplicable' },
      },
    ];

    const table = reshape(records);

    expect(table?.dates).toEqual(['20/12/2023', '02/01/2024', '15/01/2024']);
    expect(table?.columns).toEqual(['Roll_No', 'Name', 'Section', '20_12_2023', '02_01_2024', '15_01_2024']);
    expect(table?.rows).toEqual([
      { Roll_No: 'R1', Name: 'Asha', Section: 'Section A', '20_12_2023': 'NA', '02_01_2024': 'A', '15_01_2024': 'P' },
    ]);
  });

  test('keeps the first status seen for the same student and date', () => {
    const records: StudentAttendanceRecord[] = [
      { rollNo: 'R1', studentName: 'Asha', section: 'Section A', attendanceByDate: { '05/02/2024': 'Absent' } },
      { rollNo: 'R1', studentName: 'Asha', section: 'Section A', attendanceByDate: { '05/02/2024': 'Present' } },
    ];

    expect(reshape(records)?.rows).toEqual([{ Roll_No: 'R1', Name: 'Asha', Section: 'Section A', '05_02_2024': 'A' }]);
  });

  test('merges pages of the same student and leaves gaps as null', () => {
    const records: StudentAttendanceRecord[] = [
      { rollNo: 'R2', studentName: 'Bilal', section: 'Section A', attendanceByDate: { '08/03/2024': 'Present' } },
      { rollNo: 'R1', studentName: 'Asha', section: 'Section A', attendanceByDate: { '08/03/2024': 'Unknown' } },
      { rollNo: 'R1', studentName: 'Asha', section: 'Section A', attendanceByDate: { '01/03/2024': 'Absent' } },
    ];

    expect(reshape(records)?.rows).toEqual([
      { Roll_No: 'R1', Name: 'Asha', Section: 'Section A', '01_03_2024': 'A', '08_03_2024': 'Unknown' },
      { Roll_No: 'R2', Name: 'Bilal', Section: 'Section A', '01_03_2024': null, '08_03_2024': 'P' },
    ]);
  });

  test('the same roll number in two sections stays two rows', () => {
    const records: StudentAttendanceRecord[] = [
      { rollNo: 'R1', studentName: 'Asha', section: 'Section B', attendanceByDate: { '01/03/2024': 'Present' } },
      { rollNo: 'R1', studentName: 'Asha', section: 'Section A', attendanceByDate: { '01/03/2024': 'Absent' } },
    ];

    expect(reshape(records)?.rows.map((row) => [row.Section, row['01_03_2024']])).toEqual([
      ['Section A', 'A'],
      ['Section B', 'P'],
    ]);
  });

  test('records without a section are listed under Unknown', () => {
    const records: StudentAttendanceRecord[] = [
      { rollNo: 'R9', studentName: 'Dev', attendanceByDate: { '01/03/2024': 'Present' } },
    ];

    expect(reshape(records)?.rows[0].Section).toBe('Unknown');
  });

  test('returns null when no record carries a date', () => {
    const records: StudentAttendanceRecord[] = [
      { rollNo: 'R1', studentName: 'Asha', section: 'Section A', attendanceByDate: {} },
    ];

    expect(reshape(records)).toBeNull();
    expect(reshape([])).toBeNull();
  });
});

describe('calendarKey', () => {
  test('compares by year, then month, then day', () => {
    expect(calendarKey('31/12/2023')).toBeLessThan(calendarKey('01/01/2024'));
    expect(calendarKey('02/03/2024')).toBeGreaterThan(calendarKey('28/02/2024'));
  });
});

describe('sanitizeColumnName', () => {
  test('replaces every slash', () => {
    expect(sanitizeColumnName('07/03/2024')).toBe('07_03_2024');
  });
});
