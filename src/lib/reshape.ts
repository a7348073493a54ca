// src/lib/reshape.ts
import { statusCode } from './status';
import type { AttendanceStatus, StudentAttendanceRecord, WideAttendanceTable, WideCell } from '../types';

export const ID_COLUMNS = ['Roll_No', 'Name', 'Section'] as const;

const UNKNOWN_SECTION = 'Unknown';

interface LongRow {
  rollNo: string;
  name: string;
  section: string;
  date: string;
  status: AttendanceStatus;
}

interface StudentGroup {
  rollNo: string;
  name: string;
  section: string;
  statuses: Map<string, AttendanceStatus>;
}

export function sanitizeColumnName(name: string): string {
  return name.replace(/\//g, '_');
}

/**
 * DD/MM/YYYY -> sortable YYYYMMDD number.
 */
export function calendarKey(date: string): number {
  const [day, month, year] = date.split('/').map(Number);
  return year * 10000 + month * 100 + day;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function toLongFormat(records: StudentAttendanceRecord[]): LongRow[] {
  const rows: LongRow[] = [];
  for (const record of records) {
    for (const [date, status] of Object.entries(record.attendanceByDate)) {
      rows.push({
        rollNo: record.rollNo,
        name: record.studentName,
        section: record.section ?? UNKNOWN_SECTION,
        date,
        status,
      });
    }
  }
  return rows;
}

/**
 * Pivots a subject's records into one row per student and one column per
 * date. Dates are ordered by calendar day; the first status seen for a
 * (student, date) pair is kept. Returns null when no record carries a date.
 */
export function reshape(records: StudentAttendanceRecord[]): WideAttendanceTable | null {
  const longRows = toLongFormat(records);
  if (longRows.length === 0) return null;

  const groups = new Map<string, StudentGroup>();
  const dates = new Set<string>();

  for (const row of longRows) {
    const key = JSON.stringify([row.rollNo, row.name, row.section]);
    let group = groups.get(key);
    if (!group) {
      group = { rollNo: row.rollNo, name: row.name, section: row.section, statuses: new Map() };
      groups.set(key, group);
    }
    if (!group.statuses.has(row.date)) {
      group.statuses.set(row.date, row.status);
    }
    dates.add(row.date);
  }

  const sortedDates = [...dates].sort((a, b) => calendarKey(a) - calendarKey(b));
  const sortedGroups = [...groups.values()].sort(
    (a, b) =>
      compareText(a.rollNo, b.rollNo) || compareText(a.name, b.name) || compareText(a.section, b.section)
  );

  const rows = sortedGroups.map((group) => {
    const row: Record<string, WideCell> = {
      Roll_No: group.rollNo,
      Name: group.name,
      Section: group.section,
    };
    for (const date of sortedDates) {
      const status = group.statuses.get(date);
      row[sanitizeColumnName(date)] = status === undefined ? null : statusCode(status);
    }
    return row;
  });

  return {
    columns: [...ID_COLUMNS, ...sortedDates.map(sanitizeColumnName)],
    dates: sortedDates,
    rows,
  };
}
