// src/lib/status.ts
import type { AttendanceStatus, CellContent } from '../types';

const STATUS_CODES: Record<AttendanceStatus, string> = {
  Present: 'P',
  Absent: 'A',
  NotApplicable: 'NA',
  Unknown: 'Unknown',
};

/**
 * Check marker wins over the x marker, which wins over a literal "NA".
 */
export function classify(cell: CellContent): AttendanceStatus {
  if (cell.hasCheck) return 'Present';
  if (cell.hasCross) return 'Absent';
  if (cell.text.trim() === 'NA') return 'NotApplicable';
  return 'Unknown';
}

// Code written to the published table
export function statusCode(status: AttendanceStatus): string {
  return STATUS_CODES[status];
}
