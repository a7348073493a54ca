// src/lib/extractor.ts
import * as cheerio from 'cheerio';
import { classify } from './status';
import type { AttendanceStatus, StatusMarkers, StudentAttendanceRecord } from '../types';

export const DATE_HEADER = /^\d{2}\/\d{2}\/\d{4}$/;

export const DEFAULT_MARKERS: StatusMarkers = {
  check: 'svg.lucide-check',
  cross: 'svg.lucide-x',
};

/**
 * Reads every student row of the rendered attendance table.
 *
 * Only headers shaped like DD/MM/YYYY are treated as date columns, so
 * "Roll No", "Name" or totals can sit anywhere in the header row. Rows with
 * fewer than two cells are skipped. The returned records carry no section;
 * the navigator assigns it.
 */
export function extractPage(html: string, markers: StatusMarkers = DEFAULT_MARKERS): StudentAttendanceRecord[] {
  const $ = cheerio.load(html);
  const dateColumns = new Map<string, number>();

  $('thead th').each((index, el) => {
    const headerText = $(el).text().trim();
    if (DATE_HEADER.test(headerText)) {
      dateColumns.set(headerText, index);
    }
  });

  const records: StudentAttendanceRecord[] = [];

  $('tbody tr').each((_, row) => {
    const cells = $(row).find('td');
    if (cells.length < 2) return;

    const attendanceByDate: Record<string, AttendanceStatus> = {};
    for (const [date, columnIndex] of dateColumns) {
      const cell = cells.eq(columnIndex);
      if (cell.length === 0) continue;
      attendanceByDate[date] = classify({
        hasCheck: cell.find(markers.check).length > 0,
        hasCross: cell.find(markers.cross).length > 0,
        text: cell.text(),
      });
    }

    records.push({
      rollNo: cells.eq(0).text().trim(),
      studentName: cells.eq(1).text().trim(),
      attendanceByDate,
    });
  });

  return records;
}
