// src/lib/pager.ts
import { extractPage, DEFAULT_MARKERS } from './extractor';
import type { AutomationDriver, StatusMarkers, StudentAttendanceRecord } from '../types';

export interface PagerOptions {
  nextSelector: string;
  previousSelector: string;
  rowSelector: string;
  settleTimeoutMs: number;
  tableTimeoutMs: number;
  maxPages: number;
  markers?: StatusMarkers;
}

/**
 * Clicks the control and waits for the view to settle. Returns false when
 * the control is missing, disabled, or anything on the way fails; callers
 * treat that as the end of the table.
 */
async function advance(driver: AutomationDriver, selector: string, settleTimeoutMs: number): Promise<boolean> {
  try {
    const control = await driver.locate(selector);
    if (!control || !(await control.isEnabled())) return false;
    await control.click();
    await driver.waitForQuiescence(settleTimeoutMs);
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.log(`      -> Navigation stopped at "${selector}": ${message}`);
    return false;
  }
}

async function extractCurrentPage(driver: AutomationDriver, options: PagerOptions): Promise<StudentAttendanceRecord[]> {
  try {
    await driver.waitForSelector(options.rowSelector, options.tableTimeoutMs);
  } catch {
    // The page may still be usable; extraction decides.
    console.warn('      -> Timed out waiting for table content on backward pass.');
  }

  try {
    const html = await driver.pageContent();
    return extractPage(html, options.markers ?? DEFAULT_MARKERS);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`      -> Could not read this page, continuing without it: ${message}`);
    return [];
  }
}

/**
 * Walks every page of the selected course exactly once.
 *
 * The view lands on an arbitrary page, so the pager first seeks to the last
 * page without extracting (SeekEnd) and then extracts while stepping back to
 * the first page (WalkBack). Each phase stops after `maxPages` steps even if
 * the controls never report disabled.
 */
export async function collectCourse(driver: AutomationDriver, options: PagerOptions): Promise<StudentAttendanceRecord[]> {
  const records: StudentAttendanceRecord[] = [];

  console.log('      -> Navigating to the last page of records...');
  let forwardSteps = 0;
  while (true) {
    if (forwardSteps >= options.maxPages) {
      console.warn(`      -> Gave up seeking the last page after ${options.maxPages} steps.`);
      break;
    }
    if (!(await advance(driver, options.nextSelector, options.settleTimeoutMs))) {
      console.log('      -> Reached the last page.');
      break;
    }
    forwardSteps++;
  }

  let pageNum = 0;
  while (true) {
    pageNum++;
    console.log(`      -> Scraping backwards, page set ${pageNum}...`);
    records.push(...(await extractCurrentPage(driver, options)));

    if (pageNum >= options.maxPages) {
      console.warn(`      -> Stopped walking back after ${options.maxPages} pages.`);
      break;
    }
    if (!(await advance(driver, options.previousSelector, options.settleTimeoutMs))) {
      console.log('      -> Reached the first page. Scraping complete for this course.');
      break;
    }
  }

  return records;
}
