// src/lib/navigator.ts
import { collectCourse } from './pager';
import type { AutomationDriver, SubjectAggregate, TraversalSpec } from '../types';

export interface NavigatorOptions {
  settleTimeoutMs: number;
  tableTimeoutMs: number;
  maxPages: number;
}

/**
 * "Operating Systems (CS301)" -> "Operating Systems"
 */
export function subjectName(courseLabel: string): string {
  return courseLabel.replace(/\s*\([^()]*\)\s*$/, '').trim();
}

// A slow settle is not fatal; the next step decides whether the view is usable.
async function settle(driver: AutomationDriver, timeoutMs: number, after: string): Promise<void> {
  try {
    await driver.waitForQuiescence(timeoutMs);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`    -> View did not settle after ${after}, continuing: ${message}`);
  }
}

/**
 * Walks section -> attendance type -> course as laid out in the traversal
 * file and collects every course's records under its subject name.
 *
 * Records are appended to `aggregate` as each course finishes, so whatever
 * was collected survives if a later step throws.
 */
export async function collectSubjects(
  driver: AutomationDriver,
  traversal: TraversalSpec,
  options: NavigatorOptions,
  aggregate: SubjectAggregate = new Map()
): Promise<SubjectAggregate> {
  console.log('>>> Applying filters...');
  for (const filter of traversal.filters) {
    await driver.selectOption(filter.label, filter.option);
  }
  await settle(driver, options.settleTimeoutMs, 'filters');

  const pagerOptions = {
    nextSelector: traversal.pagination.next,
    previousSelector: traversal.pagination.previous,
    rowSelector: traversal.pagination.rows,
    settleTimeoutMs: options.settleTimeoutMs,
    tableTimeoutMs: options.tableTimeoutMs,
    maxPages: options.maxPages,
    markers: traversal.markers,
  };

  for (const section of traversal.section.choices) {
    console.log(`\n======= PROCESSING SECTION: ${section.name} =======`);
    await driver.selectOption(traversal.section.label, section.option);
    await settle(driver, options.settleTimeoutMs, section.name);

    for (const attendanceType of traversal.attendanceType.choices) {
      console.log(`\n  --- Processing Type: ${attendanceType} ---`);
      await driver.selectOption(traversal.attendanceType.label, attendanceType);
      await settle(driver, options.settleTimeoutMs, attendanceType);

      const courses = await driver.listOptions(
        traversal.course.label,
        traversal.course.listbox,
        traversal.course.exclude
      );
      await driver.closeDropdown();

      for (const course of courses) {
        const subject = subjectName(course);
        console.log(`\n    -> Scraping Course: ${course}`);
        await driver.selectOption(traversal.course.label, course);
        await settle(driver, options.settleTimeoutMs, course);

        const courseRecords = await collectCourse(driver, pagerOptions);
        const tagged = courseRecords.map((record) => ({ ...record, section: section.name }));

        const existing = aggregate.get(subject);
        if (existing) {
          existing.push(...tagged);
        } else {
          aggregate.set(subject, tagged);
        }
        console.log(`    -> ${tagged.length} records collected for '${subject}'.`);
      }
    }
  }

  return aggregate;
}
