// src/lib/pipeline.ts
import { collectSubjects } from './navigator';
import { publishAll } from './publisher';
import type { AppConfig } from './config';
import type { AutomationDriver, PublishResult, StoreClient, SubjectAggregate, TraversalSpec } from '../types';

export interface PipelineDeps {
  driver: AutomationDriver;
  store: StoreClient;
  traversal: TraversalSpec;
}

/**
 * Scrapes every course reachable through the traversal. On failure the
 * traversal stops, a screenshot is taken, and whatever was collected is
 * returned. The browser is always closed.
 */
export async function runScraper(config: AppConfig, driver: AutomationDriver, traversal: TraversalSpec): Promise<SubjectAggregate> {
  const aggregate: SubjectAggregate = new Map();

  try {
    await driver.open(config.attendanceUrl);
    await collectSubjects(
      driver,
      traversal,
      {
        settleTimeoutMs: config.settleTimeoutMs,
        tableTimeoutMs: config.tableTimeoutMs,
        maxPages: config.maxPages,
      },
      aggregate
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`\n>>> AN ERROR OCCURRED: ${message}`);
    try {
      await driver.screenshot(config.screenshotPath);
      console.error(`>>> Screenshot saved to ${config.screenshotPath}`);
    } catch (screenshotError) {
      console.error('>>> Screenshot could not be saved:', screenshotError);
    }
  } finally {
    await driver.close();
  }

  return aggregate;
}

export async function runPipeline(config: AppConfig, deps: PipelineDeps): Promise<PublishResult[]> {
  console.log('\n--- Starting Scraper and Upload Process ---');
  const startTime = Date.now();

  const aggregate = await runScraper(config, deps.driver, deps.traversal);

  let results: PublishResult[] = [];
  if (aggregate.size === 0) {
    console.warn('No data was scraped, skipping upload.');
  } else {
    results = await publishAll(deps.store, aggregate, { schemaSettleMs: config.schemaSettleMs });
  }

  const elapsed = (Date.now() - startTime) / 1000;
  console.log(`\n--- Process complete! Total time: ${elapsed.toFixed(2)}s ---`);
  return results;
}
