#!/usr/bin/env node
// src/cli.ts
import dotenv from 'dotenv';
import { loadConfig, loadTraversal } from './lib/config';
import { runPipeline } from './lib/pipeline';
import { PuppeteerDriver } from './lib/scraper';
import { PostgrestStore } from './lib/store';

dotenv.config();

async function main() {
  const config = loadConfig(process.env);
  const traversal = loadTraversal(config.traversalFile);

  const driver = new PuppeteerDriver({
    headless: config.headless,
    executablePath: config.executablePath,
    navigationTimeoutMs: config.navigationTimeoutMs,
  });
  const store = PostgrestStore.fromSettings(config.store);

  await runPipeline(config, { driver, store, traversal });
}

main().catch((error: unknown) => {
  const errorMessage = error instanceof Error ? error.message : 'Unknown error';
  console.error(`A critical error occurred: ${errorMessage}`);
  process.exitCode = 1;
});
