// src/lib/config.ts
import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_MARKERS } from './extractor';
import type { TraversalSpec } from '../types';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  ATTENDANCE_URL: z.string().url(),
  SUPABASE_URL: z.string().url(),
  SUPABASE_KEY: z.string().min(1),
  HEADLESS: booleanFlag,
  CHROME_EXECUTABLE_PATH: z.string().min(1).optional(),
  TRAVERSAL_FILE: z.string().min(1).default('config/traversal.json'),
  MAX_PAGES: positiveInt(200),
  SCREENSHOT_PATH: z.string().min(1).default('scraper_error.png'),
  NAVIGATION_TIMEOUT_MS: positiveInt(90000),
  SETTLE_TIMEOUT_MS: positiveInt(30000),
  TABLE_TIMEOUT_MS: positiveInt(20000),
  SCHEMA_SETTLE_MS: z.coerce.number().int().nonnegative().default(5000),
});

const traversalSchema = z.object({
  filters: z.array(z.object({ label: z.string().min(1), option: z.string().min(1) })),
  section: z.object({
    label: z.string().min(1),
    choices: z.array(z.object({ option: z.string().min(1), name: z.string().min(1) })).min(1),
  }),
  attendanceType: z.object({
    label: z.string().min(1),
    choices: z.array(z.string().min(1)).min(1),
  }),
  course: z.object({
    label: z.string().min(1),
    listbox: z.string().min(1).default('div[role="listbox"]'),
    exclude: z.array(z.string()).default([]),
  }),
  pagination: z
    .object({
      next: z.string().min(1),
      previous: z.string().min(1),
      rows: z.string().min(1),
    })
    .default({
      next: '::-p-aria([name="Next"][role="button"])',
      previous: '::-p-aria([name="Previous"][role="button"])',
      rows: 'table > tbody > tr:first-child',
    }),
  markers: z
    .object({ check: z.string().min(1), cross: z.string().min(1) })
    .default(DEFAULT_MARKERS),
});

export interface AppConfig {
  attendanceUrl: string;
  headless: boolean;
  executablePath?: string;
  store: {
    url: string;
    key: string;
  };
  traversalFile: string;
  maxPages: number;
  screenshotPath: string;
  navigationTimeoutMs: number;
  settleTimeoutMs: number;
  tableTimeoutMs: number;
  schemaSettleMs: number;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Builds the run configuration from an environment map. Nothing here reads
 * process.env; the CLI passes it in.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment', formatIssues(parsed.error));
  }

  const vars = parsed.data;
  return {
    attendanceUrl: vars.ATTENDANCE_URL,
    headless: vars.HEADLESS,
    executablePath: vars.CHROME_EXECUTABLE_PATH,
    store: { url: vars.SUPABASE_URL, key: vars.SUPABASE_KEY },
    traversalFile: vars.TRAVERSAL_FILE,
    maxPages: vars.MAX_PAGES,
    screenshotPath: vars.SCREENSHOT_PATH,
    navigationTimeoutMs: vars.NAVIGATION_TIMEOUT_MS,
    settleTimeoutMs: vars.SETTLE_TIMEOUT_MS,
    tableTimeoutMs: vars.TABLE_TIMEOUT_MS,
    schemaSettleMs: vars.SCHEMA_SETTLE_MS,
  };
}

export function parseTraversal(raw: unknown): TraversalSpec {
  const parsed = traversalSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid traversal specification', formatIssues(parsed.error));
  }
  return parsed.data;
}

export function loadTraversal(filePath: string): TraversalSpec {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read traversal file '${filePath}'`, [message]);
  }
  return parseTraversal(raw);
}
