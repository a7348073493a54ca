import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError } from '../errors';
import { loadConfig, loadTraversal, parseTraversal } from '../config';

const baseEnv = {
  ATTENDANCE_URL: 'http://localhost:3535/attendance',
  SUPABASE_URL: 'https://example.supabase.test',
  SUPABASE_KEY: 'test-secret',
};

describe('loadConfig', () => {
  test('applies defaults to optional settings', () => {
    expect(loadConfig(baseEnv)).toEqual({
      attendanceUrl: 'http://localhost:3535/attendance',
      headless: true,
      executablePath: undefined,
      store: { url: 'https://example.supabase.test', key: 'test-secret' },
      traversalFile: 'config/traversal.json',
      maxPages: 200,
      screenshotPath: 'scraper_error.png',
      navigationTimeoutMs: 90000,
      settleTimeoutMs: 30000,
      tableTimeoutMs: 20000,
      schemaSettleMs: 5000,
    });
  });

  test('reads flags and numbers from strings', () => {
    const config = loadConfig({ ...baseEnv, HEADLESS: 'false', MAX_PAGES: '12', SCHEMA_SETTLE_MS: '0' });

    expect(config.headless).toBe(false);
    expect(config.maxPages).toBe(12);
    expect(config.schemaSettleMs).toBe(0);
  });

  test('names every missing credential', () => {
    expect(() => loadConfig({ ATTENDANCE_URL: baseEnv.ATTENDANCE_URL })).toThrow(ConfigError);
    try {
      loadConfig({ ATTENDANCE_URL: baseEnv.ATTENDANCE_URL });
    } catch (error) {
      expect(error instanceof ConfigError ? error.issues.map((issue) => issue.split(':')[0]) : []).toEqual([
        'SUPABASE_URL',
        'SUPABASE_KEY',
      ]);
    }
  });

  test('rejects a non-positive page bound', () => {
    expect(() => loadConfig({ ...baseEnv, MAX_PAGES: '0' })).toThrow(/MAX_PAGES/);
  });
});

describe('parseTraversal', () => {
  const minimal = {
    filters: [{ label: 'Select Department', option: 'Computer Science and Engineering' }],
    section: { label: 'Select Section', choices: [{ option: 'Section Section A', name: 'Section A' }] },
    attendanceType: { label: 'Select Attendance Type', choices: ['Labs'] },
    course: { label: 'Select Course' },
  };

  test('fills in listbox, pagination and marker defaults', () => {
    const traversal = parseTraversal(minimal);

    expect(traversal.course).toEqual({ label: 'Select Course', listbox: 'div[role="listbox"]', exclude: [] });
    expect(traversal.pagination.rows).toBe('table > tbody > tr:first-child');
    expect(traversal.markers).toEqual({ check: 'svg.lucide-check', cross: 'svg.lucide-x' });
  });

  test('requires at least one section', () => {
    expect(() => parseTraversal({ ...minimal, section: { label: 'Select Section', choices: [] } })).toThrow(
      /section\.choices/
    );
  });
});

describe('loadTraversal', () => {
  test('loads the bundled traversal file', () => {
    const traversal = loadTraversal(path.join(__dirname, '../../../config/traversal.json'));

    expect(traversal.section.choices.map((choice) => choice.name)).toEqual(['Section A', 'Section B', 'Section C']);
    expect(traversal.course.exclude).toEqual(['Overall Attendance']);
  });

  test('reports unreadable JSON as a config error', () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'traversal-')), 'broken.json');
    fs.writeFileSync(file, '{ "filters": ');

    expect(() => loadTraversal(file)).toThrow(ConfigError);
  });
});
