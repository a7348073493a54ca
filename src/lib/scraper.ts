// src/lib/scraper.ts
import fs from 'fs';
import puppeteer, { type Browser, type ElementHandle, type Page } from 'puppeteer-core';
import type { AutomationDriver, Control } from '../types';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const CHROMIUM_PATHS = [
  '/usr/bin/chromium',
  '/usr/bin/chromium-browser',
  '/usr/bin/google-chrome',
  '/usr/bin/google-chrome-stable',
];

const MAX_RETRIES = 3;

// Dropdown triggers and listbox lookups.
const DROPDOWN_TIMEOUT_MS = 30000;
const LISTBOX_TIMEOUT_MS = 15000;
const DEFAULT_TIMEOUT_MS = 60000;

export interface ScraperOptions {
  headless: boolean;
  executablePath?: string;
  navigationTimeoutMs: number;
}

const delay = (ms: number) => new Promise((res) => setTimeout(res, ms));

function resolveExecutablePath(configured?: string): string {
  if (configured) return configured;
  const found = CHROMIUM_PATHS.find((p) => fs.existsSync(p));
  if (!found) {
    throw new Error('No Chromium found. Set CHROME_EXECUTABLE_PATH to a Chromium or Chrome binary.');
  }
  return found;
}

function xpathString(value: string): string {
  if (!value.includes('"')) return `"${value}"`;
  if (!value.includes("'")) return `'${value}'`;
  return `concat("${value.split('"').join(`", '"', "`)}")`;
}

function dropdownSelector(label: string): string {
  return `::-p-xpath(//label[contains(normalize-space(.), ${xpathString(label)})]/following-sibling::button[1])`;
}

function optionSelector(option: string): string {
  return `::-p-aria([name=${JSON.stringify(option)}][role="option"])`;
}

class HandleControl implements Control {
  constructor(private readonly handle: ElementHandle<Element>) {}

  async click(): Promise<void> {
    await this.handle.click();
  }

  async isEnabled(): Promise<boolean> {
    return this.handle.evaluate(
      (el) => !el.hasAttribute('disabled') && el.getAttribute('aria-disabled') !== 'true'
    );
  }
}

/**
 * Automation driver backed by a single Chromium page.
 */
export class PuppeteerDriver implements AutomationDriver {
  private browser: Browser | null = null;
  private page: Page | null = null;

  constructor(private readonly options: ScraperOptions) {}

  private requirePage(): Page {
    if (!this.page) throw new Error('Browser page is not open.');
    return this.page;
  }

  private async launch(): Promise<Page> {
    console.log('>>> Launching browser...');
    this.browser = await puppeteer.launch({
      headless: this.options.headless,
      executablePath: resolveExecutablePath(this.options.executablePath),
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
    });
    const page = await this.browser.newPage();
    await page.setUserAgent(USER_AGENT);
    page.setDefaultTimeout(DEFAULT_TIMEOUT_MS);
    this.page = page;
    return page;
  }

  async open(url: string): Promise<void> {
    const page = this.page ?? (await this.launch());

    for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
      try {
        console.log(`>>> Navigating to ${url}`);
        await page.goto(url, { waitUntil: 'networkidle2', timeout: this.options.navigationTimeoutMs });
        return;
      } catch (error) {
        if (attempt === MAX_RETRIES) throw error;
        const delayTime = Math.pow(2, attempt) * 1000;
        console.warn(
          `Page load failed (attempt ${attempt}/${MAX_RETRIES}). Retrying in ${delayTime / 1000}s.`
        );
        await delay(delayTime);
      }
    }
  }

  async locate(selector: string): Promise<Control | null> {
    const handle = await this.requirePage().$(selector);
    return handle ? new HandleControl(handle) : null;
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.requirePage().waitForSelector(selector, { timeout: timeoutMs });
  }

  async waitForQuiescence(timeoutMs: number): Promise<void> {
    await this.requirePage().waitForNetworkIdle({ timeout: timeoutMs });
  }

  async pageContent(): Promise<string> {
    return this.requirePage().content();
  }

  async selectOption(label: string, option: string): Promise<void> {
    const page = this.requirePage();
    const trigger = await page.waitForSelector(dropdownSelector(label), {
      visible: true,
      timeout: DROPDOWN_TIMEOUT_MS,
    });
    if (!trigger) throw new Error(`Dropdown '${label}' not found.`);
    await trigger.click();

    const choice = await page.waitForSelector(optionSelector(option), { timeout: DROPDOWN_TIMEOUT_MS });
    if (!choice) throw new Error(`Option '${option}' not found in '${label}'.`);
    await choice.click();
  }

  async listOptions(label: string, listboxSelector: string, exclude: string[]): Promise<string[]> {
    const page = this.requirePage();
    const trigger = await page.waitForSelector(dropdownSelector(label), {
      visible: true,
      timeout: DROPDOWN_TIMEOUT_MS,
    });
    if (!trigger) throw new Error(`Dropdown '${label}' not found.`);
    await trigger.click();

    await page.waitForSelector(listboxSelector, { visible: true, timeout: LISTBOX_TIMEOUT_MS });
    const names = await page.$$eval(`${listboxSelector} [role="option"]`, (items) =>
      items.map((item) => (item instanceof HTMLElement ? item.innerText : item.textContent ?? '').trim())
    );
    return names.filter((name) => name.length > 0 && !exclude.some((skip) => name.includes(skip)));
  }

  async closeDropdown(): Promise<void> {
    await this.requirePage().keyboard.press('Escape');
  }

  async screenshot(path: string): Promise<void> {
    const data = await this.requirePage().screenshot({ type: 'png', fullPage: true });
    await fs.promises.writeFile(path, data);
  }

  async close(): Promise<void> {
    if (this.browser) {
      console.log('\n>>> Closing browser.');
      await this.browser.close();
      this.browser = null;
      this.page = null;
    }
  }
}
