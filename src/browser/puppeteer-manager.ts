import puppeteer, { Browser, Page } from 'puppeteer-core';
import { logger } from '../utils/logger';
import { BROWSER_CANDIDATES, LaunchTarget, resolveLaunchTargets } from './browser-candidates';

export type LaunchConfig = NonNullable<Parameters<typeof puppeteer.launch>[0]>;

export type BrowserLauncher = (options: LaunchConfig) => Promise<Browser>;

export interface PuppeteerManagerOptions {
  headless?: boolean;
  pageLoadTimeoutMs?: number;
  // Defaults to discovering installed browsers
  targets?: LaunchTarget[];
  launcher?: BrowserLauncher;
}

const CHROME_ARGS = [
  '--no-first-run',
  '--no-default-browser-check',
  '--disable-extensions',
  '--disable-dev-shm-usage',
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-renderer-backgrounding'
];

export function buildLaunchConfig(target: LaunchTarget, headless: boolean, timeoutMs: number): LaunchConfig {
  const config: LaunchConfig = {
    browser: target.product,
    headless,
    timeout: timeoutMs,
    defaultViewport: null
  };

  if (target.channel) {
    config.channel = target.channel;
  }
  if (target.executablePath) {
    config.executablePath = target.executablePath;
  }
  // Chromium switches mean nothing to Firefox
  if (target.product === 'chrome') {
    config.args = [...CHROME_ARGS, ...(headless ? [] : ['--start-maximized'])];
  }

  return config;
}

export class PuppeteerManager {
  private browser: Browser | null = null;
  private page: Page | null = null;
  private readonly headless: boolean;
  private readonly pageLoadTimeoutMs: number;
  private readonly targets: LaunchTarget[];
  private readonly launcher: BrowserLauncher;

  constructor(options: PuppeteerManagerOptions = {}) {
    this.headless = options.headless ?? false;
    this.pageLoadTimeoutMs = options.pageLoadTimeoutMs ?? 60000;
    this.targets = options.targets ?? resolveLaunchTargets(BROWSER_CANDIDATES);
    this.launcher = options.launcher ?? (config => puppeteer.launch(config));
  }

  async launch(): Promise<LaunchTarget> {
    if (this.targets.length === 0) {
      throw new Error('No supported browser was found on this machine (set BROWSER_EXECUTABLE_PATH to point at one)');
    }

    const failures: string[] = [];

    for (const target of this.targets) {
      const where = target.executablePath ?? `${target.channel} channel`;
      logger.debug(`Trying ${target.name} (${where})`);

      try {
        this.browser = await this.launcher(buildLaunchConfig(target, this.headless, this.pageLoadTimeoutMs));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn(`Could not launch ${target.name}: ${reason}`);
        failures.push(`${target.name}: ${reason}`);
        continue;
      }

      const pages = await this.browser.pages();
      this.page = pages[0] ?? await this.browser.newPage();
      this.page.setDefaultNavigationTimeout(this.pageLoadTimeoutMs);
      this.page.setDefaultTimeout(this.pageLoadTimeoutMs);

      logger.info(`Launched ${target.name}${this.headless ? ' (headless)' : ''}`);
      return target;
    }

    throw new Error(`Every browser failed to launch:\n  ${failures.join('\n  ')}`);
  }

  async navigateToPage(url: string): Promise<boolean> {
    const page = this.getPage();

    try {
      await page.goto(url, { waitUntil: 'networkidle2', timeout: this.pageLoadTimeoutMs });
      logger.debug(`Navigated to ${page.url()}`);
      return true;
    } catch (error) {
      logger.error(`Failed to navigate to ${url}:`, error);
      return false;
    }
  }

  currentUrl(): string {
    return this.getPage().url();
  }

  getPage(): Page {
    if (!this.page) {
      throw new Error('Browser not launched');
    }
    return this.page;
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      this.page = null;
    }
  }
}
