import { chromium, type Browser } from 'playwright';
import type { BrowserEngine } from './browser-engine.js';

export interface PlaywrightPage {
  goto(url: string, options?: { waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit' }): Promise<unknown>;
  url(): string;
  title(): Promise<string>;
}

export class PlaywrightEngine implements BrowserEngine {
  constructor(private page: PlaywrightPage) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  async currentTitle(): Promise<string> {
    return this.page.title();
  }
}

export interface LaunchOptions {
  headless: boolean;
  browserWidth: number;
  browserHeight: number;
}

export interface LaunchedBrowser {
  engine: PlaywrightEngine;
  close(): Promise<void>;
}

/**
 * Launch headless chromium with one page sized to the configured viewport.
 * The caller owns the returned handle and closes it after the run.
 */
export async function launchBrowser(options: LaunchOptions): Promise<LaunchedBrowser> {
  const browser: Browser = await chromium.launch({
    headless: options.headless,
    args: ['--no-sandbox', '--disable-setuid-sandbox'],
  });
  try {
    const page = await browser.newPage({
      viewport: { width: options.browserWidth, height: options.browserHeight },
    });
    return {
      engine: new PlaywrightEngine(page),
      close: () => browser.close(),
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
}
