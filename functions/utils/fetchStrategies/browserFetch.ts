import { mkdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { chromium, type Browser, type BrowserContext, type Download, type Page } from 'playwright-core';

import { FetchError, errorMessage } from '../errors.js';
import type { FetchRequest, FetchStrategy, FetchedFile } from '../fileFetcher.js';
import { buildLocalFileName } from '../folderPathBuilders.js';
import type { Credentials } from '../types.js';

const USERNAME_SELECTORS = [
  'input[type="email"]',
  'input[name*="email" i]',
  'input[id*="email" i]',
  'input[name="username"]',
  'input[id="username"]',
  'input[name*="user" i]',
  'input[id*="user" i]',
  'input[type="text"]',
];

const PASSWORD_SELECTOR = 'input[type="password"]';

const SUBMIT_SELECTORS = [
  'button[type="submit"]',
  'input[type="submit"]',
  'button:has-text("Sign in")',
  'button:has-text("Log in")',
  'button:has-text("Login")',
  'button:has-text("Continue")',
  'button:has-text("Next")',
];

const DOWNLOAD_SELECTORS = [
  'a[download]',
  'button:has-text("Download")',
  'a:has-text("Download")',
  '[aria-label*="download" i]',
  '[title*="download" i]',
];

const ACTION_TIMEOUT_MS = 15_000;

export type BrowserHandle = Pick<Browser, 'newContext' | 'isConnected' | 'close'>;

export interface BrowserFetchOptions {
  timeoutMs: number;
  headless: boolean;
  executablePath?: string;
  launchBrowser?: () => Promise<BrowserHandle>;
}

type DownloadWait = { ok: true; download: Download } | { ok: false; error: unknown };

async function firstVisible(page: Page, selectors: readonly string[]) {
  for (const selector of selectors) {
    const locator = page.locator(selector).first();
    if ((await locator.count()) > 0 && (await locator.isVisible())) {
      return locator;
    }
  }
  return null;
}

/**
 * Fills a login form on the current page when one is present.
 * Returns false when the page has no password field.
 */
async function performLogin(page: Page, credentials: Credentials): Promise<boolean> {
  const passwordField = page.locator(PASSWORD_SELECTOR).first();
  if ((await passwordField.count()) === 0) return false;

  const usernameField = await firstVisible(page, USERNAME_SELECTORS);
  if (usernameField && credentials.username) {
    await usernameField.fill(credentials.username);
  }
  await passwordField.fill(credentials.password);

  const submit = await firstVisible(page, SUBMIT_SELECTORS);
  if (submit) {
    await submit.click();
  } else {
    await passwordField.press('Enter');
  }
  await page.waitForLoadState('domcontentloaded');
  console.log(`[BrowserFetch] Submitted login form as ${credentials.username || '(no username)'}`);
  return true;
}

/**
 * Navigation to a URL that serves a file aborts with "Download is starting";
 * the download event still fires, so that error is not a failure.
 */
async function navigate(page: Page, url: string): Promise<void> {
  try {
    await page.goto(url, { waitUntil: 'domcontentloaded' });
  } catch (error) {
    if (!/download is starting/i.test(errorMessage(error))) throw error;
  }
}

/**
 * Browser-session retrieval for links that need JavaScript, cookies or a login.
 * Every attempt runs in its own browser context so no cookies leak between
 * links or cases.
 */
export class BrowserFetchStrategy implements FetchStrategy {
  readonly name = 'browser' as const;
  private readonly options: BrowserFetchOptions;
  private browser: Promise<BrowserHandle> | null = null;

  constructor(options: BrowserFetchOptions) {
    this.options = options;
  }

  private launch(): Promise<BrowserHandle> {
    const launch: () => Promise<BrowserHandle> = this.options.launchBrowser
      ?? (() => chromium.launch({ headless: this.options.headless, executablePath: this.options.executablePath }));
    // A failed launch is retried on the next attempt
    const pending: Promise<BrowserHandle> = launch().catch((error: unknown) => {
      if (this.browser === pending) this.browser = null;
      throw error;
    });
    this.browser = pending;
    return pending;
  }

  private async getBrowser(): Promise<BrowserHandle> {
    if (!this.browser) return this.launch();
    const browser = await this.browser;
    if (browser.isConnected()) return browser;
    console.warn('[BrowserFetch] 🔄 Browser disconnected, relaunching');
    return this.launch();
  }

  async attempt(request: FetchRequest): Promise<FetchedFile> {
    let browser: BrowserHandle;
    try {
      browser = await this.getBrowser();
    } catch (error) {
      throw new FetchError('browser', `Browser launch failed: ${errorMessage(error)}`, { cause: error });
    }

    let context: BrowserContext;
    try {
      context = await browser.newContext({ acceptDownloads: true });
    } catch (error) {
      throw new FetchError('browser', `Browser context failed: ${errorMessage(error)}`, { cause: error });
    }
    try {
      const page = await context.newPage();
      page.setDefaultTimeout(Math.min(ACTION_TIMEOUT_MS, this.options.timeoutMs));
      page.setDefaultNavigationTimeout(this.options.timeoutMs);

      const download = await this.captureDownload(page, request);
      const failure = await download.failure();
      if (failure) {
        throw new FetchError('browser', `Download failed: ${failure}`);
      }

      await mkdir(request.destinationDir, { recursive: true });
      const localPath = join(request.destinationDir, buildLocalFileName(request.filePrefix, download.suggestedFilename()));
      await download.saveAs(localPath);

      const { size } = await stat(localPath);
      if (size === 0) {
        await rm(localPath, { force: true });
        throw new FetchError('empty_body', 'Downloaded file is empty');
      }
      return { localPath, bytes: size };
    } finally {
      await context.close();
    }
  }

  private async captureDownload(page: Page, request: FetchRequest): Promise<Download> {
    const state = { started: false };
    page.on('download', () => {
      state.started = true;
    });
    const waitForDownload: Promise<DownloadWait> = page
      .waitForEvent('download', { timeout: this.options.timeoutMs })
      .then(
        (download): DownloadWait => ({ ok: true, download }),
        (error: unknown): DownloadWait => ({ ok: false, error }),
      );

    await navigate(page, request.url);

    if (!state.started && request.credentials && (await performLogin(page, request.credentials))) {
      // Login pages usually land somewhere else; go back to the file
      if (!state.started) await navigate(page, request.url);
    }

    if (!state.started) {
      const control = await firstVisible(page, DOWNLOAD_SELECTORS);
      if (control) {
        console.log('[BrowserFetch] Clicking download control');
        await control.click();
      }
    }

    const result = await waitForDownload;
    if (!result.ok) {
      const message = errorMessage(result.error);
      const reason = /timeout/i.test(message) ? 'timeout' : 'browser';
      throw new FetchError(reason, `No download was triggered: ${message}`, { cause: result.error });
    }
    return result.download;
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const pending = this.browser;
    this.browser = null;
    await (await pending).close();
  }
}
