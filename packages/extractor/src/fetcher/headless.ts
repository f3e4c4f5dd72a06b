// Playwright browser fetcher shared by the browser strategies
import { chromium, type Browser, type BrowserContext, type BrowserContextOptions } from 'playwright-core';
import { chromium as stealthChromium } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { browserLogger } from '../utils/logger';
import { classifyTransportError } from './http';
import { rawFailure, rawSuccess, type RawResult } from './types';

export type BrowserFlavor = 'plain' | 'stealth';

export interface HeadlessFetchOptions {
  url: string;
  userAgent: string;
  flavor: BrowserFlavor;
  timeoutMs: number;
  /** Seconds to poll while the page still looks like a challenge */
  maxChallengeWaitSeconds: number;
  isChallenge: (html: string) => boolean;
  proxyUrl?: string;
  signal?: AbortSignal;
}

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-blink-features=AutomationControlled',
  '--window-size=1920,1080',
];

const NETWORK_IDLE_TIMEOUT_MS = 5000;

let stealthPluginApplied = false;

async function launchBrowser(flavor: BrowserFlavor): Promise<Browser> {
  if (flavor === 'plain') {
    return chromium.launch({ headless: true, args: LAUNCH_ARGS });
  }

  if (!stealthPluginApplied) {
    stealthChromium.use(StealthPlugin());
    stealthPluginApplied = true;
  }
  return stealthChromium.launch({ headless: true, args: LAUNCH_ARGS });
}

/**
 * Keeps one long-lived browser process per flavor. Every fetch gets its own
 * context (cookies, storage) which is always closed afterwards.
 */
export class BrowserPool {
  private launches = new Map<BrowserFlavor, Promise<Browser>>();
  private isShuttingDown = false;

  /**
   * Get the shared browser for a flavor, relaunching it if it disconnected
   */
  async getBrowser(flavor: BrowserFlavor): Promise<Browser> {
    if (this.isShuttingDown) {
      throw new Error('BrowserPool is shutting down');
    }

    const pending = this.launches.get(flavor);
    if (pending) {
      const browser = await pending;
      if (browser.isConnected()) {
        return browser;
      }
      browserLogger.warn(`${flavor} browser disconnected, relaunching`);
      this.launches.delete(flavor);
    }

    // Concurrent callers share the same launch promise
    const launch = launchBrowser(flavor);
    this.launches.set(flavor, launch);
    try {
      const browser = await launch;
      browserLogger.info(`Launched ${flavor} browser`);
      return browser;
    } catch (error) {
      this.launches.delete(flavor);
      throw error;
    }
  }

  /**
   * Close all browsers. Launch failures are ignored, close failures are logged.
   */
  async shutdown(): Promise<void> {
    this.isShuttingDown = true;
    const launches = [...this.launches.entries()];
    this.launches.clear();

    await Promise.all(
      launches.map(async ([flavor, launch]) => {
        let browser: Browser;
        try {
          browser = await launch;
        } catch {
          return;
        }
        try {
          await browser.close();
        } catch (err) {
          browserLogger.error(`Error closing ${flavor} browser`, err);
        }
      }),
    );
    browserLogger.info('Browser pool shut down');
  }
}

/**
 * Append a `_cb` query parameter so intermediaries never answer from their cache
 */
export function withCacheBuster(url: string, now: number = Date.now(), random: number = Math.random()): string {
  const busted = new URL(url);
  busted.searchParams.set('_cb', `${now}${1000 + Math.floor(random * 9000)}`);
  return busted.toString();
}

/**
 * Remove the `_cb` parameter added by withCacheBuster
 */
export function withoutCacheBuster(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (!parsed.searchParams.has('_cb')) return url;
  parsed.searchParams.delete('_cb');
  return parsed.toString();
}

/**
 * Split a proxy URL into Playwright's proxy settings
 */
export function toPlaywrightProxy(proxyUrl: string): NonNullable<BrowserContextOptions['proxy']> {
  const parsed = new URL(proxyUrl);
  const server = `${parsed.protocol}//${parsed.host}`;
  if (!parsed.username) {
    return { server };
  }
  return {
    server,
    username: decodeURIComponent(parsed.username),
    password: decodeURIComponent(parsed.password),
  };
}

/**
 * Fetch a URL in an isolated context of the shared browser
 */
export async function fetchHeadless(pool: BrowserPool, options: HeadlessFetchOptions): Promise<RawResult> {
  const startTime = Date.now();
  let browser: Browser;
  try {
    browser = await pool.getBrowser(options.flavor);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    return rawFailure(`Browser unavailable: ${err.message}`, 'PROVIDER_ERROR', startTime);
  }

  let context: BrowserContext | null = null;
  const closeOnAbort = () => {
    context?.close().catch(err => browserLogger.warn(`Error closing aborted context: ${String(err)}`));
  };
  options.signal?.addEventListener('abort', closeOnAbort, { once: true });

  try {
    context = await browser.newContext({
      userAgent: options.userAgent,
      viewport: { width: 1920, height: 1080 },
      locale: 'en-US',
      timezoneId: 'America/New_York',
      extraHTTPHeaders: {
        'Cache-Control': 'no-cache, no-store, must-revalidate',
        Pragma: 'no-cache',
        Expires: '0',
      },
      ...(options.proxyUrl ? { proxy: toPlaywrightProxy(options.proxyUrl) } : {}),
    });
    if (options.signal?.aborted) {
      return rawFailure('Aborted before navigation', 'FETCH_TIMEOUT', startTime);
    }

    const page = await context.newPage();
    const response = await page.goto(withCacheBuster(options.url), {
      waitUntil: 'domcontentloaded',
      timeout: options.timeoutMs,
    });

    if (!response) {
      return rawFailure('No response', 'FETCH_CONNECTION', startTime);
    }
    const status = response.status();

    let html = await page.content();
    if (options.isChallenge(html)) {
      browserLogger.debug(`Challenge detected on ${options.url}, waiting up to ${options.maxChallengeWaitSeconds}s`);
      for (let i = 0; i < options.maxChallengeWaitSeconds; i++) {
        await page.waitForTimeout(1000);
        html = await page.content();
        if (!options.isChallenge(html)) break;
      }

      if (options.isChallenge(html)) {
        return rawFailure('Challenge not resolved', 'BLOCK_CHALLENGE_PAGE', startTime, status);
      }
    }

    try {
      await page.waitForLoadState('networkidle', { timeout: NETWORK_IDLE_TIMEOUT_MS });
      html = await page.content();
    } catch (err) {
      browserLogger.debug(`networkidle not reached for ${options.url}: ${String(err)}`);
    }

    return rawSuccess(html, status, withoutCacheBuster(page.url()), startTime);
  } catch (error) {
    // The abort handler closed the context under a pending navigation
    if (options.signal?.aborted) {
      return rawFailure('Navigation aborted', 'FETCH_TIMEOUT', startTime);
    }
    const { errorCode, error: message } = classifyTransportError(error);
    return rawFailure(message, errorCode, startTime);
  } finally {
    options.signal?.removeEventListener('abort', closeOnAbort);
    // ALWAYS close context
    if (context) {
      try {
        await context.close();
      } catch (err) {
        browserLogger.error('Error closing context', err);
      }
    }
  }
}
