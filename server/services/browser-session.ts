import { chromium, errors, type Browser } from 'playwright-core';
import { SessionCreationError } from '../errors';
import { log } from '../log';
import type { EgressIdentity, ProxyDirectory } from './proxy-manager';
import { rotateUserAgent } from './scraper-utils';

/**
 * The slice of a browser page the acquisition worker needs.
 */
export interface PageDriver {
  goto(url: string, timeoutMs: number): Promise<void>;
  content(): Promise<string>;
  /** Resolves false when the selector does not appear in time. */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
}

export interface BrowserHandle {
  page: PageDriver;
  close(): Promise<void>;
}

export interface LaunchOptions {
  identity: EgressIdentity;
  userAgent: string;
  executablePath?: string;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<BrowserHandle>;

export interface Session {
  readonly id: number;
  readonly egressIdentity: EgressIdentity;
  readonly browserHandle: BrowserHandle;
}

const BLOCKED_RESOURCE_TYPES = new Set(['image', 'media', 'font']);

export const launchChromium: BrowserLauncher = async ({ identity, userAgent, executablePath }) => {
  const browser: Browser = await chromium.launch({
    headless: true,
    executablePath,
    proxy: {
      server: `http://${identity.host}:${identity.port}`,
      username: identity.username,
      password: identity.password,
    },
    args: [
      '--no-sandbox',
      '--disable-dev-shm-usage',
      '--disable-gpu',
      '--disable-blink-features=AutomationControlled',
    ],
  });

  try {
    const context = await browser.newContext({
      userAgent,
      viewport: { width: 1366, height: 768 },
      locale: 'en-US',
      extraHTTPHeaders: { DNT: '1' },
    });
    await context.addInitScript(() => {
      Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
    });
    await context.route('**/*', route =>
      BLOCKED_RESOURCE_TYPES.has(route.request().resourceType()) ? route.abort() : route.continue()
    );
    const page = await context.newPage();

    return {
      page: {
        goto: async (url, timeoutMs) => {
          await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
        },
        content: () => page.content(),
        waitForSelector: async (selector, timeoutMs) => {
          try {
            await page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
            return true;
          } catch (error) {
            if (error instanceof errors.TimeoutError) return false;
            throw error;
          }
        },
      },
      close: () => browser.close(),
    };
  } catch (error) {
    await browser.close().catch(() => undefined);
    throw error;
  }
};

export interface SessionManagerOptions {
  executablePath?: string;
  userAgent?: () => string;
}

/**
 * Hands out browser sessions bound to one egress identity each.
 * Sessions are values: callers keep them and pass them back to reset/release.
 */
export class SessionManager {
  private created = 0;
  private resets = 0;

  constructor(
    private readonly directory: ProxyDirectory,
    private readonly launcher: BrowserLauncher = launchChromium,
    private readonly options: SessionManagerOptions = {},
  ) {}

  async acquire(): Promise<Session> {
    let identity: EgressIdentity;
    try {
      identity = await this.directory.pickIdentity();
    } catch (error) {
      throw new SessionCreationError('No egress identity available', { cause: error });
    }

    const userAgent = (this.options.userAgent ?? rotateUserAgent)();
    let browserHandle: BrowserHandle;
    try {
      browserHandle = await this.launcher({ identity, userAgent, executablePath: this.options.executablePath });
    } catch (error) {
      throw new SessionCreationError('Browser process failed to start', { cause: error });
    }

    this.created++;
    log(`Session #${this.created} ready via ${identity.host}:${identity.port}`, 'SESSION');
    return { id: this.created, egressIdentity: identity, browserHandle };
  }

  async reset(session: Session): Promise<Session> {
    this.resets++;
    log(`Resetting session #${session.id}`, 'SESSION');
    await this.release(session);
    return this.acquire();
  }

  /** Best-effort close; close failures are ignored. */
  async release(session: Session): Promise<void> {
    try {
      await session.browserHandle.close();
    } catch {
      log(`Session #${session.id} close failed, ignoring`, 'SESSION');
    }
  }

  getStats(): { created: number; resets: number } {
    return { created: this.created, resets: this.resets };
  }
}
