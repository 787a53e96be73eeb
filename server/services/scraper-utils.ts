/**
 * Shared Scraper Utilities
 * Delays, user-agent rotation, retry with backoff and proxied HTTP fetches.
 */

import { ProxyAgent, fetch as undiciFetch } from 'undici';

// ============================================
// DELAY & JITTER UTILITIES
// ============================================

export function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

export function withJitter(base = 800, jitter = 700): number {
  return base + Math.floor(Math.random() * jitter);
}

// ============================================
// USER-AGENT ROTATION
// ============================================

export const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
];

export function rotateUserAgent(userAgents: string[] = DEFAULT_USER_AGENTS): string {
  return userAgents[Math.floor(Math.random() * userAgents.length)];
}

export function pickRandom<T>(items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.floor(Math.random() * items.length)];
}

// ============================================
// RETRY WITH BACKOFF
// ============================================

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  wait?: (ms: number) => Promise<void>;
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 60000): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Runs fn up to `attempts` times, doubling the pause after each failure.
 * The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const wait = options.wait ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === options.attempts) break;
      const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(attempt, error, delayMs);
      await wait(delayMs);
    }
  }

  throw lastError;
}

// ============================================
// PROXY REQUEST
// ============================================

export interface ProxyRequestOptions {
  proxyUrl?: string;
  userAgent?: string;
  headers?: Record<string, string>;
  timeout?: number;
}

export interface ProxyRequestResponse {
  data: string;
  status: number;
}

export async function proxyRequest(
  url: string,
  options: ProxyRequestOptions = {}
): Promise<ProxyRequestResponse> {
  const dispatcher = options.proxyUrl ? new ProxyAgent(options.proxyUrl) : undefined;

  const headers: Record<string, string> = {
    'User-Agent': options.userAgent || rotateUserAgent(),
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'DNT': '1',
    'Upgrade-Insecure-Requests': '1',
    ...options.headers
  };

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout || 30000);

  try {
    const response = await undiciFetch(url, { headers, signal: controller.signal, dispatcher });
    const data = await response.text();
    return { data, status: response.status };
  } finally {
    clearTimeout(timeoutId);
    if (dispatcher) {
      await dispatcher.close().catch(() => undefined);
    }
  }
}

// ============================================
// VALUE PARSING
// ============================================

/**
 * "$1,250,000" -> 1250000. Null when nothing numeric remains.
 */
export function parsePrice(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const cleaned = String(value).replace(/[$,\s]/g, '');
  if (cleaned === '') return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}
