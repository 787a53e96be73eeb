import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { ListingCandidate } from '@shared/schema';
import { log, logWarn, errorMessage } from '../log';
import { proxyUrl, type ProxyDirectory } from './proxy-manager';
import { proxyRequest, retryWithBackoff, rotateUserAgent, sleep, withJitter } from './scraper-utils';

/**
 * Listing Discovery - walks the marketplace index pages and collects
 * listing references from their JSON-LD search results.
 */

export type PageFetcher = (url: string) => Promise<string>;

export interface DiscoveryOptions {
  baseUrl: string;
  maxPages: number;
  attempts?: number;
  baseDelayMs?: number;
  fetchPage?: PageFetcher;
  wait?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const searchItemSchema = z.object({
  '@type': z.literal('ListItem'),
  item: z.object({
    '@type': z.literal('Product'),
    name: z.string().optional(),
    url: z.string().optional(),
    productId: z.union([z.string(), z.number()]).optional(),
  }).passthrough(),
}).passthrough();

const searchPageSchema = z.object({
  '@type': z.literal('SearchResultsPage'),
  about: z.array(z.unknown()),
}).passthrough();

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Candidates on one index page whose url is not in `seen`.
 * Accepted urls are added to `seen`.
 */
export function parseSearchResults(html: string, seen: Set<string>, discoveredAt: Date): ListingCandidate[] {
  const $ = cheerio.load(html);
  const candidates: ListingCandidate[] = [];

  for (const block of $('script[type="application/ld+json"]').toArray()) {
    const page = searchPageSchema.safeParse(parseJson($(block).text()));
    if (!page.success) continue;

    for (const entry of page.data.about) {
      const parsed = searchItemSchema.safeParse(entry);
      if (!parsed.success) continue;

      const { name, url, productId } = parsed.data.item;
      const title = name?.trim();
      if (!title || !url) continue;
      if (seen.has(url)) continue;

      seen.add(url);
      candidates.push({
        title,
        url,
        external_id: productId === undefined ? '' : String(productId).trim(),
        discovered_at: discoveredAt,
      });
    }
  }

  return candidates;
}

export class ListingDiscovery {
  private readonly fetchPage: PageFetcher;
  private readonly now: () => Date;

  constructor(private readonly directory: ProxyDirectory, private readonly options: DiscoveryOptions) {
    this.fetchPage = options.fetchPage ?? (url => this.fetchThroughProxy(url));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Pages 1..maxPages. Stops early at a page that adds nothing new, and
   * keeps what it has when a page cannot be fetched.
   */
  async discover(knownUrls: Iterable<string> = []): Promise<ListingCandidate[]> {
    const seen = new Set(knownUrls);
    const collected: ListingCandidate[] = [];

    for (let page = 1; page <= this.options.maxPages; page++) {
      if (page > 1) {
        await (this.options.wait ?? sleep)(withJitter());
      }
      const url = `${this.options.baseUrl}${page}`;
      log(`Scraping page ${page}...`, 'DISCOVERY');

      let html: string;
      try {
        html = await retryWithBackoff(() => this.fetchPage(url), {
          attempts: this.options.attempts ?? 3,
          baseDelayMs: this.options.baseDelayMs ?? 2000,
          wait: this.options.wait,
          onRetry: (attempt, error, delayMs) =>
            logWarn(`Page ${page} attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`, 'DISCOVERY'),
        });
      } catch (error) {
        logWarn(`Giving up on page ${page}: ${errorMessage(error)}`, 'DISCOVERY');
        break;
      }

      const found = parseSearchResults(html, seen, this.now());
      if (found.length === 0) {
        log(`Page ${page} has no new listings, stopping`, 'DISCOVERY');
        break;
      }
      log(`Extracted ${found.length} listing URLs from page ${page}`, 'DISCOVERY');
      collected.push(...found);
    }

    log(`Discovered ${collected.length} listings`, 'DISCOVERY');
    return collected;
  }

  private async fetchThroughProxy(url: string): Promise<string> {
    const identity = await this.directory.pickIdentity();
    const response = await proxyRequest(url, {
      proxyUrl: proxyUrl(identity),
      userAgent: rotateUserAgent(),
      timeout: 15000,
    });
    if (response.status !== 200) {
      throw new Error(`HTTP ${response.status} for ${url}`);
    }
    return response.data;
  }
}
