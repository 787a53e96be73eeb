import type {
  ListingCandidate,
  ListingRecord,
  ListingStats,
  UpsertResult,
} from '@shared/schema';
import type { BrowserHandle, BrowserLauncher, LaunchOptions } from '../server/services/browser-session';
import type { ClassificationService } from '../server/services/enrichment-client';
import type { CampaignInput, CampaignPlatform } from '../server/services/mailchimp-client';
import type { EgressIdentity, ProxyDirectory } from '../server/services/proxy-manager';
import type { SubscriberMember } from '../server/services/subscriber-matcher';
import { latestByKey, listingKey, type ExistingKeys, type IStorage } from '../server/storage';

export const SCRAPED_AT = new Date('2025-03-07T12:00:00Z');

export function makeCandidate(overrides: Partial<ListingCandidate> = {}): ListingCandidate {
  return {
    title: 'Corner Bistro',
    url: 'https://listings.test/business/corner-bistro/123',
    external_id: '123',
    discovered_at: SCRAPED_AT,
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<ListingRecord> = {}): ListingRecord {
  const record: ListingRecord = {
    listing_key: '123',
    external_id: '123',
    url: 'https://listings.test/business/corner-bistro/123',
    title: 'Corner Bistro',
    asking_price: 500000,
    gross_revenue: '$1,200,000',
    established: '2009',
    cashflow: '$180,000',
    description: 'Busy neighborhood bistro.',
    category: ['Restaurants', 'Food'],
    original_category: 'Restaurant',
    city: 'las vegas',
    state: 'nevada',
    broker_name: 'Jane Broker',
    broker_profile_url: 'https://listings.test/broker/jane',
    broker_phone: '(702) 555-0100',
    scraped_at: SCRAPED_AT,
    ...overrides,
  };
  return { ...record, listing_key: overrides.listing_key ?? listingKey(record) };
}

interface DetailPageOptions {
  name?: string;
  price?: string | null;
  category?: string;
  productId?: string;
  location?: string | null;
  broker?: { name?: string; url?: string } | null;
  extraBody?: string;
}

export function detailPage(options: DetailPageOptions = {}): string {
  const offers: Record<string, unknown> = {};
  if (options.price !== null) offers.price = options.price ?? '500000';
  if (options.broker !== null) {
    offers.offeredBy = options.broker ?? { name: 'Jane Broker', url: 'https://listings.test/broker/jane' };
  }

  const product = {
    '@context': 'https://schema.org',
    '@type': 'Product',
    name: options.name ?? 'Corner Bistro',
    description: 'Busy neighborhood bistro.',
    category: options.category ?? 'Restaurant',
    productId: options.productId ?? '123',
    offers,
  };

  const location = options.location === null
    ? ''
    : `<span class="f-l">${options.location ?? 'Las Vegas, NV'}</span>`;

  return `<html><head>
    <script type="application/ld+json">${JSON.stringify(product)}</script>
  </head><body>
    <h1>${options.name ?? 'Corner Bistro'}</h1>
    ${location}
    <p class="help"><span class="g4">$500,000</span><span class="g4">$180,000</span><span class="g4">$1,200,000</span></p>
    <div>Established: 2009</div>
    <span class="ctc_phone"><a href="tel:7025550100"><span>(702) 555-0100</span></a></span>
    ${options.extraBody ?? ''}
  </body></html>`;
}

export const BLOCKED_PAGE = '<html><body><h1>Access Denied</h1><p>You don\'t have permission.</p></body></html>';
export const AUCTION_PAGE = '<html><body><h1>Marina Lot</h1><div>Starting Bid: $25,000</div></body></html>';

/** Served page that makes navigation throw. */
export const NAVIGATION_FAILURE = '__navigation_failure__';

export const TEST_IDENTITY: EgressIdentity = {
  host: '10.0.0.1',
  port: 8080,
  username: 'test-user',
  password: 'test-secret',
};

export const fakeDirectory: ProxyDirectory = {
  pickIdentity: async () => TEST_IDENTITY,
};

/**
 * Browser stand-in. Every navigation serves the next page from `pages`;
 * the last one repeats when the list runs out.
 */
export class FakeBrowser {
  launches: LaunchOptions[] = [];
  closed = 0;
  visited: string[] = [];
  private served = 0;

  constructor(private readonly pages: string[]) {}

  readonly launcher: BrowserLauncher = async (options) => {
    this.launches.push(options);
    let current = '';
    const handle: BrowserHandle = {
      page: {
        goto: async (url) => {
          this.visited.push(url);
          const next = this.pages[Math.min(this.served, this.pages.length - 1)] ?? '';
          this.served++;
          if (next === NAVIGATION_FAILURE) throw new Error('net::ERR_TIMED_OUT');
          current = next;
        },
        content: async () => current,
        waitForSelector: async () => current.includes('class="f-l"'),
      },
      close: async () => {
        this.closed++;
      },
    };
    return handle;
  };
}

/**
 * Classifier stand-in answering by prompt kind.
 */
export function fakeClassifier(answers: { category?: string; location?: string }): ClassificationService {
  return {
    complete: async (system) => {
      const answer = system.includes('categorization') ? answers.category : answers.location;
      if (answer === undefined) throw new Error('classifier offline');
      return answer;
    },
  };
}

export class InMemoryStorage implements IStorage {
  rows = new Map<string, ListingRecord>();
  lookups = 0;

  constructor(seed: ListingRecord[] = []) {
    for (const record of seed) this.rows.set(record.listing_key, record);
  }

  async findExistingKeys(): Promise<ExistingKeys> {
    this.lookups++;
    const externalIds = new Set<string>();
    const urls = new Set<string>();
    for (const row of this.rows.values()) {
      if (row.external_id) externalIds.add(row.external_id);
      urls.add(row.url);
    }
    return { externalIds, urls };
  }

  async upsertListings(records: ListingRecord[]): Promise<UpsertResult> {
    let inserted = 0;
    let modified = 0;
    for (const record of latestByKey(records)) {
      const current = this.rows.get(record.listing_key);
      if (!current) {
        inserted++;
        this.rows.set(record.listing_key, record);
      } else if (current.scraped_at.getTime() <= record.scraped_at.getTime()) {
        modified++;
        this.rows.set(record.listing_key, record);
      }
    }
    return { inserted, modified, total: inserted + modified };
  }

  async getStats(): Promise<ListingStats> {
    const recent = await this.getRecentListings(3);
    return {
      totalListings: this.rows.size,
      scrapedLast24h: this.rows.size,
      lastScrapedAt: recent[0]?.scraped_at.toISOString() ?? null,
      recent,
    };
  }

  async getRecentListings(limit: number): Promise<ListingRecord[]> {
    return Array.from(this.rows.values())
      .sort((a, b) => b.scraped_at.getTime() - a.scraped_at.getTime())
      .slice(0, limit);
  }
}

export interface PlatformCall {
  operation: string;
  args: unknown[];
}

/**
 * Campaign platform stand-in. `failCampaignForSegment` rejects campaign
 * creation for the segments it selects.
 */
export class FakePlatform implements CampaignPlatform {
  calls: PlatformCall[] = [];
  segments = new Map<string, string[]>();
  html = new Map<string, string>();
  sent: string[] = [];
  private nextId = 1;

  constructor(
    private readonly members: SubscriberMember[],
    private readonly options: { templateHtml?: string; failCampaignForSegment?: (emails: string[]) => boolean } = {},
  ) {}

  async fetchMembers(): Promise<SubscriberMember[]> {
    this.calls.push({ operation: 'fetchMembers', args: [] });
    return this.members;
  }

  async createSegment(name: string, emails: string[]): Promise<string> {
    this.calls.push({ operation: 'createSegment', args: [name, emails] });
    const id = String(this.nextId++);
    this.segments.set(id, emails);
    return id;
  }

  async createCampaign(input: CampaignInput): Promise<string> {
    this.calls.push({ operation: 'createCampaign', args: [input] });
    const emails = this.segments.get(input.segmentId) ?? [];
    if (this.options.failCampaignForSegment?.(emails)) {
      throw new Error('campaign rejected');
    }
    const id = `c${this.nextId++}`;
    this.html.set(id, this.options.templateHtml ?? '<div>*|TEMP_HTML|*</div>');
    return id;
  }

  async getCampaignHtml(campaignId: string): Promise<string> {
    this.calls.push({ operation: 'getCampaignHtml', args: [campaignId] });
    return this.html.get(campaignId) ?? '';
  }

  async setCampaignHtml(campaignId: string, html: string): Promise<void> {
    this.calls.push({ operation: 'setCampaignHtml', args: [campaignId, html] });
    this.html.set(campaignId, html);
  }

  async sendCampaign(campaignId: string): Promise<void> {
    this.calls.push({ operation: 'sendCampaign', args: [campaignId] });
    this.sent.push(campaignId);
  }

  async deleteSegment(segmentId: string): Promise<void> {
    this.calls.push({ operation: 'deleteSegment', args: [segmentId] });
    this.segments.delete(segmentId);
  }

  count(operation: string): number {
    return this.calls.filter(c => c.operation === operation).length;
  }
}
