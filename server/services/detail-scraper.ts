import type { ListingCandidate, ListingRecord } from '@shared/schema';
import { log, logWarn, logError, errorMessage } from '../log';
import type { PageDriver, Session, SessionManager } from './browser-session';
import type { EnrichmentClient } from './enrichment-client';
import {
  LOCATION_SELECTOR,
  extractListing,
  isAcceptable,
  isAuctionPage,
  isBlockedPage,
  type ExtractedListing,
} from './listing-extractor';
import { runWorkerPool } from './worker-pool';

export type AcquisitionOutcome =
  | { status: 'extracted'; candidate: ListingCandidate; record: ListingRecord; attempts: number }
  | { status: 'auction'; candidate: ListingCandidate; partial: ExtractedListing | null; attempts: number }
  | { status: 'failed'; candidate: ListingCandidate; reason: string; attempts: number };

export interface AcquisitionReport {
  /** Completion order. */
  outcomes: AcquisitionOutcome[];
  records: ListingRecord[];
  extracted: number;
  auctions: number;
  failed: number;
}

export interface DetailScraperOptions {
  maxAttempts: number;
  navigationTimeoutMs: number;
  contentTimeoutMs: number;
  concurrency: number;
  queueSize: number;
  taskDeadlineMs: number;
  now?: () => Date;
}

/**
 * The session a single task owns. A task gets a fresh lease from its slot,
 * so a task that outlives its deadline can only touch its own lease.
 */
export interface SessionLease {
  session: Session | null;
}

type AttemptVerdict =
  | { kind: 'extracted'; listing: ExtractedListing }
  | { kind: 'auction'; partial: ExtractedListing | null }
  | { kind: 'retry'; reason: string };

export class DetailScraperService {
  private readonly now: () => Date;

  constructor(
    private readonly sessions: SessionManager,
    private readonly enrichment: EnrichmentClient,
    private readonly options: DetailScraperOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async scrapeAll(candidates: ListingCandidate[]): Promise<AcquisitionReport> {
    const slotSessions = new Map<number, Session>();

    log(`Scraping ${candidates.length} listings (concurrency ${this.options.concurrency})`, 'ACQUIRE');

    let results;
    try {
      results = await runWorkerPool(candidates, async (candidate, { slot, signal }) => {
        const lease: SessionLease = { session: slotSessions.get(slot) ?? null };
        slotSessions.delete(slot);
        const outcome = await this.scrapeCandidate(candidate, lease, signal);
        if (!signal.aborted && lease.session) {
          slotSessions.set(slot, lease.session);
        }
        return outcome;
      }, {
        concurrency: this.options.concurrency,
        queueSize: this.options.queueSize,
        taskDeadlineMs: this.options.taskDeadlineMs,
      });
    } finally {
      await Promise.all(Array.from(slotSessions.values(), session => this.sessions.release(session)));
    }

    const outcomes = results.map((result): AcquisitionOutcome => {
      if (result.ok) return result.value;
      const reason = errorMessage(result.error);
      logError(`Gave up on ${result.item.url}`, 'ACQUIRE', result.error);
      return { status: 'failed', candidate: result.item, reason, attempts: 0 };
    });

    const records = outcomes.flatMap(o => (o.status === 'extracted' ? [o.record] : []));
    const auctions = outcomes.filter(o => o.status === 'auction').length;
    const failed = outcomes.filter(o => o.status === 'failed').length;

    log(`Extracted ${records.length}, auction ${auctions}, failed ${failed}`, 'ACQUIRE');
    return { outcomes, records, extracted: records.length, auctions, failed };
  }

  /**
   * Navigate, check for a block page, wait for content, extract, accept.
   * Every failed attempt replaces the session; a session that cannot be
   * replaced costs that attempt only. After the last one the candidate is
   * dropped.
   */
  async scrapeCandidate(
    candidate: ListingCandidate,
    lease: SessionLease,
    signal?: AbortSignal,
  ): Promise<AcquisitionOutcome> {
    const onAbort = () => {
      const session = lease.session;
      lease.session = null;
      if (session) {
        this.sessions.release(session).catch(error => logError('Release after deadline failed', 'ACQUIRE', error));
      }
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const reasons: string[] = [];

      for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
        if (!lease.session) {
          try {
            lease.session = await this.sessions.acquire();
          } catch (error) {
            const reason = `no session: ${errorMessage(error)}`;
            reasons.push(reason);
            logWarn(`Attempt ${attempt} failed for ${candidate.url}: ${reason}`, 'ACQUIRE');
            await this.guard(lease, signal);
            continue;
          }
        }
        await this.guard(lease, signal);
        const session = lease.session;

        log(`Attempt ${attempt}/${this.options.maxAttempts}: ${candidate.title.slice(0, 50)}`, 'ACQUIRE');
        const verdict = await this.attempt(candidate, session.browserHandle.page);
        await this.guard(lease, signal);

        if (verdict.kind === 'extracted') {
          const record = await this.finalize(candidate, verdict.listing);
          await this.guard(lease, signal);
          return { status: 'extracted', candidate, record, attempts: attempt };
        }

        if (verdict.kind === 'auction') {
          log(`Auction listing, no standard details: ${candidate.url}`, 'ACQUIRE');
          return { status: 'auction', candidate, partial: verdict.partial, attempts: attempt };
        }

        reasons.push(verdict.reason);
        logWarn(`Attempt ${attempt} failed for ${candidate.url}: ${verdict.reason}`, 'ACQUIRE');

        if (attempt < this.options.maxAttempts) {
          lease.session = null;
          try {
            lease.session = await this.sessions.reset(session);
          } catch (error) {
            // The next attempt launches its own session
            reasons.push(`reset failed: ${errorMessage(error)}`);
            logWarn(`Session reset failed for ${candidate.url}: ${errorMessage(error)}`, 'ACQUIRE');
          }
        } else {
          // Replaced lazily by the next candidate, not speculatively here
          lease.session = null;
          await this.sessions.release(session);
        }
      }

      const reason = reasons.join('; ');
      logError(`Dropping ${candidate.url} after ${this.options.maxAttempts} attempts: ${reason}`, 'ACQUIRE');
      return { status: 'failed', candidate, reason, attempts: this.options.maxAttempts };
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async attempt(candidate: ListingCandidate, page: PageDriver): Promise<AttemptVerdict> {
    try {
      await page.goto(candidate.url, this.options.navigationTimeoutMs);
    } catch (error) {
      return { kind: 'retry', reason: `navigation failed: ${errorMessage(error)}` };
    }

    try {
      if (isBlockedPage(await page.content())) {
        return { kind: 'retry', reason: 'access denied' };
      }

      const loaded = await page.waitForSelector(LOCATION_SELECTOR, this.options.contentTimeoutMs);
      const html = await page.content();

      if (!loaded) {
        return isAuctionPage(html)
          ? { kind: 'auction', partial: null }
          : { kind: 'retry', reason: 'listing content did not load' };
      }

      const listing = extractListing(html);
      if (isAcceptable(listing)) {
        return { kind: 'extracted', listing };
      }
      if (isAuctionPage(html)) {
        return { kind: 'auction', partial: listing };
      }
      return { kind: 'retry', reason: 'asking price or location missing' };
    } catch (error) {
      return { kind: 'retry', reason: `page error: ${errorMessage(error)}` };
    }
  }

  private async finalize(candidate: ListingCandidate, listing: ExtractedListing): Promise<ListingRecord> {
    const [category, place] = await Promise.all([
      this.enrichment.categorize(listing.category),
      this.enrichment.extractLocation(listing.location ?? ''),
    ]);

    const externalId = listing.externalId ?? (candidate.external_id || null);

    return {
      listing_key: externalId ?? candidate.url,
      external_id: externalId,
      url: candidate.url,
      title: listing.title ?? candidate.title,
      asking_price: listing.askingPrice,
      gross_revenue: listing.grossRevenue,
      established: listing.established,
      cashflow: listing.cashflow,
      description: listing.description,
      category,
      original_category: listing.category || null,
      city: place.city || null,
      state: place.state || null,
      broker_name: listing.brokerName,
      broker_profile_url: listing.brokerProfileUrl,
      broker_phone: listing.brokerPhone,
      scraped_at: this.now(),
    };
  }

  /**
   * After the deadline fires, anything this task still holds is released
   * and the task stops.
   */
  private async guard(lease: SessionLease, signal?: AbortSignal): Promise<void> {
    if (!signal?.aborted) return;
    const session = lease.session;
    lease.session = null;
    if (session) await this.sessions.release(session);
    throw signal.reason;
  }
}
