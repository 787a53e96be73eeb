import type { ListingCandidate, ListingRecord, NotificationSummary, UpsertResult } from '@shared/schema';
import { requireSetting, type AppConfig } from '../config';
import { log, logWarn, logError } from '../log';
import { latestByKey, type IStorage } from '../storage';
import { SessionManager } from './browser-session';
import { DetailScraperService, type AcquisitionReport } from './detail-scraper';
import { EnrichmentClient, OpenAIClassificationService } from './enrichment-client';
import { selectFreshCandidates } from './freshness-filter';
import { ListingDiscovery } from './listing-discovery';
import { MailchimpClient } from './mailchimp-client';
import { NotificationService } from './notification-service';
import { WebshareProxyDirectory } from './proxy-manager';

export interface PipelineDeps {
  discovery: { discover(): Promise<ListingCandidate[]> };
  store: IStorage;
  scraper: { scrapeAll(candidates: ListingCandidate[]): Promise<AcquisitionReport> };
  /** Null when no campaign platform is configured. */
  notifier: { notify(listings: ListingRecord[]): Promise<NotificationSummary> } | null;
}

export interface PipelineSummary {
  startedAt: string;
  durationMs: number;
  discovered: number;
  fresh: number;
  extracted: number;
  auctions: number;
  failed: number;
  persisted: UpsertResult;
  notification: NotificationSummary;
}

const NO_WRITES: UpsertResult = { inserted: 0, modified: 0, total: 0 };
const NO_NOTIFICATIONS: NotificationSummary = { matchedSubscribers: 0, emailsSent: 0, groupsCreated: 0, groupsFailed: 0 };

/**
 * Discovery, freshness, acquisition, persistence, notification.
 * Store failures end the run; everything else is absorbed per item.
 */
export async function runPipeline(deps: PipelineDeps): Promise<PipelineSummary> {
  const started = Date.now();
  log('🚀 Pipeline run starting', 'PIPELINE');

  try {
    const candidates = await deps.discovery.discover();
    const fresh = await selectFreshCandidates(deps.store, candidates);

    const report: AcquisitionReport = fresh.length > 0
      ? await deps.scraper.scrapeAll(fresh)
      : { outcomes: [], records: [], extracted: 0, auctions: 0, failed: 0 };

    // Two candidates can resolve to the same listing; store and announce it once
    const batch = latestByKey(report.records);

    const persisted = batch.length > 0
      ? await deps.store.upsertListings(batch)
      : { ...NO_WRITES };

    let notification = { ...NO_NOTIFICATIONS };
    if (!deps.notifier) {
      logWarn('Campaign platform not configured - skipping notifications', 'PIPELINE');
    } else if (batch.length > 0) {
      notification = await deps.notifier.notify(batch);
    }

    const summary: PipelineSummary = {
      startedAt: new Date(started).toISOString(),
      durationMs: Date.now() - started,
      discovered: candidates.length,
      fresh: fresh.length,
      extracted: report.extracted,
      auctions: report.auctions,
      failed: report.failed,
      persisted,
      notification,
    };

    log(
      `Discovered: ${summary.discovered}, New: ${summary.fresh}, Extracted: ${summary.extracted}, ` +
      `Auction: ${summary.auctions}, Failed: ${summary.failed}`,
      'PIPELINE',
    );
    log(`Stored: ${persisted.inserted} inserted, ${persisted.modified} modified`, 'PIPELINE');
    log(
      `Notified: ${notification.emailsSent} emails to ${notification.matchedSubscribers} matched subscribers ` +
      `in ${notification.groupsCreated} groups`,
      'PIPELINE',
    );
    log(`✅ Pipeline run succeeded in ${(summary.durationMs / 1000).toFixed(1)}s`, 'PIPELINE');
    return summary;
  } catch (error) {
    logError('Pipeline run failed', 'PIPELINE', error);
    throw error;
  }
}

/**
 * Production collaborators for one run.
 */
export function createPipelineDeps(config: AppConfig, store: IStorage): PipelineDeps {
  const directory = new WebshareProxyDirectory(config.proxyDirectory);

  const enrichment = new EnrichmentClient(
    new OpenAIClassificationService(requireSetting(config.openai.apiKey, 'OPENAI_API_KEY'), config.openai.model),
  );

  const sessions = new SessionManager(directory, undefined, { executablePath: config.scraper.executablePath });
  const scraper = new DetailScraperService(sessions, enrichment, config.scraper);

  const { apiKey, listId, templateId } = config.mailchimp;
  const notifier = apiKey && listId
    ? new NotificationService(new MailchimpClient({ apiKey, listId, templateId }), config.notify)
    : null;

  return {
    discovery: new ListingDiscovery(directory, config.discovery),
    store,
    scraper,
    notifier,
  };
}
