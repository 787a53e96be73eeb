import {
  listings,
  insertListingSchema,
  type InsertListing,
  type ListingCandidate,
  type ListingRecord,
  type ListingStats,
  type UpsertResult,
} from "@shared/schema";
import { desc, gte, inArray, or, sql, type SQL } from "drizzle-orm";
import { getDb, type Database } from "./db";
import { PersistenceError } from "./errors";

export interface ExistingKeys {
  externalIds: ReadonlySet<string>;
  urls: ReadonlySet<string>;
}

export interface IStorage {
  /** One batched lookup for all candidates. */
  findExistingKeys(candidates: ListingCandidate[]): Promise<ExistingKeys>;
  upsertListings(records: ListingRecord[]): Promise<UpsertResult>;
  getStats(): Promise<ListingStats>;
  getRecentListings(limit: number): Promise<ListingRecord[]>;
}

export function listingKey(item: { external_id: string | null; url: string }): string {
  return item.external_id ? item.external_id : item.url;
}

/**
 * Keeps one record per listing key, the one with the latest scraped_at.
 * Postgres rejects an upsert that touches the same row twice.
 */
export function latestByKey(records: ListingRecord[]): ListingRecord[] {
  const byKey = new Map<string, ListingRecord>();
  for (const record of records) {
    const key = listingKey(record);
    const current = byKey.get(key);
    if (!current || current.scraped_at.getTime() <= record.scraped_at.getTime()) {
      byKey.set(key, { ...record, listing_key: key });
    }
  }
  return Array.from(byKey.values());
}

/**
 * One lookup per batch: rows matching any candidate external id or url.
 * Null when there is nothing to look up.
 */
export function existingKeysQuery(db: Database, candidates: ListingCandidate[]) {
  const ids = Array.from(new Set(candidates.map((c) => c.external_id).filter((id) => id !== "")));
  const urls = Array.from(new Set(candidates.map((c) => c.url)));

  const conditions: SQL[] = [];
  if (ids.length > 0) conditions.push(inArray(listings.external_id, ids));
  if (urls.length > 0) conditions.push(inArray(listings.url, urls));
  if (conditions.length === 0) return null;

  return db
    .select({ external_id: listings.external_id, url: listings.url })
    .from(listings)
    .where(or(...conditions));
}

/**
 * Last write wins by scraped_at. An older re-scrape leaves the row untouched
 * and is not returned, so the counts reflect real changes only.
 */
export function upsertStatement(db: Database, rows: InsertListing[]) {
  return db
    .insert(listings)
    .values(rows)
    .onConflictDoUpdate({
      target: listings.listing_key,
      set: {
        external_id: sql`excluded.external_id`,
        url: sql`excluded.url`,
        title: sql`excluded.title`,
        asking_price: sql`excluded.asking_price`,
        gross_revenue: sql`excluded.gross_revenue`,
        established: sql`excluded.established`,
        cashflow: sql`excluded.cashflow`,
        description: sql`excluded.description`,
        category: sql`excluded.category`,
        original_category: sql`excluded.original_category`,
        city: sql`excluded.city`,
        state: sql`excluded.state`,
        broker_name: sql`excluded.broker_name`,
        broker_profile_url: sql`excluded.broker_profile_url`,
        broker_phone: sql`excluded.broker_phone`,
        scraped_at: sql`excluded.scraped_at`,
      },
      setWhere: sql`${listings.scraped_at} <= excluded.scraped_at`,
    })
    .returning({
      listing_key: listings.listing_key,
      // xmax is 0 only on rows this statement inserted
      inserted: sql<boolean>`(xmax = 0)`,
    });
}

export function countWrites(written: { inserted: boolean }[]): UpsertResult {
  const inserted = written.filter((row) => row.inserted).length;
  const modified = written.length - inserted;
  return { inserted, modified, total: inserted + modified };
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly resolveDb: () => Database = getDb) {}

  async findExistingKeys(candidates: ListingCandidate[]): Promise<ExistingKeys> {
    const query = candidates.length > 0 ? existingKeysQuery(this.resolveDb(), candidates) : null;
    if (!query) {
      return { externalIds: new Set(), urls: new Set() };
    }

    const externalIds = new Set<string>();
    const knownUrls = new Set<string>();
    for (const row of await query) {
      if (row.external_id) externalIds.add(row.external_id);
      knownUrls.add(row.url);
    }
    return { externalIds, urls: knownUrls };
  }

  async upsertListings(records: ListingRecord[]): Promise<UpsertResult> {
    if (records.length === 0) {
      return { inserted: 0, modified: 0, total: 0 };
    }

    try {
      const rows = latestByKey(records).map((record) => insertListingSchema.parse(record));
      return countWrites(await upsertStatement(this.resolveDb(), rows));
    } catch (error) {
      throw new PersistenceError(`Batched upsert of ${records.length} listings failed`, { cause: error });
    }
  }

  async getStats(): Promise<ListingStats> {
    const db = this.resolveDb();
    const cutoff = new Date(Date.now() - 24 * 60 * 60 * 1000);

    const [total] = await db.select({ count: sql<number>`count(*)::int` }).from(listings);
    const [lastDay] = await db
      .select({ count: sql<number>`count(*)::int` })
      .from(listings)
      .where(gte(listings.scraped_at, cutoff));
    const recent = await this.getRecentListings(3);

    return {
      totalListings: total?.count ?? 0,
      scrapedLast24h: lastDay?.count ?? 0,
      lastScrapedAt: recent[0]?.scraped_at.toISOString() ?? null,
      recent,
    };
  }

  async getRecentListings(limit: number): Promise<ListingRecord[]> {
    return await this.resolveDb()
      .select()
      .from(listings)
      .orderBy(desc(listings.scraped_at))
      .limit(limit);
  }
}

export const storage = new DatabaseStorage();
