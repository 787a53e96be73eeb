import { pgTable, text, doublePrecision, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// One row per listing document. listing_key is the marketplace id when the
// page exposes one, otherwise the listing url.
export const listings = pgTable("listings", {
  listing_key: text("listing_key").primaryKey(),
  external_id: text("external_id"),
  url: text("url").notNull().unique(),
  title: text("title").notNull(),
  asking_price: doublePrecision("asking_price"),
  gross_revenue: text("gross_revenue"),
  established: text("established"),
  cashflow: text("cashflow"),
  description: text("description"),
  category: jsonb("category").$type<string[]>().default([]).notNull(),
  original_category: text("original_category"),
  city: text("city"),
  state: text("state"),
  broker_name: text("broker_name"),
  broker_profile_url: text("broker_profile_url"),
  broker_phone: text("broker_phone"),
  scraped_at: timestamp("scraped_at", { withTimezone: true }).notNull(),
}, (table) => ({
  externalIdIdx: index("listings_external_id_idx").on(table.external_id),
  scrapedAtIdx: index("listings_scraped_at_idx").on(table.scraped_at),
}));

export const insertListingSchema = createInsertSchema(listings, {
  url: z.string().url(),
  title: z.string().min(1),
  category: z.array(z.string()),
});

export type InsertListing = z.infer<typeof insertListingSchema>;
export type ListingRecord = typeof listings.$inferSelect;

/**
 * A listing reference found on an index page, not yet visited.
 */
export interface ListingCandidate {
  title: string;
  url: string;
  /** Empty when the index page carries no product id. */
  external_id: string;
  discovered_at: Date;
}

export interface SubscriberProfile {
  email: string;
  minPrice: number | null;
  maxPrice: number | null;
  /** Lower-cased. Empty set means no constraint. */
  industries: ReadonlySet<string>;
  states: ReadonlySet<string>;
  cities: ReadonlySet<string>;
}

export interface MatchGroup {
  groupKey: string;
  subscriberEmails: string[];
  listings: ListingRecord[];
}

export interface NotificationSummary {
  matchedSubscribers: number;
  emailsSent: number;
  groupsCreated: number;
  groupsFailed: number;
}

export interface UpsertResult {
  inserted: number;
  modified: number;
  total: number;
}

export interface ListingStats {
  totalListings: number;
  scrapedLast24h: number;
  lastScrapedAt: string | null;
  recent: ListingRecord[];
}
