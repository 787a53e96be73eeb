import { createHash } from 'node:crypto';
import type { ListingRecord, MatchGroup, SubscriberProfile } from '@shared/schema';
import { parsePrice } from './scraper-utils';

/**
 * Subscriber matching and grouping. Pure: no I/O, no clock.
 */

export interface SubscriberMember {
  email: string;
  mergeFields: Record<string, unknown>;
}

/** "Nevada, Utah" -> {"nevada", "utah"} */
export function parseListField(value: unknown): Set<string> {
  if (typeof value !== 'string' || value === '') return new Set();
  return new Set(
    value
      .replace(/\u00a0/g, '')
      .split(',')
      .map(item => item.trim().toLowerCase())
      .filter(item => item.length > 0),
  );
}

export function toSubscriberProfile(member: SubscriberMember): SubscriberProfile | null {
  const email = member.email.trim();
  if (!email) return null;

  const fields = member.mergeFields;
  return {
    email,
    minPrice: parsePrice(fields.DPR_MIN),
    maxPrice: parsePrice(fields.DPR_MAX),
    industries: parseListField(fields.INDUSTRIES),
    states: parseListField(fields.STATES),
    cities: parseListField(fields.CITIES),
  };
}

export function listingMatches(profile: SubscriberProfile, listing: ListingRecord): boolean {
  const price = listing.asking_price;
  if (price !== null) {
    if (profile.minPrice !== null && price < profile.minPrice) return false;
    if (profile.maxPrice !== null && price > profile.maxPrice) return false;
  }

  if (profile.industries.size > 0) {
    const categories = listing.category.map(c => c.trim().toLowerCase());
    if (!categories.some(c => profile.industries.has(c))) return false;
  }

  if (profile.states.size > 0 && !profile.states.has((listing.state ?? '').trim().toLowerCase())) {
    return false;
  }

  if (profile.cities.size > 0 && !profile.cities.has((listing.city ?? '').trim().toLowerCase())) {
    return false;
  }

  return true;
}

/**
 * Matched listings per subscriber email, in batch order.
 * Subscribers with no match are left out.
 */
export function matchSubscribers(
  profiles: SubscriberProfile[],
  listings: ListingRecord[],
): Map<string, ListingRecord[]> {
  const matches = new Map<string, ListingRecord[]>();
  for (const profile of profiles) {
    const matched = listings.filter(listing => listingMatches(profile, listing));
    if (matched.length > 0) matches.set(profile.email, matched);
  }
  return matches;
}

export function groupKeyFor(listings: ListingRecord[]): string {
  const ids = listings.map(l => l.listing_key).sort();
  return createHash('sha256').update(ids.join('|')).digest('hex');
}

/**
 * One group per distinct matched-listing set.
 */
export function groupSubscribers(matches: Map<string, ListingRecord[]>): MatchGroup[] {
  const groups = new Map<string, MatchGroup>();

  for (const [email, listings] of matches) {
    const groupKey = groupKeyFor(listings);
    const group = groups.get(groupKey);
    if (group) {
      group.subscriberEmails.push(email);
    } else {
      groups.set(groupKey, { groupKey, subscriberEmails: [email], listings });
    }
  }

  return Array.from(groups.values());
}
