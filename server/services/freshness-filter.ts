import type { ListingCandidate } from "@shared/schema";
import type { ExistingKeys, IStorage } from "../storage";
import { StoreUnavailableError } from "../errors";
import { log } from "../log";

/**
 * Candidates whose external id and url are both unknown to the store.
 * Repeats inside the batch collapse to their first occurrence.
 */
export function filterFresh(candidates: ListingCandidate[], existing: ExistingKeys): ListingCandidate[] {
  const seen = new Set<string>();
  const fresh: ListingCandidate[] = [];

  for (const candidate of candidates) {
    if (candidate.external_id && existing.externalIds.has(candidate.external_id)) continue;
    if (existing.urls.has(candidate.url)) continue;

    const key = candidate.external_id || candidate.url;
    if (seen.has(key) || seen.has(candidate.url)) continue;
    seen.add(key);
    seen.add(candidate.url);
    fresh.push(candidate);
  }

  return fresh;
}

export async function selectFreshCandidates(
  store: IStorage,
  candidates: ListingCandidate[],
): Promise<ListingCandidate[]> {
  if (candidates.length === 0) return [];

  let existing: ExistingKeys;
  try {
    existing = await store.findExistingKeys(candidates);
  } catch (error) {
    throw new StoreUnavailableError("Freshness lookup against the listing store failed", { cause: error });
  }

  const fresh = filterFresh(candidates, existing);
  log(`Filtered out ${candidates.length - fresh.length} known listings, ${fresh.length} new`, "FRESHNESS");
  return fresh;
}
