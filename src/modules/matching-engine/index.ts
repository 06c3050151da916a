/**
 * Matching Engine Module
 *
 * Purpose: rank listings by fit to a client's stated preferences
 * Dependencies: Record Store (current view), Cross-Reference Index
 *
 * Deterministic: the ranking depends only on the view and the preferences.
 * Listings that score 0 are left out rather than ranked last.
 */

import { NotFoundError } from '../../errors';
import type { Client, ClientPreferences, Listing, PriceRange, WeightHints } from '../../types';
import type { SnapshotProvider } from '../record-store';
import { scoreListing } from './scoring';
import type { ComponentCredits } from './scoring';

export {
  MATCH_COMPONENTS,
  MATCH_WEIGHTS,
  PRICE_TOLERANCE,
  bedroomCredit,
  membershipCredit,
  priceCredit,
  scoreListing,
} from './scoring';
export type { ComponentCredits, ListingScore, MatchComponent } from './scoring';

export interface MatchOptions {
  /** Score pending and sold listings too. Defaults to active listings only. */
  includeInactive?: boolean;
  /** Drop results scoring below this (0-100). */
  minScore?: number;
  limit?: number;
}

export interface MatchResult {
  listing: Listing;
  score: number;
  credits: ComponentCredits;
  /** The listing already appears in the client's match history. */
  previouslyMatched: boolean;
}

export interface ClientMatches {
  client: Pick<Client, 'id' | 'name' | 'role'>;
  results: MatchResult[];
}

export interface PreferenceInput {
  priceRange?: PriceRange;
  minBedrooms?: number;
  desiredAreas?: string[];
  propertyTypes?: string[];
  weightHints?: WeightHints;
}

/**
 * Score a pool and order it by descending score. The sort is stable, so ties
 * keep pool order.
 */
export function rankListings(
  preferences: ClientPreferences,
  pool: readonly Listing[],
  options: Pick<MatchOptions, 'minScore' | 'limit'> = {}
): Omit<MatchResult, 'previouslyMatched'>[] {
  const minScore = options.minScore ?? 0;

  const ranked = pool
    .map((listing) => ({ listing, ...scoreListing(preferences, listing) }))
    .filter((result) => result.score > 0 && result.score >= minScore);

  ranked.sort((a, b) => b.score - a.score);

  return options.limit !== undefined ? ranked.slice(0, options.limit) : ranked;
}

export function toPreferences(input: PreferenceInput): ClientPreferences {
  return {
    priceRange: input.priceRange ?? {},
    minBedrooms: input.minBedrooms,
    desiredAreas: input.desiredAreas ?? [],
    propertyTypes: input.propertyTypes ?? [],
    weightHints: input.weightHints ?? {},
  };
}

export class MatchingEngine {
  constructor(private store: SnapshotProvider) {}

  /**
   * Ranked recommendations for a stored client.
   * @throws NotFoundError for an unknown client id
   */
  match(clientId: string, options: MatchOptions = {}): ClientMatches {
    const { snapshot, index } = this.store.current();
    const client = snapshot.tables.client.get(clientId);
    if (!client) {
      throw new NotFoundError('client', clientId);
    }

    const prior = new Set(index.priorMatchesForClient(client.id));
    const pool = activePool(snapshot.tables.listing.records, options);
    const results = rankListings(client.preferences, pool, options).map((result) => ({
      ...result,
      previouslyMatched: prior.has(result.listing.id),
    }));

    return { client: { id: client.id, name: client.name, role: client.role }, results };
  }

  /**
   * The same ranking for preferences that belong to no stored client.
   */
  matchPreferences(input: PreferenceInput, options: MatchOptions = {}): MatchResult[] {
    const { snapshot } = this.store.current();
    const pool = activePool(snapshot.tables.listing.records, options);
    return rankListings(toPreferences(input), pool, options).map((result) => ({
      ...result,
      previouslyMatched: false,
    }));
  }
}

function activePool(listings: readonly Listing[], options: MatchOptions): readonly Listing[] {
  return options.includeInactive ? listings : listings.filter((listing) => listing.status === 'active');
}

export function createMatchingEngine(store: SnapshotProvider): MatchingEngine {
  return new MatchingEngine(store);
}
