/**
 * Filter Engine Module
 *
 * Purpose: select and order listings by caller criteria; free-text search
 * Dependencies: Record Store (current view)
 *
 * "No matches" is an empty array. Only contradictory or malformed criteria
 * raise, as InvalidCriteriaError.
 */

import type { Agent, Listing } from '../../types';
import type { SnapshotProvider } from '../record-store';
import { buildPredicates, parseCriteria } from './criteria';
import type { ListingCriteria, ListingSort } from './criteria';

export { ListingCriteriaSchema, buildPredicates, parseCriteria, matchesText } from './criteria';
export type { ListingCriteria, ListingPredicate, ListingSort } from './criteria';

const comparators: Record<ListingSort, (a: Listing, b: Listing) => number> = {
  'price-asc': (a, b) => a.price - b.price,
  'price-desc': (a, b) => b.price - a.price,
};

/**
 * Apply validated criteria to a listing sequence. Sorting is stable, so equal
 * keys keep the input order.
 */
export function filterListings(listings: readonly Listing[], criteria: ListingCriteria): Listing[] {
  const predicates = buildPredicates(criteria);
  const matches = listings.filter((listing) => predicates.every((predicate) => predicate(listing)));

  if (criteria.sort) {
    matches.sort(comparators[criteria.sort]);
  }

  return criteria.limit !== undefined ? matches.slice(0, criteria.limit) : matches;
}

export class FilterEngine {
  constructor(private store: SnapshotProvider) {}

  /**
   * Listings satisfying every supplied criterion.
   * @throws InvalidCriteriaError when the criteria contradict themselves
   */
  filter(criteria: ListingCriteria): Listing[] {
    const valid = parseCriteria(criteria);
    const { snapshot } = this.store.current();
    return filterListings(snapshot.tables.listing.records, valid);
  }

  search(text: string): Listing[] {
    const { snapshot } = this.store.current();
    return filterListings(snapshot.tables.listing.records, { text });
  }

  /**
   * Agents whose name, specializations, expertise areas or bio contain the text.
   */
  searchAgents(text: string): Agent[] {
    const { snapshot } = this.store.current();
    if (text.trim().length === 0) {
      return [...snapshot.tables.agent.records];
    }

    const needle = text.toLowerCase();
    return snapshot.tables.agent.records.filter((agent) =>
      [agent.name, ...agent.specializations, ...agent.expertiseAreas, agent.bio].some((field) =>
        field.toLowerCase().includes(needle)
      )
    );
  }
}

export function createFilterEngine(store: SnapshotProvider): FilterEngine {
  return new FilterEngine(store);
}
