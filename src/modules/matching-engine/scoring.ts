/**
 * Listing/preference scoring.
 *
 * Each component yields a credit in [0, 1], or null when the preferences say
 * nothing about it. The score is the weighted mean of the participating
 * credits scaled to 0-100.
 */

import type { ClientPreferences, Listing, PriceRange } from '../../types';
import { normalize, roundTo } from '../../utils';

export type MatchComponent = 'price' | 'bedrooms' | 'area' | 'type';

export const MATCH_COMPONENTS: readonly MatchComponent[] = ['price', 'bedrooms', 'area', 'type'];

/** Base weights; they sum to 100. */
export const MATCH_WEIGHTS: Readonly<Record<MatchComponent, number>> = {
  price: 40,
  bedrooms: 20,
  area: 25,
  type: 15,
};

/**
 * Relative distance outside the price range at which price credit reaches 0.
 * Credit falls linearly from 1 at the bound: 10% over the maximum earns 0.5.
 */
export const PRICE_TOLERANCE = 0.2;

export type ComponentCredits = Record<MatchComponent, number | null>;

export interface ListingScore {
  score: number;
  credits: ComponentCredits;
}

function decay(distance: number, bound: number): number {
  if (bound <= 0) {
    return 0;
  }
  return Math.max(0, 1 - distance / bound / PRICE_TOLERANCE);
}

export function priceCredit(price: number, range: PriceRange): number | null {
  const { min, max } = range;
  if (min === undefined && max === undefined) {
    return null;
  }
  if (min !== undefined && price < min) {
    return decay(min - price, min);
  }
  if (max !== undefined && price > max) {
    return decay(price - max, max);
  }
  return 1;
}

export function bedroomCredit(bedrooms: number, minBedrooms: number | undefined): number | null {
  if (minBedrooms === undefined || minBedrooms <= 0) {
    return null;
  }
  return bedrooms >= minBedrooms ? 1 : bedrooms / minBedrooms;
}

export function membershipCredit(value: string, wanted: readonly string[]): number | null {
  if (wanted.length === 0) {
    return null;
  }
  const key = normalize(value);
  return wanted.some((candidate) => normalize(candidate) === key) ? 1 : 0;
}

export function scoreListing(preferences: ClientPreferences, listing: Listing): ListingScore {
  const credits: ComponentCredits = {
    price: priceCredit(listing.price, preferences.priceRange),
    bedrooms: bedroomCredit(listing.bedrooms, preferences.minBedrooms),
    area: membershipCredit(listing.area, preferences.desiredAreas),
    type: membershipCredit(listing.propertyType, preferences.propertyTypes),
  };

  let weighted = 0;
  let totalWeight = 0;
  for (const component of MATCH_COMPONENTS) {
    const credit = credits[component];
    const weight = MATCH_WEIGHTS[component] * (preferences.weightHints[component] ?? 1);
    if (credit === null || weight <= 0) {
      continue;
    }
    weighted += weight * credit;
    totalWeight += weight;
  }

  const score = totalWeight > 0 ? roundTo((weighted / totalWeight) * 100, 2) : 0;
  return { score, credits };
}
