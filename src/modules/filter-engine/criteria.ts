import { z } from 'zod';
import { InvalidCriteriaError } from '../../errors';
import type { Listing, ListingStatus } from '../../types';
import { normalize } from '../../utils';

export type ListingSort = 'price-asc' | 'price-desc';

/**
 * Caller-supplied constraints on listings. Every field is optional; numeric
 * bounds are inclusive.
 */
export interface ListingCriteria {
  minPrice?: number;
  maxPrice?: number;
  minBedrooms?: number;
  maxBedrooms?: number;
  minBathrooms?: number;
  maxBathrooms?: number;
  minSquareFeet?: number;
  maxSquareFeet?: number;
  propertyTypes?: string[];
  statuses?: ListingStatus[];
  areas?: string[];
  /** Each entry must appear inside at least one of the listing's feature tags. */
  features?: string[];
  /** Substring of the address, description or a feature tag. */
  text?: string;
  sort?: ListingSort;
  limit?: number;
}

const bound = z.number().finite().nonnegative().optional();

const ranges = [
  ['minPrice', 'maxPrice'],
  ['minBedrooms', 'maxBedrooms'],
  ['minBathrooms', 'maxBathrooms'],
  ['minSquareFeet', 'maxSquareFeet'],
] as const;

export const ListingCriteriaSchema = z
  .object({
    minPrice: bound,
    maxPrice: bound,
    minBedrooms: bound,
    maxBedrooms: bound,
    minBathrooms: bound,
    maxBathrooms: bound,
    minSquareFeet: bound,
    maxSquareFeet: bound,
    propertyTypes: z.array(z.string()).optional(),
    statuses: z.array(z.enum(['active', 'pending', 'sold'])).optional(),
    areas: z.array(z.string()).optional(),
    features: z.array(z.string()).optional(),
    text: z.string().optional(),
    sort: z.enum(['price-asc', 'price-desc']).optional(),
    limit: z.number().int().positive().optional(),
  })
  .strict()
  .superRefine((criteria, ctx) => {
    for (const [minKey, maxKey] of ranges) {
      const min = criteria[minKey];
      const max = criteria[maxKey];
      if (min !== undefined && max !== undefined && min > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [minKey],
          message: `${minKey} (${min}) is greater than ${maxKey} (${max})`,
        });
      }
    }
  });

/**
 * Validate criteria, reporting every problem at once. Contradictory bounds are
 * reported, never swapped.
 */
export function parseCriteria(input: unknown): ListingCriteria {
  const parsed = ListingCriteriaSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidCriteriaError(
      parsed.error.issues.map((issue) =>
        issue.code === z.ZodIssueCode.custom || issue.path.length === 0
          ? issue.message
          : `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}

export type ListingPredicate = (listing: Listing) => boolean;

function within(value: number, min: number | undefined, max: number | undefined): boolean {
  return (min === undefined || value >= min) && (max === undefined || value <= max);
}

function hasAny(criteria: ListingCriteria, keys: readonly (keyof ListingCriteria)[]): boolean {
  return keys.some((key) => criteria[key] !== undefined);
}

export function matchesText(listing: Listing, text: string): boolean {
  const needle = text.toLowerCase();
  return (
    listing.address.toLowerCase().includes(needle) ||
    listing.description.toLowerCase().includes(needle) ||
    listing.features.some((feature) => feature.toLowerCase().includes(needle))
  );
}

/**
 * One predicate per supplied criterion. Omitted criteria contribute nothing.
 */
export function buildPredicates(criteria: ListingCriteria): ListingPredicate[] {
  const predicates: ListingPredicate[] = [];
  const {
    minPrice, maxPrice, minBedrooms, maxBedrooms, minBathrooms, maxBathrooms,
    minSquareFeet, maxSquareFeet, propertyTypes, statuses, areas, features, text,
  } = criteria;

  if (hasAny(criteria, ['minPrice', 'maxPrice'])) {
    predicates.push((listing) => within(listing.price, minPrice, maxPrice));
  }
  if (hasAny(criteria, ['minBedrooms', 'maxBedrooms'])) {
    predicates.push((listing) => within(listing.bedrooms, minBedrooms, maxBedrooms));
  }
  if (hasAny(criteria, ['minBathrooms', 'maxBathrooms'])) {
    predicates.push((listing) => within(listing.bathrooms, minBathrooms, maxBathrooms));
  }
  if (hasAny(criteria, ['minSquareFeet', 'maxSquareFeet'])) {
    predicates.push((listing) => within(listing.squareFeet, minSquareFeet, maxSquareFeet));
  }

  if (propertyTypes && propertyTypes.length > 0) {
    const wanted = new Set(propertyTypes.map(normalize));
    predicates.push((listing) => wanted.has(normalize(listing.propertyType)));
  }
  if (statuses && statuses.length > 0) {
    const wanted = new Set<ListingStatus>(statuses);
    predicates.push((listing) => wanted.has(listing.status));
  }
  if (areas && areas.length > 0) {
    const wanted = new Set(areas.map(normalize));
    predicates.push((listing) => wanted.has(normalize(listing.area)));
  }
  if (features && features.length > 0) {
    const required = features.map((feature) => feature.toLowerCase());
    predicates.push((listing) =>
      required.every((needle) => listing.features.some((feature) => feature.toLowerCase().includes(needle)))
    );
  }

  // Blank text is no constraint; anything else is matched as given.
  if (text !== undefined && text.trim().length > 0) {
    predicates.push((listing) => matchesText(listing, text));
  }

  return predicates;
}
