/**
 * Statistics folded over one view. Every function is pure: same view, same
 * answer, nothing retained between calls.
 */

import { InvalidCriteriaError, NotFoundError } from '../../errors';
import type { Listing, Transaction } from '../../types';
import { average, median, normalize, roundTo } from '../../utils';
import type { EntityTable, StoreView } from '../record-store';

export interface AreaStats {
  area: string;
  activeListings: number;
  averagePrice: number | null;
  medianPrice: number | null;
  minPrice: number | null;
  maxPrice: number | null;
  /** Total asking price over total square feet, for active listings with a size. */
  pricePerSquareFoot: number | null;
  amenityCount: number;
}

export interface AgentStats {
  agentId: string;
  name: string;
  specializations: string[];
  closedTransactions: number;
  totalClosingVolume: number;
  averageClosingPrice: number | null;
  averageDaysOnMarket: number | null;
  activeListings: number;
  /** Distinct listings owned now or historically. */
  portfolioSize: number;
  clientRating: number | null;
}

export interface PriceBucket {
  /** Inclusive lower bound. */
  min: number;
  /** Exclusive upper bound. */
  max: number;
  count: number;
}

export interface PriceDistribution {
  area: string | null;
  bucketSize: number;
  total: number;
  buckets: PriceBucket[];
}

export interface MarketTrends {
  area: string;
  totalSales: number;
  averageSalePrice: number | null;
  averageDaysOnMarket: number | null;
  averagePricePerSqft: number | null;
}

export const DEFAULT_BUCKET_SIZE = 250_000;
export const MAX_PRICE_BUCKETS = 1_000;

export function resolveAll<T>(table: EntityTable<T>, ids: readonly string[]): T[] {
  const records: T[] = [];
  for (const id of ids) {
    const record = table.get(id);
    if (record !== undefined) {
      records.push(record);
    }
  }
  return records;
}

function rounded(value: number | null): number | null {
  return value === null ? null : roundTo(value, 2);
}

/**
 * Display name for an area key. Known when an area record or a listing uses it.
 * @throws NotFoundError otherwise
 */
export function resolveAreaName(view: StoreView, areaName: string): string {
  const { snapshot, index } = view;
  const record = snapshot.tables.area.get(areaName);
  if (record) {
    return record.name;
  }

  const [firstListing] = resolveAll(snapshot.tables.listing, index.listingsForArea(areaName));
  if (firstListing) {
    return firstListing.area;
  }
  throw new NotFoundError('area', areaName);
}

export function activeListingsInArea(view: StoreView, areaName: string): Listing[] {
  return resolveAll(view.snapshot.tables.listing, view.index.listingsForArea(areaName)).filter(
    (listing) => listing.status === 'active'
  );
}

export function computeAreaStats(view: StoreView, areaName: string): AreaStats {
  const name = resolveAreaName(view, areaName);
  const active = activeListingsInArea(view, areaName);
  const prices = active.map((listing) => listing.price);

  const sized = active.filter((listing) => listing.squareFeet > 0);
  const totalSquareFeet = sized.reduce((sum, listing) => sum + listing.squareFeet, 0);
  const totalSizedPrice = sized.reduce((sum, listing) => sum + listing.price, 0);

  return {
    area: name,
    activeListings: active.length,
    averagePrice: rounded(average(prices)),
    medianPrice: median(prices),
    minPrice: prices.length > 0 ? Math.min(...prices) : null,
    maxPrice: prices.length > 0 ? Math.max(...prices) : null,
    pricePerSquareFoot: totalSquareFeet > 0 ? roundTo(totalSizedPrice / totalSquareFeet, 2) : null,
    amenityCount: resolveAll(view.snapshot.tables.amenity, view.index.amenitiesForArea(areaName)).length,
  };
}

export function computeAgentStats(view: StoreView, agentId: string): AgentStats {
  const { snapshot, index } = view;
  const agent = snapshot.tables.agent.get(agentId);
  if (!agent) {
    throw new NotFoundError('agent', agentId);
  }

  const sales = resolveAll(snapshot.tables.transaction, index.transactionsForAgent(agent.id));
  const closingPrices = sales.map((sale) => sale.closingPrice);
  const daysOnMarket = sales
    .map((sale) => sale.daysOnMarket)
    .filter((days): days is number => days !== undefined);

  const currentIds = index.listingsForAgent(agent.id);
  const active = resolveAll(snapshot.tables.listing, currentIds).filter((listing) => listing.status === 'active');

  return {
    agentId: agent.id,
    name: agent.name,
    specializations: agent.specializations,
    closedTransactions: sales.length,
    totalClosingVolume: closingPrices.reduce((sum, price) => sum + price, 0),
    averageClosingPrice: rounded(average(closingPrices)),
    averageDaysOnMarket: rounded(average(daysOnMarket)),
    activeListings: active.length,
    portfolioSize: new Set([...agent.portfolio, ...currentIds]).size,
    clientRating: rounded(average(agent.testimonials.map((testimonial) => testimonial.rating))),
  };
}

export function computePriceDistribution(
  view: StoreView,
  options: { area?: string; bucketSize?: number } = {}
): PriceDistribution {
  const bucketSize = options.bucketSize ?? DEFAULT_BUCKET_SIZE;
  if (!(bucketSize > 0) || !Number.isFinite(bucketSize)) {
    throw new InvalidCriteriaError([`bucketSize must be a positive number, got ${bucketSize}`]);
  }

  let area: string | null = null;
  let listings: Listing[];
  if (options.area !== undefined) {
    area = resolveAreaName(view, options.area);
    listings = activeListingsInArea(view, options.area);
  } else {
    listings = view.snapshot.tables.listing.records.filter((listing) => listing.status === 'active');
  }

  const buckets: PriceBucket[] = [];
  if (listings.length > 0) {
    const slots = listings.map((listing) => Math.floor(listing.price / bucketSize));
    const first = Math.min(...slots);
    const last = Math.max(...slots);
    const span = last - first + 1;
    if (span > MAX_PRICE_BUCKETS) {
      throw new InvalidCriteriaError([
        `bucketSize ${bucketSize} would produce ${span} buckets; the limit is ${MAX_PRICE_BUCKETS}`,
      ]);
    }
    for (let slot = first; slot <= last; slot++) {
      buckets.push({ min: slot * bucketSize, max: (slot + 1) * bucketSize, count: 0 });
    }
    for (const slot of slots) {
      buckets[slot - first].count++;
    }
  }

  return { area, bucketSize, total: listings.length, buckets };
}

export function salesInArea(view: StoreView, areaName: string): Transaction[] {
  return resolveAll(view.snapshot.tables.transaction, view.index.transactionsForArea(areaName));
}

export function computeMarketTrends(view: StoreView, areaName?: string): MarketTrends {
  const sales =
    areaName === undefined ? [...view.snapshot.tables.transaction.records] : salesInArea(view, areaName);
  const label = areaName === undefined ? 'All Areas' : resolveAreaName(view, areaName);

  const pricesPerSqft = sales
    .map((sale) => sale.pricePerSqft)
    .filter((value): value is number => value !== undefined);
  const daysOnMarket = sales
    .map((sale) => sale.daysOnMarket)
    .filter((days): days is number => days !== undefined);

  return {
    area: label,
    totalSales: sales.length,
    averageSalePrice: rounded(average(sales.map((sale) => sale.closingPrice))),
    averageDaysOnMarket: rounded(average(daysOnMarket)),
    averagePricePerSqft: rounded(average(pricesPerSqft)),
  };
}

/**
 * Persisted per-area market data, matched case-insensitively on the area name.
 */
export function areaMarketData(view: StoreView, areaName: string): Record<string, unknown> | null {
  const key = normalize(areaName);
  const entry = Object.entries(view.snapshot.market.areaPerformance).find(([name]) => normalize(name) === key);
  return entry ? entry[1] : null;
}
