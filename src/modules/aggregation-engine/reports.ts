/**
 * Composite reports. Each report is assembled from a single view so its parts
 * always agree with each other.
 */

import { NotFoundError } from '../../errors';
import type { Agent, Amenity, AmenityCategory, Area, Client, Listing, Transaction } from '../../types';
import { groupBy } from '../../utils';
import type { StoreView } from '../record-store';
import {
  activeListingsInArea,
  areaMarketData,
  computeAgentStats,
  computeAreaStats,
  computeMarketTrends,
  resolveAll,
  salesInArea,
} from './stats';
import type { AgentStats, AreaStats, MarketTrends } from './stats';

/** Sales shown in a report, most recent first. */
export const RECENT_SALES_LIMIT = 5;

export type AmenitiesByCategory = Partial<Record<AmenityCategory, Amenity[]>>;

export interface AreaReport {
  area: Area | null;
  marketData: Record<string, unknown> | null;
  stats: AreaStats;
  activeListings: Listing[];
  recentSales: Transaction[];
  amenities: AmenitiesByCategory;
  trends: MarketTrends;
}

export interface AgentDashboard {
  agent: Agent;
  performance: AgentStats;
  activeListings: Listing[];
  clients: Client[];
  recentSales: Transaction[];
}

export interface ListingInsights {
  listing: Listing;
  agent: Agent | null;
  area: Area | null;
  marketData: Record<string, unknown> | null;
  /** Other sales in the listing's area, most recent first. */
  comparableSales: Transaction[];
  amenities: Amenity[];
}

function mostRecent(sales: readonly Transaction[], limit = RECENT_SALES_LIMIT): Transaction[] {
  return [...sales].sort((a, b) => b.closingDate.localeCompare(a.closingDate)).slice(0, limit);
}

export function amenitiesInArea(view: StoreView, areaName: string): Amenity[] {
  return resolveAll(view.snapshot.tables.amenity, view.index.amenitiesForArea(areaName));
}

export function groupAmenities(amenities: readonly Amenity[]): AmenitiesByCategory {
  return groupBy(amenities, (amenity) => amenity.category);
}

export function buildAreaReport(view: StoreView, areaName: string): AreaReport {
  // Raises NotFound before anything else is assembled.
  const stats = computeAreaStats(view, areaName);

  return {
    area: view.snapshot.tables.area.get(areaName) ?? null,
    marketData: areaMarketData(view, areaName),
    stats,
    activeListings: activeListingsInArea(view, areaName),
    recentSales: mostRecent(salesInArea(view, areaName)),
    amenities: groupAmenities(amenitiesInArea(view, areaName)),
    trends: computeMarketTrends(view, areaName),
  };
}

export function buildAgentDashboard(view: StoreView, agentId: string): AgentDashboard {
  const { snapshot, index } = view;
  const performance = computeAgentStats(view, agentId);
  const agent = snapshot.tables.agent.get(performance.agentId);
  if (!agent) {
    throw new NotFoundError('agent', agentId);
  }

  return {
    agent,
    performance,
    activeListings: resolveAll(snapshot.tables.listing, index.listingsForAgent(agent.id)).filter(
      (listing) => listing.status === 'active'
    ),
    clients: resolveAll(snapshot.tables.client, index.clientsForAgent(agent.id)),
    recentSales: mostRecent(resolveAll(snapshot.tables.transaction, index.transactionsForAgent(agent.id))),
  };
}

export function buildListingInsights(view: StoreView, listingId: string): ListingInsights {
  const { snapshot } = view;
  const listing = snapshot.tables.listing.get(listingId);
  if (!listing) {
    throw new NotFoundError('listing', listingId);
  }

  const comparableSales = salesInArea(view, listing.area).filter((sale) => sale.listingId !== listing.id);

  return {
    listing,
    agent: snapshot.tables.agent.get(listing.agentId) ?? null,
    area: snapshot.tables.area.get(listing.area) ?? null,
    marketData: areaMarketData(view, listing.area),
    comparableSales: mostRecent(comparableSales),
    amenities: amenitiesInArea(view, listing.area),
  };
}
