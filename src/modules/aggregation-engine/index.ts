/**
 * Aggregation Engine Module
 *
 * Purpose: derived statistics and composite reports over the current view
 * Dependencies: Record Store (current view), Cross-Reference Index
 *
 * Nothing is cached: every call folds over the view it captured at its start.
 */

import { NotFoundError } from '../../errors';
import type { Amenity, AmenityCategory, Area, CityOverview, MarketAnalytics } from '../../types';
import type { SnapshotProvider } from '../record-store';
import {
  amenitiesInArea,
  buildAgentDashboard,
  buildAreaReport,
  buildListingInsights,
  groupAmenities,
} from './reports';
import type { AgentDashboard, AmenitiesByCategory, AreaReport, ListingInsights } from './reports';
import {
  areaMarketData,
  computeAgentStats,
  computeAreaStats,
  computeMarketTrends,
  computePriceDistribution,
  resolveAreaName,
} from './stats';
import type { AgentStats, AreaStats, MarketTrends, PriceDistribution } from './stats';

export * from './stats';
export * from './reports';

export interface AreaComparison {
  areas: AreaStats[];
  /** Requested names that matched no area record and no listing. */
  missing: string[];
}

export interface CitySummary extends CityOverview {
  schoolDistricts: Record<string, unknown>[];
  marketTrends: Record<string, unknown>;
  areaCount: number;
  activeListings: number;
}

export class AggregationEngine {
  constructor(private store: SnapshotProvider) {}

  /**
   * The area record with its persisted market data.
   * @throws NotFoundError when there is no area record under the name
   */
  areaInfo(areaName: string): { area: Area; marketData: Record<string, unknown> | null } {
    const view = this.store.current();
    const area = view.snapshot.tables.area.get(areaName);
    if (!area) {
      throw new NotFoundError('area', areaName);
    }
    return { area, marketData: areaMarketData(view, areaName) };
  }

  /**
   * @throws NotFoundError when neither an area record nor a listing uses the name
   */
  areaStats(areaName: string): AreaStats {
    return computeAreaStats(this.store.current(), areaName);
  }

  /**
   * @throws NotFoundError for an unknown agent id
   */
  agentStats(agentId: string): AgentStats {
    return computeAgentStats(this.store.current(), agentId);
  }

  priceDistribution(options: { area?: string; bucketSize?: number } = {}): PriceDistribution {
    return computePriceDistribution(this.store.current(), options);
  }

  marketTrends(areaName?: string): MarketTrends {
    return computeMarketTrends(this.store.current(), areaName);
  }

  compareAreas(areaNames: readonly string[]): AreaComparison {
    const view = this.store.current();
    const comparison: AreaComparison = { areas: [], missing: [] };

    for (const name of areaNames) {
      try {
        comparison.areas.push(computeAreaStats(view, name));
      } catch (error) {
        if (error instanceof NotFoundError) {
          comparison.missing.push(name);
        } else {
          throw error;
        }
      }
    }

    return comparison;
  }

  areaAmenities(areaName: string): { area: string; amenities: AmenitiesByCategory; total: number } {
    const view = this.store.current();
    const area = resolveAreaName(view, areaName);
    const amenities: Amenity[] = amenitiesInArea(view, areaName);
    return { area, amenities: groupAmenities(amenities), total: amenities.length };
  }

  /** Every amenity of one category, city-wide, in load order. */
  amenitiesByCategory(category: AmenityCategory): Amenity[] {
    return this.store
      .current()
      .snapshot.tables.amenity.records.filter((amenity) => amenity.category === category);
  }

  marketOverview(): MarketAnalytics {
    return this.store.current().snapshot.market;
  }

  priceAnalytics(): Record<string, unknown> {
    return this.store.current().snapshot.market.priceAnalytics;
  }

  investmentOpportunities(): Record<string, unknown> {
    return this.store.current().snapshot.market.investmentOpportunities;
  }

  cityOverview(): CitySummary {
    const { snapshot } = this.store.current();
    return {
      ...snapshot.city,
      schoolDistricts: snapshot.city.schoolDistricts ?? [],
      marketTrends: snapshot.city.marketTrends ?? {},
      areaCount: snapshot.tables.area.size,
      activeListings: snapshot.tables.listing.records.filter((listing) => listing.status === 'active').length,
    };
  }

  areaReport(areaName: string): AreaReport {
    return buildAreaReport(this.store.current(), areaName);
  }

  agentDashboard(agentId: string): AgentDashboard {
    return buildAgentDashboard(this.store.current(), agentId);
  }

  listingInsights(listingId: string): ListingInsights {
    return buildListingInsights(this.store.current(), listingId);
  }
}

export function createAggregationEngine(store: SnapshotProvider): AggregationEngine {
  return new AggregationEngine(store);
}
