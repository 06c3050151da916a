import { InvalidCriteriaError, NotFoundError } from '../../../errors';
import { CATALOG_EXTRAS, catalogCollections, fixedView, makeTransaction } from '../../../__fixtures__/catalog';
import { createSnapshot, viewOf } from '../../record-store';
import { AggregationEngine } from '../index';

describe('Aggregation Engine', () => {
  let engine: AggregationEngine;

  beforeEach(() => {
    engine = new AggregationEngine(fixedView());
  });

  describe('areaStats', () => {
    it('should summarize active listings in an area', () => {
      expect(engine.areaStats('Woodcrest')).toEqual({
        area: 'Woodcrest',
        activeListings: 2,
        averagePrice: 350000,
        medianPrice: 350000,
        minPrice: 300000,
        maxPrice: 400000,
        pricePerSquareFoot: 233.33,
        amenityCount: 2,
      });
    });

    it('should accept an area known only from its listings', () => {
      expect(engine.areaStats('old town')).toEqual({
        area: 'Old Town',
        activeListings: 0,
        averagePrice: null,
        medianPrice: null,
        minPrice: null,
        maxPrice: null,
        pricePerSquareFoot: null,
        amenityCount: 0,
      });
    });

    it('should throw NotFoundError for an unknown area', () => {
      expect(() => engine.areaStats('Atlantis')).toThrow(NotFoundError);
    });

    it('should not count an area used only by a transaction as known', () => {
      const collections = catalogCollections();
      const view = viewOf(
        createSnapshot(
          1,
          {
            ...collections,
            transaction: [...collections.transaction, makeTransaction('T9', { listingId: 'L99', area: 'Lakeshore' })],
          },
          CATALOG_EXTRAS
        )
      );
      const withSale = new AggregationEngine(fixedView(view));

      expect(() => withSale.areaStats('Lakeshore')).toThrow(NotFoundError);
      expect(() => withSale.marketTrends('Lakeshore')).toThrow(NotFoundError);
      expect(withSale.compareAreas(['Lakeshore']).missing).toEqual(['Lakeshore']);
    });
  });

  describe('agentStats', () => {
    it('should fold transactions, listings and testimonials', () => {
      expect(engine.agentStats('A1')).toEqual({
        agentId: 'A1',
        name: 'Sam Rivera',
        specializations: ['first-time buyers'],
        closedTransactions: 2,
        totalClosingVolume: 830000,
        averageClosingPrice: 415000,
        averageDaysOnMarket: 15,
        activeListings: 2,
        portfolioSize: 4,
        clientRating: 4.5,
      });
    });

    it('should report null averages when there is nothing to average', () => {
      const stats = engine.agentStats('A2');

      expect(stats.closedTransactions).toBe(1);
      expect(stats.activeListings).toBe(1);
      expect(stats.portfolioSize).toBe(2);
      expect(stats.clientRating).toBeNull();
    });

    it('should throw NotFoundError for an unknown agent', () => {
      expect(() => engine.agentStats('A404')).toThrow('No agent found for "A404"');
    });
  });

  describe('priceDistribution', () => {
    it('should count active listings per bucket', () => {
      expect(engine.priceDistribution()).toEqual({
        area: null,
        bucketSize: 250000,
        total: 3,
        buckets: [
          { min: 250000, max: 500000, count: 2 },
          { min: 500000, max: 750000, count: 1 },
        ],
      });
    });

    it('should keep empty buckets between occupied ones', () => {
      const { buckets } = engine.priceDistribution({ bucketSize: 100000 });

      expect(buckets.map((bucket) => [bucket.min, bucket.count])).toEqual([
        [300000, 1],
        [400000, 1],
        [500000, 0],
        [600000, 1],
      ]);
    });

    it('should restrict to one area', () => {
      const distribution = engine.priceDistribution({ area: 'woodcrest' });

      expect(distribution.area).toBe('Woodcrest');
      expect(distribution.buckets).toEqual([{ min: 250000, max: 500000, count: 2 }]);
    });

    it('should reject a non-positive bucket size', () => {
      expect(() => engine.priceDistribution({ bucketSize: 0 })).toThrow(InvalidCriteriaError);
    });

    it('should reject a bucket size that spans too many buckets', () => {
      expect(() => engine.priceDistribution({ bucketSize: 1 })).toThrow(InvalidCriteriaError);
      expect(() => engine.priceDistribution({ bucketSize: 0.001 })).toThrow(
        'Invalid criteria: bucketSize 0.001 would produce'
      );
    });
  });

  describe('marketTrends', () => {
    it('should summarize every sale when no area is given', () => {
      expect(engine.marketTrends()).toEqual({
        area: 'All Areas',
        totalSales: 3,
        averageSalePrice: 476666.67,
        averageDaysOnMarket: 23.33,
        averagePricePerSqft: 325,
      });
    });

    it('should place sales without an area by their listing', () => {
      expect(engine.marketTrends('woodcrest')).toEqual({
        area: 'Woodcrest',
        totalSales: 2,
        averageSalePrice: 415000,
        averageDaysOnMarket: 15,
        averagePricePerSqft: 250,
      });
    });
  });

  describe('areas and market documents', () => {
    it('should compare known areas and list unknown ones', () => {
      const comparison = engine.compareAreas(['Woodcrest', 'Atlantis', 'Harbor Point']);

      expect(comparison.areas.map((stats) => [stats.area, stats.pricePerSquareFoot])).toEqual([
        ['Woodcrest', 233.33],
        ['Harbor Point', 433.33],
      ]);
      expect(comparison.missing).toEqual(['Atlantis']);
    });

    it('should return the area record with its market data', () => {
      expect(engine.areaInfo('WOODCREST').marketData).toEqual({ median_price: 420000 });
      expect(engine.areaInfo('Harbor Point').marketData).toBeNull();
      expect(() => engine.areaInfo('Old Town')).toThrow(NotFoundError);
    });

    it('should group amenities by category', () => {
      const { area, amenities, total } = engine.areaAmenities('Woodcrest');

      expect(area).toBe('Woodcrest');
      expect(total).toBe(2);
      expect(amenities.school?.map((amenity) => amenity.id)).toEqual(['M1']);
      expect(amenities.park?.map((amenity) => amenity.id)).toEqual(['M2']);
      expect(amenities.shopping).toBeUndefined();
    });

    it('should expose the city and market documents', () => {
      expect(engine.cityOverview()).toEqual({
        cityName: 'Lakeview',
        population: 84000,
        schoolDistricts: [{ name: 'Lakeview Unified' }],
        marketTrends: {},
        areaCount: 2,
        activeListings: 3,
      });
      expect(engine.marketOverview()).toEqual(CATALOG_EXTRAS.market);
    });

    it('should expose price analytics and investment opportunities', () => {
      expect(engine.priceAnalytics()).toEqual({ price_per_sqft: 310 });
      expect(engine.investmentOpportunities()).toEqual({});
    });

    it('should list amenities of one category across the city', () => {
      expect(engine.amenitiesByCategory('shopping').map((amenity) => amenity.id)).toEqual(['M3']);
      expect(engine.amenitiesByCategory('healthcare')).toEqual([]);
    });
  });

  describe('reports', () => {
    it('should assemble an area report', () => {
      const report = engine.areaReport('Woodcrest');

      expect(report.area?.description).toBe('Leafy and residential');
      expect(report.marketData).toEqual({ median_price: 420000 });
      expect(report.stats.activeListings).toBe(2);
      expect(report.activeListings.map((listing) => listing.id)).toEqual(['L1', 'L2']);
      expect(report.recentSales.map((sale) => sale.id)).toEqual(['T3', 'T1']);
      expect(Object.keys(report.amenities)).toEqual(['school', 'park']);
      expect(report.trends.totalSales).toBe(2);
    });

    it('should report an area without a record', () => {
      const report = engine.areaReport('Old Town');

      expect(report.area).toBeNull();
      expect(report.marketData).toBeNull();
      expect(report.activeListings).toEqual([]);
      expect(report.recentSales).toEqual([]);
      expect(report.amenities).toEqual({});
    });

    it('should assemble an agent dashboard', () => {
      const dashboard = engine.agentDashboard('A1');

      expect(dashboard.agent.name).toBe('Sam Rivera');
      expect(dashboard.performance.closedTransactions).toBe(2);
      expect(dashboard.activeListings.map((listing) => listing.id)).toEqual(['L1', 'L2']);
      expect(dashboard.clients.map((client) => client.id)).toEqual(['C1']);
      expect(dashboard.recentSales.map((sale) => sale.id)).toEqual(['T3', 'T1']);
    });

    it('should assemble listing insights without the listing\'s own sale', () => {
      const insights = engine.listingInsights('L1');

      expect(insights.agent?.id).toBe('A1');
      expect(insights.area?.name).toBe('Woodcrest');
      expect(insights.marketData).toEqual({ median_price: 420000 });
      expect(insights.comparableSales.map((sale) => sale.id)).toEqual(['T1']);
      expect(insights.amenities.map((amenity) => amenity.id)).toEqual(['M1', 'M2']);
    });

    it('should throw NotFoundError for unknown report subjects', () => {
      expect(() => engine.areaReport('Atlantis')).toThrow(NotFoundError);
      expect(() => engine.agentDashboard('A404')).toThrow(NotFoundError);
      expect(() => engine.listingInsights('L404')).toThrow(NotFoundError);
    });
  });
});
