import * as path from 'path';
import { LoadFailureError } from '../../../errors';
import { HangingSource, MemorySource, persistedDocuments } from '../../../__fixtures__/catalog';
import { JsonDirectorySource, loadSnapshot } from '../index';

const FIXTURE_DIR = path.join(__dirname, '..', '..', '..', '__fixtures__', 'data');

describe('Snapshot Loader', () => {
  describe('JsonDirectorySource', () => {
    it('should map persisted records onto domain records', async () => {
      const snapshot = await loadSnapshot(new JsonDirectorySource(FIXTURE_DIR), 1, { timeoutMs: 1000 });

      const listing = snapshot.tables.listing.get('L1');
      expect(listing).toMatchObject({
        address: '1 Oak Street',
        price: 400000,
        squareFeet: 2000,
        propertyType: 'single_family',
        status: 'active',
        agentId: 'A1',
        features: ['garage'],
      });
    });

    it('should stringify numeric ids and apply defaults', async () => {
      const snapshot = await loadSnapshot(new JsonDirectorySource(FIXTURE_DIR), 1, { timeoutMs: 1000 });

      const listing = snapshot.tables.listing.get('7');
      expect(listing?.bathrooms).toBe(0);
      expect(listing?.squareFeet).toBe(0);
      expect(listing?.status).toBe('pending');
      expect(snapshot.tables.agent.get('A1')?.portfolio).toEqual(['L1', '7']);
    });

    it('should accept a bare array of records', async () => {
      const snapshot = await loadSnapshot(new JsonDirectorySource(FIXTURE_DIR), 1, { timeoutMs: 1000 });

      expect(snapshot.tables.transaction.size).toBe(1);
      expect(snapshot.tables.transaction.get('T1')).toMatchObject({ closingPrice: 450000, type: 'sale' });
    });

    it('should read the city overview from the areas document', async () => {
      const snapshot = await loadSnapshot(new JsonDirectorySource(FIXTURE_DIR), 1, { timeoutMs: 1000 });

      expect(snapshot.city).toMatchObject({ cityName: 'Lakeview', population: 84000 });
      expect(snapshot.tables.area.get('woodcrest')?.walkabilityScore).toBe(62);
    });

    it('should skip bad records and missing categories with diagnostics', async () => {
      const snapshot = await loadSnapshot(new JsonDirectorySource(FIXTURE_DIR), 1, { timeoutMs: 1000 });

      expect(snapshot.tables.listing.records.map((listing) => listing.id)).toEqual(['L1', '7']);
      expect(snapshot.tables.client.size).toBe(0);
      expect(snapshot.tables.amenity.size).toBe(0);

      expect(
        snapshot.diagnostics.map((d) => [d.category, d.severity, d.recordIndex])
      ).toEqual([
        ['properties', 'warning', 1],
        ['properties', 'warning', 2],
        ['clients', 'error', undefined],
        ['amenities', 'error', undefined],
        ['market', 'warning', undefined],
      ]);
      expect(snapshot.diagnostics[0].message).toMatch(/^Skipped malformed record: price: /);
      expect(snapshot.diagnostics[1].message).toBe('Skipped record with duplicate key "L1"');
      expect(snapshot.diagnostics[2].message).toMatch(/^Could not read clients\/client_database\.json: /);
    });
  });

  describe('failures', () => {
    it('should fail when no entity category can be read', async () => {
      const load = loadSnapshot(new MemorySource({}), 1, { timeoutMs: 1000 });

      await expect(load).rejects.toBeInstanceOf(LoadFailureError);
      await expect(load).rejects.toMatchObject({
        message: 'No record category could be read from memory source',
      });
    });

    it('should report every unreadable category on the failure', async () => {
      const error = await loadSnapshot(new MemorySource({}), 1, { timeoutMs: 1000 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LoadFailureError);
      if (error instanceof LoadFailureError) {
        expect(error.diagnostics.map((d) => d.category)).toEqual([
          'properties',
          'agents',
          'clients',
          'transactions',
          'areas',
          'amenities',
        ]);
      }
    });

    it('should fail when reading exceeds the timeout', async () => {
      const load = loadSnapshot(new HangingSource(), 1, { timeoutMs: 20 });

      await expect(load).rejects.toBeInstanceOf(LoadFailureError);
      await expect(load).rejects.toMatchObject({
        message: 'Could not load records: Reading from hanging source exceeded 20ms',
      });
    });

    it('should treat a document without a record array as unreadable', async () => {
      const documents = persistedDocuments();
      documents.properties = { listings: [] };

      const snapshot = await loadSnapshot(new MemorySource(documents), 1, { timeoutMs: 1000 });

      expect(snapshot.tables.listing.size).toBe(0);
      expect(snapshot.diagnostics).toEqual([
        {
          category: 'properties',
          severity: 'error',
          message: 'Expected an array of records under "active_listings" in properties/active_listings.json',
        },
      ]);
    });

    it('should keep the analytics sections of the market and city documents', async () => {
      const documents = persistedDocuments();
      documents.market = {
        market_overview: {},
        price_analytics: { price_per_sqft: 310 },
        investment_opportunities: { emerging_areas: ['Old Town'] },
      };
      documents.areas = {
        city_name: 'Lakeview',
        school_districts: [{ name: 'Lakeview Unified' }],
        market_trends: { direction: 'up' },
        areas: [{ name: 'Woodcrest' }],
      };

      const snapshot = await loadSnapshot(new MemorySource(documents), 1, { timeoutMs: 1000 });

      expect(snapshot.market.priceAnalytics).toEqual({ price_per_sqft: 310 });
      expect(snapshot.market.investmentOpportunities).toEqual({ emerging_areas: ['Old Town'] });
      expect(snapshot.city.schoolDistricts).toEqual([{ name: 'Lakeview Unified' }]);
      expect(snapshot.city.marketTrends).toEqual({ direction: 'up' });
    });

    it('should ignore a malformed market document', async () => {
      const documents = persistedDocuments();
      documents.market = { area_performance: 'strong' };

      const snapshot = await loadSnapshot(new MemorySource(documents), 1, { timeoutMs: 1000 });

      expect(snapshot.market).toEqual({
        overview: {},
        areaPerformance: {},
        priceAnalytics: {},
        investmentOpportunities: {},
      });
      expect(snapshot.diagnostics).toHaveLength(1);
      expect(snapshot.diagnostics[0]).toMatchObject({ category: 'market', severity: 'warning' });
    });
  });
});
