import { MemorySource, persistedDocuments } from '../../../__fixtures__/catalog';
import { createAggregationEngine } from '../../aggregation-engine';
import { createFilterEngine } from '../../filter-engine';
import { createMatchingEngine } from '../../matching-engine';
import { RecordStore } from '../../record-store';
import { McpService } from '../index';
import type { McpRequest } from '../index';

function request(method: string, params?: Record<string, unknown>): McpRequest {
  return { jsonrpc: '2.0', id: 1, method, params };
}

describe('MCP Service', () => {
  let source: MemorySource;
  let service: McpService;

  async function call(name: string, args?: unknown): Promise<{ body: unknown; isError?: boolean }> {
    const result = await service.callTool(name, args);
    const body: unknown = JSON.parse(result.content[0].text);
    return { body, isError: result.isError };
  }

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    source = new MemorySource(persistedDocuments());
    const store = new RecordStore(source, { loadTimeoutMs: 1000 });
    await store.refresh();

    service = new McpService({
      store,
      filter: createFilterEngine(store),
      matching: createMatchingEngine(store),
      aggregation: createAggregationEngine(store),
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('protocol', () => {
    it('should answer initialize and ping', async () => {
      const init = await service.handleRequest(request('initialize'));
      expect(init.result).toMatchObject({ serverInfo: { name: 'realty-atlas' } });

      const ping = await service.handleRequest(request('ping'));
      expect(ping).toEqual({ jsonrpc: '2.0', id: 1, result: { pong: true } });
    });

    it('should list every tool', async () => {
      expect(service.listTools().map((tool) => tool.name)).toEqual([
        'search_properties',
        'filter_properties',
        'get_property',
        'get_property_insights',
        'search_agents',
        'get_agent',
        'get_agent_performance',
        'get_agent_dashboard',
        'get_client',
        'match_client_properties',
        'match_preferences',
        'get_area_info',
        'get_area_stats',
        'compare_areas',
        'get_area_report',
        'get_area_amenities',
        'get_amenities_by_category',
        'get_market_trends',
        'get_price_distribution',
        'get_market_overview',
        'get_price_analytics',
        'get_investment_opportunities',
        'refresh_data',
      ]);
    });

    it('should reject unknown methods with -32601', async () => {
      const response = await service.handleRequest(request('prompts/list'));
      expect(response.error).toEqual({ code: -32601, message: 'Method not found: prompts/list' });
    });

    it('should reject a body that is not a JSON-RPC request with -32600', async () => {
      const response = await service.handleMessage({ method: 'ping' });
      expect(response.id).toBeNull();
      expect(response.error?.code).toBe(-32600);
    });

    it('should reject unknown tools with -32602', async () => {
      const response = await service.handleRequest(request('tools/call', { name: 'sell_house' }));
      expect(response.error).toMatchObject({ code: -32602, message: 'Unknown tool: sell_house' });
    });

    it('should reject malformed tool arguments with -32602', async () => {
      const response = await service.handleRequest(request('tools/call', { name: 'get_property', arguments: {} }));
      expect(response.error).toMatchObject({
        code: -32602,
        message: 'Invalid arguments for get_property: propertyId: Required',
      });
    });

    it('should reject a contradictory price range in match_preferences with -32602', async () => {
      const response = await service.handleRequest(
        request('tools/call', { name: 'match_preferences', arguments: { minPrice: 5, maxPrice: 1 } })
      );
      expect(response.error?.code).toBe(-32602);
    });
  });

  describe('tools', () => {
    it('should return a record as a text result', async () => {
      const { body, isError } = await call('get_property', { propertyId: 'L1' });

      expect(isError).toBeUndefined();
      expect(body).toMatchObject({ id: 'L1', address: '1 Oak Street', squareFeet: 2000 });
    });

    it('should report a missing record as an error result', async () => {
      const { body, isError } = await call('get_property', { propertyId: 'L404' });

      expect(isError).toBe(true);
      expect(body).toEqual({
        error: 'NOT_FOUND',
        message: 'No listing found for "L404"',
        details: { entityType: 'listing', key: 'L404' },
      });
    });

    it('should tell "no matches" apart from invalid criteria', async () => {
      const empty = await call('filter_properties', { minPrice: 900000 });
      expect(empty).toEqual({ body: [], isError: undefined });

      const invalid = await call('filter_properties', { minPrice: 5, maxPrice: 1 });
      expect(invalid.isError).toBe(true);
      expect(invalid.body).toMatchObject({
        error: 'INVALID_CRITERIA',
        details: { problems: ['minPrice (5) is greater than maxPrice (1)'] },
      });
    });

    it('should filter listings', async () => {
      const { body } = await call('filter_properties', { maxPrice: 350000 });

      expect(body).toMatchObject([{ id: 'L2' }]);
    });

    it('should compute area statistics', async () => {
      const { body } = await call('get_area_stats', { areaName: 'woodcrest' });

      expect(body).toMatchObject({ area: 'Woodcrest', activeListings: 2, averagePrice: 350000 });
    });

    it('should list amenities by category and reject unknown categories', async () => {
      expect(await call('get_amenities_by_category', { category: 'park' })).toEqual({ body: [], isError: undefined });

      const response = await service.handleRequest(
        request('tools/call', { name: 'get_amenities_by_category', arguments: { category: 'zoo' } })
      );
      expect(response.error?.code).toBe(-32602);
    });

    it('should reject a price distribution that spans too many buckets as an error result', async () => {
      const { body, isError } = await call('get_price_distribution', { bucketSize: 0.001 });

      expect(isError).toBe(true);
      expect(body).toMatchObject({ error: 'INVALID_CRITERIA' });
    });

    it('should reload data on refresh_data', async () => {
      const { body } = await call('refresh_data');
      expect(body).toMatchObject({ generation: 2 });

      source.documents = {};
      const failed = await call('refresh_data');
      expect(failed.isError).toBe(true);
      expect(failed.body).toMatchObject({ error: 'LOAD_FAILURE' });
    });
  });

  describe('resources', () => {
    it('should list collection and document resources', async () => {
      expect(service.listResources().map((resource) => resource.uri)).toEqual([
        'realty://listings',
        'realty://agents',
        'realty://clients',
        'realty://transactions',
        'realty://areas',
        'realty://amenities',
        'realty://market',
        'realty://city',
      ]);
    });

    it('should read a collection resource', async () => {
      const response = await service.handleRequest(request('resources/read', { uri: 'realty://listings' }));

      expect(response.result).toMatchObject({
        contents: [{ uri: 'realty://listings', mimeType: 'application/json' }],
      });
    });

    it('should reject unknown resources with -32602', async () => {
      const response = await service.handleRequest(request('resources/read', { uri: 'realty://boats' }));
      expect(response.error).toMatchObject({ code: -32602, message: 'Unknown resource: realty://boats' });
    });
  });
});
