/**
 * Tool registry: one entry per MCP tool, pairing the advertised JSON schema with
 * the zod schema its arguments are checked against.
 */

import { z } from 'zod';
import { AMENITY_CATEGORIES } from '../../types';
import type { AggregationEngine } from '../aggregation-engine';
import type { FilterEngine } from '../filter-engine';
import { parseCriteria } from '../filter-engine';
import type { MatchingEngine } from '../matching-engine';
import type { RecordStore } from '../record-store';

export interface McpTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface RealtyEngines {
  store: RecordStore;
  filter: FilterEngine;
  matching: MatchingEngine;
  aggregation: AggregationEngine;
}

export interface ToolHandler {
  tool: McpTool;
  /**
   * Validate raw arguments and run the tool.
   * @throws ZodError for malformed arguments
   */
  call(args: unknown): Promise<unknown>;
}

function defineTool<S extends z.ZodTypeAny>(
  tool: McpTool,
  args: S,
  run: (args: z.output<S>) => unknown
): ToolHandler {
  return {
    tool,
    call: async (raw) => run(args.parse(raw ?? {})),
  };
}

const id = z.string().trim().min(1);
const limit = z.number().int().positive().optional();
const score = z.number().min(0).max(100).optional();
const weight = z.number().min(0).max(3).optional();

const MatchOptionsArgs = {
  minScore: score,
  limit,
  includeInactive: z.boolean().optional(),
};

const matchOptionProperties = {
  minScore: { type: 'number', description: 'Drop results scoring below this (0-100)' },
  limit: { type: 'number' },
  includeInactive: { type: 'boolean', description: 'Also score pending and sold listings' },
};

export function buildTools({ store, filter, matching, aggregation }: RealtyEngines): ToolHandler[] {
  return [
    // --- Listings ---
    defineTool(
      {
        name: 'search_properties',
        description: 'Free-text search over listing address, description and features',
        inputSchema: {
          type: 'object',
          properties: {
            query: { type: 'string' },
            limit: { type: 'number', default: 20 },
          },
          required: ['query'],
        },
      },
      z.object({ query: z.string(), limit }),
      ({ query, limit: max }) => filter.search(query).slice(0, max ?? 20)
    ),
    defineTool(
      {
        name: 'filter_properties',
        description: 'Filter listings by price, rooms, size, type, status, area and features',
        inputSchema: {
          type: 'object',
          properties: {
            minPrice: { type: 'number' },
            maxPrice: { type: 'number' },
            minBedrooms: { type: 'number' },
            maxBedrooms: { type: 'number' },
            minBathrooms: { type: 'number' },
            maxBathrooms: { type: 'number' },
            minSquareFeet: { type: 'number' },
            maxSquareFeet: { type: 'number' },
            propertyTypes: { type: 'array', items: { type: 'string' } },
            statuses: { type: 'array', items: { type: 'string', enum: ['active', 'pending', 'sold'] } },
            areas: { type: 'array', items: { type: 'string' } },
            features: { type: 'array', items: { type: 'string' } },
            text: { type: 'string' },
            sort: { type: 'string', enum: ['price-asc', 'price-desc'] },
            limit: { type: 'number' },
          },
        },
      },
      // Criteria are checked by the filter engine so contradictions surface as InvalidCriteria.
      z.record(z.unknown()),
      (args) => filter.filter(parseCriteria(args))
    ),
    defineTool(
      {
        name: 'get_property',
        description: 'Get one listing by id',
        inputSchema: { type: 'object', properties: { propertyId: { type: 'string' } }, required: ['propertyId'] },
      },
      z.object({ propertyId: id }),
      ({ propertyId }) => store.get('listing', propertyId)
    ),
    defineTool(
      {
        name: 'get_property_insights',
        description: 'A listing with its agent, area, market data, comparable sales and nearby amenities',
        inputSchema: { type: 'object', properties: { propertyId: { type: 'string' } }, required: ['propertyId'] },
      },
      z.object({ propertyId: id }),
      ({ propertyId }) => aggregation.listingInsights(propertyId)
    ),

    // --- Agents & clients ---
    defineTool(
      {
        name: 'search_agents',
        description: 'Find agents by name, specialization, expertise area or bio',
        inputSchema: { type: 'object', properties: { query: { type: 'string' } }, required: ['query'] },
      },
      z.object({ query: z.string() }),
      ({ query }) => filter.searchAgents(query)
    ),
    defineTool(
      {
        name: 'get_agent',
        description: 'Get one agent profile by id',
        inputSchema: { type: 'object', properties: { agentId: { type: 'string' } }, required: ['agentId'] },
      },
      z.object({ agentId: id }),
      ({ agentId }) => store.get('agent', agentId)
    ),
    defineTool(
      {
        name: 'get_agent_performance',
        description: 'Closed sales, volume, days on market and client rating for an agent',
        inputSchema: { type: 'object', properties: { agentId: { type: 'string' } }, required: ['agentId'] },
      },
      z.object({ agentId: id }),
      ({ agentId }) => aggregation.agentStats(agentId)
    ),
    defineTool(
      {
        name: 'get_agent_dashboard',
        description: 'An agent with performance, active listings, clients and recent sales',
        inputSchema: { type: 'object', properties: { agentId: { type: 'string' } }, required: ['agentId'] },
      },
      z.object({ agentId: id }),
      ({ agentId }) => aggregation.agentDashboard(agentId)
    ),
    defineTool(
      {
        name: 'get_client',
        description: 'Get one client with preferences and match history',
        inputSchema: { type: 'object', properties: { clientId: { type: 'string' } }, required: ['clientId'] },
      },
      z.object({ clientId: id }),
      ({ clientId }) => store.get('client', clientId)
    ),

    // --- Matching ---
    defineTool(
      {
        name: 'match_client_properties',
        description: "Rank listings by fit to a stored client's preferences",
        inputSchema: {
          type: 'object',
          properties: { clientId: { type: 'string' }, ...matchOptionProperties },
          required: ['clientId'],
        },
      },
      z.object({ clientId: id, ...MatchOptionsArgs }),
      ({ clientId, ...options }) => matching.match(clientId, options)
    ),
    defineTool(
      {
        name: 'match_preferences',
        description: 'Rank listings by fit to ad hoc preferences',
        inputSchema: {
          type: 'object',
          properties: {
            minPrice: { type: 'number' },
            maxPrice: { type: 'number' },
            minBedrooms: { type: 'number' },
            areas: { type: 'array', items: { type: 'string' } },
            propertyTypes: { type: 'array', items: { type: 'string' } },
            weights: {
              type: 'object',
              description: 'Multipliers (0-3) on the base component weights',
              properties: {
                price: { type: 'number' },
                bedrooms: { type: 'number' },
                area: { type: 'number' },
                type: { type: 'number' },
              },
            },
            ...matchOptionProperties,
          },
        },
      },
      z
        .object({
          minPrice: z.number().nonnegative().optional(),
          maxPrice: z.number().nonnegative().optional(),
          minBedrooms: z.number().nonnegative().optional(),
          areas: z.array(z.string()).optional(),
          propertyTypes: z.array(z.string()).optional(),
          weights: z.object({ price: weight, bedrooms: weight, area: weight, type: weight }).optional(),
          ...MatchOptionsArgs,
        })
        .refine((args) => args.minPrice === undefined || args.maxPrice === undefined || args.minPrice <= args.maxPrice, {
          message: 'minPrice is greater than maxPrice',
        }),
      ({ minPrice, maxPrice, minBedrooms, areas, propertyTypes, weights, ...options }) =>
        matching.matchPreferences(
          {
            priceRange: { min: minPrice, max: maxPrice },
            minBedrooms,
            desiredAreas: areas,
            propertyTypes,
            weightHints: weights,
          },
          options
        )
    ),

    // --- Areas & market ---
    defineTool(
      {
        name: 'get_area_info',
        description: 'Area profile with its persisted market data',
        inputSchema: { type: 'object', properties: { areaName: { type: 'string' } }, required: ['areaName'] },
      },
      z.object({ areaName: id }),
      ({ areaName }) => aggregation.areaInfo(areaName)
    ),
    defineTool(
      {
        name: 'get_area_stats',
        description: 'Active listing count, price statistics and amenity count for an area',
        inputSchema: { type: 'object', properties: { areaName: { type: 'string' } }, required: ['areaName'] },
      },
      z.object({ areaName: id }),
      ({ areaName }) => aggregation.areaStats(areaName)
    ),
    defineTool(
      {
        name: 'compare_areas',
        description: 'Side-by-side statistics for several areas',
        inputSchema: {
          type: 'object',
          properties: { areaNames: { type: 'array', items: { type: 'string' } } },
          required: ['areaNames'],
        },
      },
      z.object({ areaNames: z.array(id).min(1) }),
      ({ areaNames }) => aggregation.compareAreas(areaNames)
    ),
    defineTool(
      {
        name: 'get_area_report',
        description: 'Full area report: profile, market data, statistics, listings, sales, amenities and trends',
        inputSchema: { type: 'object', properties: { areaName: { type: 'string' } }, required: ['areaName'] },
      },
      z.object({ areaName: id }),
      ({ areaName }) => aggregation.areaReport(areaName)
    ),
    defineTool(
      {
        name: 'get_area_amenities',
        description: 'Amenities in an area grouped by category',
        inputSchema: { type: 'object', properties: { areaName: { type: 'string' } }, required: ['areaName'] },
      },
      z.object({ areaName: id }),
      ({ areaName }) => aggregation.areaAmenities(areaName)
    ),
    defineTool(
      {
        name: 'get_amenities_by_category',
        description: 'Every amenity of one category across the city',
        inputSchema: {
          type: 'object',
          properties: { category: { type: 'string', enum: [...AMENITY_CATEGORIES] } },
          required: ['category'],
        },
      },
      z.object({ category: z.enum(AMENITY_CATEGORIES) }),
      ({ category }) => aggregation.amenitiesByCategory(category)
    ),
    defineTool(
      {
        name: 'get_market_trends',
        description: 'Sale count, average sale price, days on market and price per square foot',
        inputSchema: { type: 'object', properties: { areaName: { type: 'string', description: 'Omit for all areas' } } },
      },
      z.object({ areaName: id.optional() }),
      ({ areaName }) => aggregation.marketTrends(areaName)
    ),
    defineTool(
      {
        name: 'get_price_distribution',
        description: 'Active listing counts per price bucket',
        inputSchema: {
          type: 'object',
          properties: {
            areaName: { type: 'string' },
            bucketSize: { type: 'number', default: 250000 },
          },
        },
      },
      z.object({ areaName: id.optional(), bucketSize: z.number().positive().optional() }),
      ({ areaName, bucketSize }) => aggregation.priceDistribution({ area: areaName, bucketSize })
    ),
    defineTool(
      {
        name: 'get_market_overview',
        description: 'City overview and the persisted market analytics',
        inputSchema: { type: 'object', properties: {} },
      },
      z.object({}),
      () => ({ city: aggregation.cityOverview(), market: aggregation.marketOverview() })
    ),
    defineTool(
      {
        name: 'get_price_analytics',
        description: 'Persisted price analytics from the market document',
        inputSchema: { type: 'object', properties: {} },
      },
      z.object({}),
      () => aggregation.priceAnalytics()
    ),
    defineTool(
      {
        name: 'get_investment_opportunities',
        description: 'Persisted investment opportunities from the market document',
        inputSchema: { type: 'object', properties: {} },
      },
      z.object({}),
      () => aggregation.investmentOpportunities()
    ),

    // --- Maintenance ---
    defineTool(
      {
        name: 'refresh_data',
        description: 'Reload every record category from storage',
        inputSchema: { type: 'object', properties: {} },
      },
      z.object({}),
      () => store.refresh()
    ),
  ];
}
