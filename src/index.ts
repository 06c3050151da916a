/**
 * Realty Atlas
 *
 * An in-memory knowledge base over listings, agents, clients, transactions,
 * areas and amenities, queried through filters, preference matching and
 * market statistics.
 *
 * Ground rules:
 * 1. Storage is read, never written.
 * 2. Every query answers from one consistent snapshot.
 * 3. A failed refresh changes nothing.
 * 4. "No matches" is a result; "no such record" is an error.
 */

// Types
export * from './types';

// Errors
export {
  RealtyError,
  NotFoundError,
  InvalidCriteriaError,
  LoadFailureError,
  isRealtyError,
} from './errors';
export type { RealtyErrorCode, LoadDiagnostic } from './errors';

// Configuration
export { loadConfig } from './config';
export type { RealtyConfig } from './config';

// Record Store (Module 1)
export {
  RecordStore,
  JsonDirectorySource,
  EntityTable,
  createSnapshot,
  emptySnapshot,
  createView,
  viewOf,
  loadSnapshot,
} from './modules/record-store';
export type {
  RecordSource,
  Snapshot,
  StoreView,
  SnapshotProvider,
  RefreshSummary,
  RecordStoreOptions,
} from './modules/record-store';

// Cross-Reference Index (Module 2)
export { CrossReferenceIndex, buildIndex } from './modules/cross-reference';
export type { IntegrityIssue, IntegrityIssueKind } from './modules/cross-reference';

// Filter Engine (Module 3)
export { FilterEngine, createFilterEngine, filterListings, parseCriteria } from './modules/filter-engine';
export type { ListingCriteria, ListingSort } from './modules/filter-engine';

// Matching Engine (Module 4)
export { MatchingEngine, createMatchingEngine, scoreListing, rankListings } from './modules/matching-engine';
export type { MatchOptions, MatchResult, ClientMatches, PreferenceInput } from './modules/matching-engine';

// Aggregation Engine (Module 5)
export { AggregationEngine, createAggregationEngine } from './modules/aggregation-engine';
export type {
  AreaStats,
  AgentStats,
  PriceDistribution,
  PriceBucket,
  MarketTrends,
  AreaComparison,
  AreaReport,
  AgentDashboard,
  ListingInsights,
} from './modules/aggregation-engine';

// MCP Service (Module 6)
export { McpService, createMcpService } from './modules/mcp-service';
export type {
  McpTool,
  McpResource,
  McpRequest,
  McpResponse,
  McpToolResult,
} from './modules/mcp-service';

// Initialize all modules
import { loadConfig } from './config';
import type { RealtyConfig } from './config';
import { createAggregationEngine } from './modules/aggregation-engine';
import { createFilterEngine } from './modules/filter-engine';
import { createMatchingEngine } from './modules/matching-engine';
import { createMcpService } from './modules/mcp-service';
import { JsonDirectorySource, RecordStore } from './modules/record-store';
import type { RecordSource } from './modules/record-store';

export interface InitOptions {
  config?: RealtyConfig;
  /** Defaults to the JSON files under `config.dataDir`. */
  source?: RecordSource;
}

/**
 * Initialize the complete system: load the first snapshot, then wire the
 * engines and the MCP service onto the store.
 *
 * @throws LoadFailureError when the first load fails; there is no earlier
 *   snapshot to fall back on
 */
export async function initRealty(options: InitOptions = {}) {
  const config = options.config ?? loadConfig();
  const source = options.source ?? new JsonDirectorySource(config.dataDir);

  // Record Store first (Module 1); the index is rebuilt with every snapshot
  const store = new RecordStore(source, { loadTimeoutMs: config.loadTimeoutMs });
  const initialLoad = await store.refresh();

  const filterEngine = createFilterEngine(store);
  const matchingEngine = createMatchingEngine(store);
  const aggregationEngine = createAggregationEngine(store);

  const mcpService = createMcpService({
    store,
    filter: filterEngine,
    matching: matchingEngine,
    aggregation: aggregationEngine,
  });

  return {
    config,
    store,
    initialLoad,
    filterEngine,
    matchingEngine,
    aggregationEngine,
    mcpService,
  };
}

export type RealtyAtlas = Awaited<ReturnType<typeof initRealty>>;
