/**
 * Snapshot loading.
 *
 * Categories are read and validated independently. A category that cannot be
 * read becomes an empty collection; a record that fails validation is skipped.
 * Both leave a diagnostic on the snapshot. The load as a whole fails only when
 * no entity category could be read, or when reading exceeds the timeout.
 */

import type { ZodError } from 'zod';
import { LoadFailureError } from '../../errors';
import type { LoadDiagnostic } from '../../errors';
import type { CityOverview, EntityMap, EntityType, MarketAnalytics } from '../../types';
import { errorMessage, withTimeout } from '../../utils';
import { createSnapshot, KEY_OF } from './snapshot';
import type { Snapshot } from './snapshot';
import type { RecordSource } from './source';
import { CATEGORY_FILES, CATEGORY_DEFINITIONS, CityOverviewSchema, MarketAnalyticsSchema } from './validators';
import type { CategoryDefinition } from './validators';

export interface LoadOptions {
  timeoutMs: number;
}

interface CollectionRead<T> {
  records: T[];
  /** The category document as read, for categories that carry more than records. */
  document: unknown;
  available: boolean;
  diagnostics: LoadDiagnostic[];
}

export async function loadSnapshot(
  source: RecordSource,
  generation: number,
  options: LoadOptions
): Promise<Snapshot> {
  try {
    return await withTimeout(
      (signal) => readSnapshot(source, generation, signal),
      options.timeoutMs,
      `Reading from ${source.description} exceeded ${options.timeoutMs}ms`
    );
  } catch (error) {
    if (error instanceof LoadFailureError) {
      throw error;
    }
    throw new LoadFailureError(`Could not load records: ${errorMessage(error)}`, [], { cause: error });
  }
}

async function readSnapshot(source: RecordSource, generation: number, signal: AbortSignal): Promise<Snapshot> {
  const [listings, agents, clients, transactions, areas, amenities, market] = await Promise.all([
    readCollection(source, 'listing', signal),
    readCollection(source, 'agent', signal),
    readCollection(source, 'client', signal),
    readCollection(source, 'transaction', signal),
    readCollection(source, 'area', signal),
    readCollection(source, 'amenity', signal),
    readMarket(source, signal),
  ]);

  const reads = [listings, agents, clients, transactions, areas, amenities];
  const diagnostics = reads.flatMap((read) => read.diagnostics);

  if (reads.every((read) => !read.available)) {
    throw new LoadFailureError(`No record category could be read from ${source.description}`, diagnostics);
  }

  const city = readCity(areas.document, diagnostics);
  diagnostics.push(...market.diagnostics);

  return createSnapshot(
    generation,
    {
      listing: listings.records,
      agent: agents.records,
      client: clients.records,
      transaction: transactions.records,
      area: areas.records,
      amenity: amenities.records,
    },
    { city, market: market.analytics, diagnostics }
  );
}

async function readCollection<K extends EntityType>(
  source: RecordSource,
  type: K,
  signal: AbortSignal
): Promise<CollectionRead<EntityMap[K]>> {
  const definition: CategoryDefinition<EntityMap[K]> = CATEGORY_DEFINITIONS[type];
  const keyOf: (record: EntityMap[K]) => string = KEY_OF[type];
  const diagnostics: LoadDiagnostic[] = [];

  let document: unknown;
  try {
    document = await source.read(definition.category, signal);
  } catch (error) {
    diagnostics.push({
      category: definition.category,
      severity: 'error',
      message: `Could not read ${definition.file}: ${errorMessage(error)}`,
    });
    return { records: [], document: undefined, available: false, diagnostics };
  }

  const rawRecords = extractRecords(document, definition.rootKey);
  if (!rawRecords) {
    diagnostics.push({
      category: definition.category,
      severity: 'error',
      message: `Expected an array of records under "${definition.rootKey}" in ${definition.file}`,
    });
    return { records: [], document, available: false, diagnostics };
  }

  const records: EntityMap[K][] = [];
  const seen = new Set<string>();

  rawRecords.forEach((raw, recordIndex) => {
    const parsed = definition.schema.safeParse(raw);
    if (!parsed.success) {
      diagnostics.push({
        category: definition.category,
        severity: 'warning',
        recordIndex,
        message: `Skipped malformed record: ${describeIssues(parsed.error)}`,
      });
      return;
    }

    const key = keyOf(parsed.data);
    if (seen.has(key)) {
      diagnostics.push({
        category: definition.category,
        severity: 'warning',
        recordIndex,
        message: `Skipped record with duplicate key "${key}"`,
      });
      return;
    }

    seen.add(key);
    records.push(parsed.data);
  });

  return { records, document, available: true, diagnostics };
}

async function readMarket(
  source: RecordSource,
  signal: AbortSignal
): Promise<{ analytics: MarketAnalytics; diagnostics: LoadDiagnostic[] }> {
  const empty: MarketAnalytics = {
    overview: {},
    areaPerformance: {},
    priceAnalytics: {},
    investmentOpportunities: {},
  };

  let document: unknown;
  try {
    document = await source.read('market', signal);
  } catch (error) {
    return {
      analytics: empty,
      diagnostics: [
        {
          category: 'market',
          severity: 'warning',
          message: `Could not read ${CATEGORY_FILES.market}: ${errorMessage(error)}`,
        },
      ],
    };
  }

  const parsed = MarketAnalyticsSchema.safeParse(document);
  if (!parsed.success) {
    return {
      analytics: empty,
      diagnostics: [
        {
          category: 'market',
          severity: 'warning',
          message: `Ignored malformed market document: ${describeIssues(parsed.error)}`,
        },
      ],
    };
  }

  return { analytics: parsed.data, diagnostics: [] };
}

function readCity(document: unknown, diagnostics: LoadDiagnostic[]): CityOverview {
  if (!isRecord(document)) {
    return {};
  }

  const parsed = CityOverviewSchema.safeParse(document);
  if (!parsed.success) {
    diagnostics.push({
      category: 'areas',
      severity: 'warning',
      message: `Ignored malformed city overview: ${describeIssues(parsed.error)}`,
    });
    return {};
  }
  return parsed.data;
}

function extractRecords(document: unknown, rootKey: string): unknown[] | null {
  if (Array.isArray(document)) {
    return document;
  }
  if (isRecord(document)) {
    const records = document[rootKey];
    if (Array.isArray(records)) {
      return records;
    }
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(record)'}: ${issue.message}`)
    .join('; ');
}
