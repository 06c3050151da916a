/**
 * Snapshot: one complete, immutable set of entity collections.
 */

import type { LoadDiagnostic } from '../../errors';
import type { CityOverview, EntityMap, EntityType, MarketAnalytics } from '../../types';
import { normalize } from '../../utils';

/**
 * Insertion-ordered records with keyed lookup. The first record wins when two
 * share a key.
 */
export class EntityTable<T> {
  readonly records: readonly T[];
  private readonly byKey = new Map<string, T>();

  constructor(
    records: readonly T[],
    keyOf: (record: T) => string,
    private readonly normalizeKey: (key: string) => string = (key) => key
  ) {
    this.records = Object.freeze([...records]);
    for (const record of this.records) {
      const key = keyOf(record);
      if (!this.byKey.has(key)) {
        this.byKey.set(key, record);
      }
    }
  }

  get(key: string): T | undefined {
    return this.byKey.get(this.normalizeKey(key));
  }

  has(key: string): boolean {
    return this.byKey.has(this.normalizeKey(key));
  }

  get size(): number {
    return this.records.length;
  }
}

export type EntityTables = { [K in EntityType]: EntityTable<EntityMap[K]> };

export type EntityCollections = { [K in EntityType]: readonly EntityMap[K][] };

/** Key each record is stored under. Areas are keyed by normalized name. */
export const KEY_OF: { [K in EntityType]: (record: EntityMap[K]) => string } = {
  listing: (listing) => listing.id,
  agent: (agent) => agent.id,
  client: (client) => client.id,
  transaction: (transaction) => transaction.id,
  area: (area) => normalize(area.name),
  amenity: (amenity) => amenity.id,
};

export interface Snapshot {
  /** 0 for the empty snapshot a store starts with; +1 per successful refresh. */
  readonly generation: number;
  readonly loadedAt: Date;
  readonly tables: EntityTables;
  readonly city: CityOverview;
  readonly market: MarketAnalytics;
  readonly diagnostics: readonly LoadDiagnostic[];
}

export interface SnapshotExtras {
  loadedAt?: Date;
  city?: CityOverview;
  market?: MarketAnalytics;
  diagnostics?: readonly LoadDiagnostic[];
}

export function createSnapshot(
  generation: number,
  collections: Partial<EntityCollections>,
  extras: SnapshotExtras = {}
): Snapshot {
  return Object.freeze({
    generation,
    loadedAt: extras.loadedAt ?? new Date(),
    tables: Object.freeze({
      listing: new EntityTable(collections.listing ?? [], KEY_OF.listing),
      agent: new EntityTable(collections.agent ?? [], KEY_OF.agent),
      client: new EntityTable(collections.client ?? [], KEY_OF.client),
      transaction: new EntityTable(collections.transaction ?? [], KEY_OF.transaction),
      area: new EntityTable(collections.area ?? [], KEY_OF.area, normalize),
      amenity: new EntityTable(collections.amenity ?? [], KEY_OF.amenity),
    }),
    city: extras.city ?? {},
    market: extras.market ?? {
      overview: {},
      areaPerformance: {},
      priceAnalytics: {},
      investmentOpportunities: {},
    },
    diagnostics: Object.freeze([...(extras.diagnostics ?? [])]),
  });
}

export function emptySnapshot(): Snapshot {
  return createSnapshot(0, {});
}

export function countRecords(snapshot: Snapshot): Record<EntityType, number> {
  const { tables } = snapshot;
  return {
    listing: tables.listing.size,
    agent: tables.agent.size,
    client: tables.client.size,
    transaction: tables.transaction.size,
    area: tables.area.size,
    amenity: tables.amenity.size,
  };
}
