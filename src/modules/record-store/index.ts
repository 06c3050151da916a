/**
 * Record Store Module
 *
 * Purpose: own the active snapshot of every entity collection
 * Dependencies: a RecordSource, Cross-Reference Index
 *
 * The snapshot and its index travel together as one view. A refresh builds the
 * next view off to the side and repoints a single reference, so a reader holding
 * a view sees either the old data or the new data in full.
 */

import { NotFoundError } from '../../errors';
import type { LoadDiagnostic } from '../../errors';
import type { EntityMap, EntityType } from '../../types';
import { errorMessage } from '../../utils';
import { CrossReferenceIndex } from '../cross-reference';
import { loadSnapshot } from './loader';
import { countRecords, emptySnapshot } from './snapshot';
import type { EntityTable, Snapshot } from './snapshot';
import type { RecordSource } from './source';

export { JsonDirectorySource } from './source';
export type { RecordSource } from './source';
export { EntityTable, createSnapshot, emptySnapshot, countRecords } from './snapshot';
export type { Snapshot, EntityCollections, EntityTables, SnapshotExtras } from './snapshot';
export { loadSnapshot } from './loader';
export type { LoadOptions } from './loader';
export { CATEGORY_DEFINITIONS, CATEGORY_FILES } from './validators';
export type { Category, EntityCategory } from './validators';

export interface StoreView {
  readonly snapshot: Snapshot;
  readonly index: CrossReferenceIndex;
}

/**
 * Anything that can hand out the current view. Engines depend on this rather
 * than on the store itself.
 */
export interface SnapshotProvider {
  current(): StoreView;
}

export interface RecordStoreOptions {
  /** Upper bound on one load from the source. */
  loadTimeoutMs: number;
}

export interface RefreshSummary {
  generation: number;
  loadedAt: Date;
  counts: Record<EntityType, number>;
  diagnostics: readonly LoadDiagnostic[];
  integrityIssues: number;
}

/**
 * Pair a snapshot with its index. Both must come from the same generation.
 */
export function createView(snapshot: Snapshot, index: CrossReferenceIndex): StoreView {
  if (index.generation !== snapshot.generation) {
    throw new Error(
      `Index generation ${index.generation} does not match snapshot generation ${snapshot.generation}`
    );
  }
  return Object.freeze({ snapshot, index });
}

export function viewOf(snapshot: Snapshot): StoreView {
  return createView(snapshot, CrossReferenceIndex.build(snapshot));
}

export class RecordStore implements SnapshotProvider {
  private view: StoreView;
  private refreshQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly source: RecordSource,
    private readonly options: RecordStoreOptions
  ) {
    this.view = viewOf(emptySnapshot());
  }

  current(): StoreView {
    return this.view;
  }

  get generation(): number {
    return this.view.snapshot.generation;
  }

  get<K extends EntityType>(type: K, id: string): EntityMap[K] {
    const table: EntityTable<EntityMap[K]> = this.view.snapshot.tables[type];
    const record = table.get(id);
    if (record === undefined) {
      throw new NotFoundError(type, id);
    }
    return record;
  }

  all<K extends EntityType>(type: K): readonly EntityMap[K][] {
    const table: EntityTable<EntityMap[K]> = this.view.snapshot.tables[type];
    return table.records;
  }

  /**
   * Read a complete snapshot from the source without activating it.
   */
  load(): Promise<Snapshot> {
    return loadSnapshot(this.source, this.generation + 1, { timeoutMs: this.options.loadTimeoutMs });
  }

  /**
   * Load and activate a new snapshot. Calls are serialized; a failed refresh
   * leaves the active view untouched and rejects with a LoadFailureError.
   */
  refresh(): Promise<RefreshSummary> {
    const run = this.refreshQueue.then(() => this.reload());
    // The next refresh waits for this one either way; its outcome reaches the caller through `run`.
    this.refreshQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async reload(): Promise<RefreshSummary> {
    const previous = this.generation;

    let snapshot: Snapshot;
    try {
      snapshot = await this.load();
    } catch (error) {
      console.error(`❌ Refresh failed, keeping generation ${previous}: ${errorMessage(error)}`);
      throw error;
    }

    const next = viewOf(snapshot);
    this.view = next;

    const summary = summarize(next);
    logRefresh(summary, next);
    return summary;
  }
}

function summarize(view: StoreView): RefreshSummary {
  return {
    generation: view.snapshot.generation,
    loadedAt: view.snapshot.loadedAt,
    counts: countRecords(view.snapshot),
    diagnostics: view.snapshot.diagnostics,
    integrityIssues: view.index.issues.length,
  };
}

function logRefresh(summary: RefreshSummary, view: StoreView): void {
  const counts = Object.entries(summary.counts)
    .map(([type, count]) => `${count} ${type}`)
    .join(', ');
  console.log(`✅ Loaded generation ${summary.generation}: ${counts}`);

  for (const diagnostic of summary.diagnostics) {
    const position = diagnostic.recordIndex === undefined ? '' : `#${diagnostic.recordIndex}`;
    console.warn(`⚠️  [${diagnostic.category}${position}] ${diagnostic.message}`);
  }

  if (view.index.issues.length > 0) {
    console.warn(`⚠️  ${view.index.issues.length} unresolved cross-references in generation ${summary.generation}`);
  }
}
