/**
 * Cross-Reference Index Module
 *
 * Purpose: reverse and lateral lookups between entity collections
 * Dependencies: Record Store snapshot
 *
 * Derived state only. An index is built from exactly one snapshot, carries
 * that snapshot's generation, and is never modified afterwards.
 */

import type { EntityType } from '../../types';
import { normalize } from '../../utils';
import type { Snapshot } from '../record-store/snapshot';

export type IntegrityIssueKind =
  | 'unknown-agent'
  | 'unknown-area'
  | 'unknown-listing';

export interface IntegrityIssue {
  kind: IntegrityIssueKind;
  /** The record holding the reference. */
  from: { type: EntityType; id: string };
  /** The key that did not resolve. */
  reference: string;
}

type Lookup = ReadonlyMap<string, readonly string[]>;

const NONE: readonly string[] = Object.freeze([]);

class LookupBuilder {
  private readonly entries = new Map<string, Set<string>>();

  add(key: string, value: string): void {
    const values = this.entries.get(key);
    if (values) {
      values.add(value);
    } else {
      this.entries.set(key, new Set([value]));
    }
  }

  freeze(): Lookup {
    const frozen = new Map<string, readonly string[]>();
    for (const [key, values] of this.entries) {
      frozen.set(key, Object.freeze([...values]));
    }
    return frozen;
  }
}

export class CrossReferenceIndex {
  private constructor(
    readonly generation: number,
    private readonly listingsByAgent: Lookup,
    private readonly listingsByArea: Lookup,
    private readonly amenitiesByArea: Lookup,
    private readonly priorMatchesByClient: Lookup,
    private readonly clientsByAgent: Lookup,
    private readonly transactionsByAgent: Lookup,
    private readonly transactionsByArea: Lookup,
    private readonly transactionsByListing: Lookup,
    readonly issues: readonly IntegrityIssue[]
  ) {}

  /**
   * Build every lookup in one pass per collection.
   */
  static build(snapshot: Snapshot): CrossReferenceIndex {
    const { listing, agent, client, transaction, area, amenity } = snapshot.tables;
    const issues: IntegrityIssue[] = [];

    const listingsByAgent = new LookupBuilder();
    const listingsByArea = new LookupBuilder();
    for (const record of listing.records) {
      listingsByAgent.add(record.agentId, record.id);
      listingsByArea.add(normalize(record.area), record.id);

      if (!agent.has(record.agentId)) {
        issues.push({ kind: 'unknown-agent', from: { type: 'listing', id: record.id }, reference: record.agentId });
      }
      if (!area.has(record.area)) {
        issues.push({ kind: 'unknown-area', from: { type: 'listing', id: record.id }, reference: record.area });
      }
    }

    // An area's own amenity list comes first, then amenities that name the area.
    const amenitiesByArea = new LookupBuilder();
    for (const record of area.records) {
      for (const amenityId of record.amenityIds) {
        amenitiesByArea.add(normalize(record.name), amenityId);
      }
    }
    for (const record of amenity.records) {
      amenitiesByArea.add(normalize(record.area), record.id);

      if (!area.has(record.area)) {
        issues.push({ kind: 'unknown-area', from: { type: 'amenity', id: record.id }, reference: record.area });
      }
    }

    const priorMatchesByClient = new LookupBuilder();
    const clientsByAgent = new LookupBuilder();
    for (const record of client.records) {
      for (const entry of record.history) {
        priorMatchesByClient.add(record.id, entry.listingId);

        if (!listing.has(entry.listingId)) {
          issues.push({ kind: 'unknown-listing', from: { type: 'client', id: record.id }, reference: entry.listingId });
        }
      }

      if (record.agentId !== undefined) {
        clientsByAgent.add(record.agentId, record.id);

        if (!agent.has(record.agentId)) {
          issues.push({ kind: 'unknown-agent', from: { type: 'client', id: record.id }, reference: record.agentId });
        }
      }
    }

    // Sold listings leave the active collection, so a transaction's listing may
    // legitimately be absent.
    const transactionsByAgent = new LookupBuilder();
    const transactionsByArea = new LookupBuilder();
    const transactionsByListing = new LookupBuilder();
    for (const record of transaction.records) {
      transactionsByAgent.add(record.agentId, record.id);
      transactionsByListing.add(record.listingId, record.id);

      const areaName = record.area ?? listing.get(record.listingId)?.area;
      if (areaName !== undefined) {
        transactionsByArea.add(normalize(areaName), record.id);
      }

      if (!agent.has(record.agentId)) {
        issues.push({ kind: 'unknown-agent', from: { type: 'transaction', id: record.id }, reference: record.agentId });
      }
    }

    return new CrossReferenceIndex(
      snapshot.generation,
      listingsByAgent.freeze(),
      listingsByArea.freeze(),
      amenitiesByArea.freeze(),
      priorMatchesByClient.freeze(),
      clientsByAgent.freeze(),
      transactionsByAgent.freeze(),
      transactionsByArea.freeze(),
      transactionsByListing.freeze(),
      Object.freeze(issues)
    );
  }

  listingsForAgent(agentId: string): readonly string[] {
    return this.listingsByAgent.get(agentId) ?? NONE;
  }

  listingsForArea(areaName: string): readonly string[] {
    return this.listingsByArea.get(normalize(areaName)) ?? NONE;
  }

  amenitiesForArea(areaName: string): readonly string[] {
    return this.amenitiesByArea.get(normalize(areaName)) ?? NONE;
  }

  priorMatchesForClient(clientId: string): readonly string[] {
    return this.priorMatchesByClient.get(clientId) ?? NONE;
  }

  clientsForAgent(agentId: string): readonly string[] {
    return this.clientsByAgent.get(agentId) ?? NONE;
  }

  transactionsForAgent(agentId: string): readonly string[] {
    return this.transactionsByAgent.get(agentId) ?? NONE;
  }

  transactionsForArea(areaName: string): readonly string[] {
    return this.transactionsByArea.get(normalize(areaName)) ?? NONE;
  }

  transactionsForListing(listingId: string): readonly string[] {
    return this.transactionsByListing.get(listingId) ?? NONE;
  }
}

export function buildIndex(snapshot: Snapshot): CrossReferenceIndex {
  return CrossReferenceIndex.build(snapshot);
}
