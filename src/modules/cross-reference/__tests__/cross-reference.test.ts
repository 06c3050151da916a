import {
  catalogCollections,
  makeAmenity,
  makeArea,
  makeClient,
  makeListing,
  makeTransaction,
} from '../../../__fixtures__/catalog';
import { createSnapshot } from '../../record-store';
import { CrossReferenceIndex } from '../index';

describe('Cross-Reference Index', () => {
  const index = CrossReferenceIndex.build(createSnapshot(4, catalogCollections()));

  it('should carry the generation of its snapshot', () => {
    expect(index.generation).toBe(4);
  });

  describe('lookups', () => {
    it('should list listings per agent in insertion order', () => {
      expect(index.listingsForAgent('A1')).toEqual(['L1', 'L2', 'L5']);
      expect(index.listingsForAgent('A2')).toEqual(['L3', 'L4']);
    });

    it('should match area names case-insensitively', () => {
      expect(index.listingsForArea('woodcrest')).toEqual(['L1', 'L2', 'L5']);
      expect(index.listingsForArea('  OLD   town ')).toEqual(['L4']);
    });

    it('should put an area\'s own amenities first without duplicates', () => {
      expect(index.amenitiesForArea('Woodcrest')).toEqual(['M1', 'M2']);
      expect(index.amenitiesForArea('Harbor Point')).toEqual(['M3']);
    });

    it('should link clients to prior matches and agents', () => {
      expect(index.priorMatchesForClient('C1')).toEqual(['L2']);
      expect(index.clientsForAgent('A1')).toEqual(['C1']);
      expect(index.clientsForAgent('A2')).toEqual([]);
    });

    it('should place transactions by agent, listing and area', () => {
      expect(index.transactionsForAgent('A1')).toEqual(['T1', 'T3']);
      expect(index.transactionsForListing('L1')).toEqual(['T3']);
      // T3 has no area of its own and takes its listing's.
      expect(index.transactionsForArea('Woodcrest')).toEqual(['T1', 'T3']);
      expect(index.transactionsForArea('Harbor Point')).toEqual(['T2']);
    });

    it('should return an empty sequence for unknown keys', () => {
      expect(index.listingsForAgent('nobody')).toEqual([]);
      expect(index.amenitiesForArea('Atlantis')).toEqual([]);
    });
  });

  describe('integrity issues', () => {
    it('should report a listing whose area has no record', () => {
      expect(index.issues).toEqual([
        { kind: 'unknown-area', from: { type: 'listing', id: 'L4' }, reference: 'Old Town' },
      ]);
    });

    it('should report every unresolved reference without failing the build', () => {
      const snapshot = createSnapshot(1, {
        listing: [makeListing('L1', { agentId: 'A9' })],
        agent: [],
        client: [makeClient('C1', { agentId: 'A8', history: [{ listingId: 'L404', feedback: 'viewed' }] })],
        transaction: [makeTransaction('T1', { agentId: 'A7', listingId: 'L500' })],
        area: [makeArea('Woodcrest')],
        amenity: [makeAmenity('M1', { area: 'Nowhere' })],
      });

      const broken = CrossReferenceIndex.build(snapshot);

      expect(broken.issues).toEqual([
        { kind: 'unknown-agent', from: { type: 'listing', id: 'L1' }, reference: 'A9' },
        { kind: 'unknown-area', from: { type: 'amenity', id: 'M1' }, reference: 'Nowhere' },
        { kind: 'unknown-listing', from: { type: 'client', id: 'C1' }, reference: 'L404' },
        { kind: 'unknown-agent', from: { type: 'client', id: 'C1' }, reference: 'A8' },
        { kind: 'unknown-agent', from: { type: 'transaction', id: 'T1' }, reference: 'A7' },
      ]);
      expect(broken.listingsForAgent('A9')).toEqual(['L1']);
    });
  });
});
