/**
 * Shared test data: record builders, a small in-memory catalog and a
 * RecordSource backed by plain objects.
 */

import type {
  Agent,
  Amenity,
  Area,
  Client,
  Listing,
  Transaction,
} from '../types';
import { createSnapshot, viewOf } from '../modules/record-store';
import type {
  Category,
  EntityCollections,
  RecordSource,
  SnapshotExtras,
  SnapshotProvider,
  StoreView,
} from '../modules/record-store';

export function makeListing(id: string, overrides: Partial<Listing> = {}): Listing {
  return {
    id,
    address: `${id} Test Street`,
    area: 'Woodcrest',
    price: 400000,
    bedrooms: 3,
    bathrooms: 2,
    squareFeet: 1500,
    propertyType: 'single_family',
    status: 'active',
    agentId: 'A1',
    description: '',
    features: [],
    ...overrides,
  };
}

export function makeAgent(id: string, overrides: Partial<Agent> = {}): Agent {
  return {
    id,
    name: `Agent ${id}`,
    specializations: [],
    expertiseAreas: [],
    contact: {},
    bio: '',
    portfolio: [],
    testimonials: [],
    ...overrides,
  };
}

export function makeClient(id: string, overrides: Partial<Client> = {}): Client {
  return {
    id,
    name: `Client ${id}`,
    role: 'buyer',
    preferences: { priceRange: {}, desiredAreas: [], propertyTypes: [], weightHints: {} },
    history: [],
    ...overrides,
  };
}

export function makeTransaction(id: string, overrides: Partial<Transaction> = {}): Transaction {
  return {
    id,
    listingId: 'L1',
    agentId: 'A1',
    closingPrice: 400000,
    closingDate: '2026-01-01',
    type: 'sale',
    ...overrides,
  };
}

export function makeArea(name: string, overrides: Partial<Area> = {}): Area {
  return { name, description: '', demographics: {}, amenityIds: [], ...overrides };
}

export function makeAmenity(id: string, overrides: Partial<Amenity> = {}): Amenity {
  return { id, name: `Amenity ${id}`, category: 'park', area: 'Woodcrest', ...overrides };
}

/**
 * Five listings across three areas (Old Town has listings but no area record),
 * two agents, two clients, three sales and three amenities.
 */
export function catalogCollections(): EntityCollections {
  return {
    listing: [
      makeListing('L1', {
        address: '1 Oak Street',
        price: 400000,
        bedrooms: 3,
        bathrooms: 2,
        squareFeet: 2000,
        description: 'Quiet cul-de-sac',
        features: ['garage', 'fenced yard'],
      }),
      makeListing('L2', {
        address: '2 Elm Street',
        price: 300000,
        bedrooms: 2,
        bathrooms: 1,
        squareFeet: 1000,
        propertyType: 'condo',
        description: 'Sunny corner unit',
        features: ['balcony'],
      }),
      makeListing('L3', {
        address: '3 Harbor Drive',
        area: 'Harbor Point',
        price: 650000,
        bedrooms: 3,
        bathrooms: 2,
        squareFeet: 1500,
        propertyType: 'condo',
        agentId: 'A2',
        description: 'Waterfront condo',
        features: ['water view', 'Balcony'],
      }),
      makeListing('L4', {
        address: '4 Mill Street',
        area: 'Old Town',
        price: 500000,
        bedrooms: 4,
        bathrooms: 3,
        squareFeet: 0,
        propertyType: 'townhouse',
        status: 'pending',
        agentId: 'A2',
        description: 'Historic townhouse',
      }),
      makeListing('L5', {
        address: '5 Ridge Road',
        price: 800000,
        bedrooms: 5,
        bathrooms: 4,
        squareFeet: 3000,
        status: 'sold',
        description: 'Large estate',
        features: ['pool'],
      }),
    ],
    agent: [
      makeAgent('A1', {
        name: 'Sam Rivera',
        specializations: ['first-time buyers'],
        expertiseAreas: ['Woodcrest'],
        bio: 'Starter homes',
        portfolio: ['L1', 'L9'],
        testimonials: [{ rating: 5 }, { rating: 4 }],
      }),
      makeAgent('A2', {
        name: 'Jordan Lee',
        specializations: ['luxury', 'waterfront'],
        expertiseAreas: ['Harbor Point'],
        bio: 'Waterfront specialist',
      }),
    ],
    client: [
      makeClient('C1', {
        name: 'Alex Kim',
        agentId: 'A1',
        preferences: {
          priceRange: { min: 350000, max: 450000 },
          minBedrooms: 3,
          desiredAreas: ['Woodcrest'],
          propertyTypes: ['single_family'],
          weightHints: {},
        },
        history: [{ listingId: 'L2', feedback: 'viewed' }],
      }),
      makeClient('C2', { name: 'Morgan Patel', role: 'investor' }),
    ],
    transaction: [
      makeTransaction('T1', {
        listingId: 'L9',
        closingPrice: 450000,
        closingDate: '2026-05-01',
        area: 'Woodcrest',
        daysOnMarket: 20,
        pricePerSqft: 250,
      }),
      makeTransaction('T2', {
        listingId: 'L8',
        agentId: 'A2',
        closingPrice: 600000,
        closingDate: '2026-06-15',
        area: 'Harbor Point',
        daysOnMarket: 40,
        pricePerSqft: 400,
      }),
      makeTransaction('T3', {
        listingId: 'L1',
        closingPrice: 380000,
        closingDate: '2026-07-20',
        daysOnMarket: 10,
      }),
    ],
    area: [
      makeArea('Woodcrest', { description: 'Leafy and residential', amenityIds: ['M1'] }),
      makeArea('Harbor Point', { description: 'Waterfront district' }),
    ],
    amenity: [
      makeAmenity('M1', { name: 'Woodcrest Elementary', category: 'school' }),
      makeAmenity('M2', { name: 'Greenbelt Park', category: 'park' }),
      makeAmenity('M3', { name: 'Harbor Market', category: 'shopping', area: 'Harbor Point' }),
    ],
  };
}

export const CATALOG_EXTRAS: SnapshotExtras = {
  city: { cityName: 'Lakeview', population: 84000, schoolDistricts: [{ name: 'Lakeview Unified' }] },
  market: {
    overview: { inventoryMonths: 3 },
    areaPerformance: { Woodcrest: { median_price: 420000 } },
    priceAnalytics: { price_per_sqft: 310 },
    investmentOpportunities: {},
  },
};

export function catalogView(generation = 1): StoreView {
  return viewOf(createSnapshot(generation, catalogCollections(), CATALOG_EXTRAS));
}

/** A provider that always hands out the same view. */
export function fixedView(view: StoreView = catalogView()): SnapshotProvider {
  return { current: () => view };
}

/**
 * Documents held in memory, keyed by category. A category without a document
 * rejects on read, as a missing file would.
 */
export class MemorySource implements RecordSource {
  readonly description = 'memory source';
  reads = 0;

  constructor(public documents: Partial<Record<Category, unknown>>) {}

  async read(category: Category): Promise<unknown> {
    this.reads++;
    if (!Object.prototype.hasOwnProperty.call(this.documents, category)) {
      throw new Error(`${category} is missing`);
    }
    return this.documents[category];
  }
}

/** A source whose reads settle only when aborted. */
export class HangingSource implements RecordSource {
  readonly description = 'hanging source';

  read(_category: Category, signal: AbortSignal): Promise<unknown> {
    return new Promise((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(new Error('aborted')));
    });
  }
}

/** Persisted-shape documents for every category, matching the catalog's first two listings. */
export function persistedDocuments(): Partial<Record<Category, unknown>> {
  return {
    properties: {
      active_listings: [
        {
          id: 'L1',
          address: '1 Oak Street',
          area: 'Woodcrest',
          price: 400000,
          bedrooms: 3,
          bathrooms: 2,
          square_feet: 2000,
          property_type: 'single_family',
          agent_id: 'A1',
        },
        {
          id: 'L2',
          address: '2 Elm Street',
          area: 'Woodcrest',
          price: 300000,
          bedrooms: 2,
          bathrooms: 1,
          square_feet: 1000,
          property_type: 'condo',
          agent_id: 'A1',
        },
      ],
    },
    agents: { agents: [{ id: 'A1', name: 'Sam Rivera' }] },
    clients: { clients: [] },
    transactions: { recent_sales: [] },
    areas: { city_name: 'Lakeview', areas: [{ name: 'Woodcrest' }] },
    amenities: { amenities: [] },
    market: { market_overview: {}, area_performance: {} },
  };
}
