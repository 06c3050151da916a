/**
 * Entity Type Definitions
 *
 * Domain shapes after validation. Persisted records use snake_case keys and are
 * mapped onto these by the record-store validators.
 */

export type ListingStatus = 'active' | 'pending' | 'sold';
export type ClientRole = 'buyer' | 'seller' | 'investor';
export type TransactionType = 'sale' | 'lease';
export const AMENITY_CATEGORIES = ['school', 'park', 'shopping', 'healthcare'] as const;
export type AmenityCategory = (typeof AMENITY_CATEGORIES)[number];
export type ClientFeedback = 'interested' | 'viewed' | 'offered' | 'rejected';

export interface PriceRange {
  min?: number;
  max?: number;
}

// --- Core Entities ---

export interface Listing {
  id: string;
  address: string;
  area: string;
  price: number;
  bedrooms: number;
  bathrooms: number;
  squareFeet: number;
  propertyType: string;
  status: ListingStatus;
  agentId: string;
  description: string;
  features: string[];
  style?: string;
  yearBuilt?: number;
  listedDate?: string;
}

export interface AgentContact {
  email?: string;
  phone?: string;
}

export interface Testimonial {
  rating: number;
  comment?: string;
}

export interface Agent {
  id: string;
  name: string;
  specializations: string[];
  expertiseAreas: string[];
  contact: AgentContact;
  bio: string;
  /** Listing ids the agent owns now or has owned. */
  portfolio: string[];
  testimonials: Testimonial[];
}

/**
 * Per-component multipliers applied on top of the matching engine's base
 * weights. Missing entries count as 1.
 */
export interface WeightHints {
  price?: number;
  bedrooms?: number;
  area?: number;
  type?: number;
}

export interface ClientPreferences {
  priceRange: PriceRange;
  minBedrooms?: number;
  desiredAreas: string[];
  propertyTypes: string[];
  weightHints: WeightHints;
}

export interface MatchHistoryEntry {
  listingId: string;
  feedback: ClientFeedback;
  date?: string;
}

export interface Client {
  id: string;
  name: string;
  role: ClientRole;
  agentId?: string;
  preferences: ClientPreferences;
  history: MatchHistoryEntry[];
}

export interface Transaction {
  id: string;
  listingId: string;
  agentId: string;
  closingPrice: number;
  closingDate: string;
  type: TransactionType;
  area?: string;
  daysOnMarket?: number;
  pricePerSqft?: number;
}

export interface Area {
  name: string;
  description: string;
  demographics: Record<string, unknown>;
  walkabilityScore?: number;
  schoolRating?: number;
  medianHomePrice?: number;
  amenityIds: string[];
}

export interface Amenity {
  id: string;
  name: string;
  category: AmenityCategory;
  area: string;
  rating?: number;
  description?: string;
}

// --- Documents carried alongside the collections ---

export interface CityOverview {
  cityName?: string;
  state?: string;
  population?: number;
  medianIncome?: number;
  schoolDistricts?: Record<string, unknown>[];
  marketTrends?: Record<string, unknown>;
}

export interface MarketAnalytics {
  overview: Record<string, unknown>;
  /** Keyed by area name as it appears in the persisted document. */
  areaPerformance: Record<string, Record<string, unknown>>;
  priceAnalytics: Record<string, unknown>;
  investmentOpportunities: Record<string, unknown>;
}

// --- Entity registry ---

export interface EntityMap {
  listing: Listing;
  agent: Agent;
  client: Client;
  transaction: Transaction;
  area: Area;
  amenity: Amenity;
}

export type EntityType = keyof EntityMap;

export type Entity = EntityMap[EntityType];

export const ENTITY_TYPES: readonly EntityType[] = [
  'listing',
  'agent',
  'client',
  'transaction',
  'area',
  'amenity',
];
