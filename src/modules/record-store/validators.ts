import { z } from 'zod';
import { AMENITY_CATEGORIES } from '../../types';
import type {
  Agent,
  Amenity,
  Area,
  CityOverview,
  Client,
  EntityMap,
  EntityType,
  Listing,
  MarketAnalytics,
  Transaction,
} from '../../types';

const lowercase = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

// Ids are strings in the domain; numeric ids on disk are accepted and stringified.
const IdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);
const StringListSchema = z.array(z.string()).default([]);

export const ListingRecordSchema = z
  .object({
    id: IdSchema,
    address: z.string().min(1),
    area: z.string().min(1),
    price: z.number().nonnegative(),
    bedrooms: z.number().int().nonnegative().default(0),
    bathrooms: z.number().nonnegative().default(0),
    square_feet: z.number().nonnegative().default(0),
    property_type: z.string().min(1),
    status: z.preprocess(lowercase, z.enum(['active', 'pending', 'sold'])).default('active'),
    agent_id: IdSchema,
    description: z.string().default(''),
    features: StringListSchema,
    style: z.string().optional(),
    year_built: z.number().int().optional(),
    listed_date: z.string().optional(),
  })
  .transform(
    (raw): Listing => ({
      id: raw.id,
      address: raw.address,
      area: raw.area,
      price: raw.price,
      bedrooms: raw.bedrooms,
      bathrooms: raw.bathrooms,
      squareFeet: raw.square_feet,
      propertyType: raw.property_type,
      status: raw.status,
      agentId: raw.agent_id,
      description: raw.description,
      features: raw.features,
      style: raw.style,
      yearBuilt: raw.year_built,
      listedDate: raw.listed_date,
    })
  );

export const AgentRecordSchema = z
  .object({
    id: IdSchema,
    name: z.string().min(1),
    specializations: StringListSchema,
    expertise_areas: StringListSchema,
    email: z.string().optional(),
    phone: z.string().optional(),
    bio: z.string().default(''),
    portfolio: z.array(IdSchema).default([]),
    client_testimonials: z
      .array(
        z.object({
          rating: z.number().min(0).max(5),
          comment: z.string().optional(),
        })
      )
      .default([]),
  })
  .transform(
    (raw): Agent => ({
      id: raw.id,
      name: raw.name,
      specializations: raw.specializations,
      expertiseAreas: raw.expertise_areas,
      contact: { email: raw.email, phone: raw.phone },
      bio: raw.bio,
      portfolio: raw.portfolio,
      testimonials: raw.client_testimonials,
    })
  );

const BudgetRangeSchema = z
  .object({
    min: z.number().nonnegative().optional(),
    max: z.number().nonnegative().optional(),
  })
  .refine((range) => range.min === undefined || range.max === undefined || range.min <= range.max, {
    message: 'budget_range.min exceeds budget_range.max',
  });

const WeightHintSchema = z.number().min(0).max(3).optional();

const PreferencesSchema = z.object({
  budget_range: BudgetRangeSchema.default({}),
  min_bedrooms: z.number().int().nonnegative().optional(),
  desired_areas: StringListSchema,
  property_types: StringListSchema,
  // Older records name a single type.
  property_type: z.string().optional(),
  weights: z
    .object({
      price: WeightHintSchema,
      bedrooms: WeightHintSchema,
      area: WeightHintSchema,
      type: WeightHintSchema,
    })
    .default({}),
});

export const ClientRecordSchema = z
  .object({
    id: IdSchema,
    name: z.string().min(1),
    type: z.preprocess(lowercase, z.enum(['buyer', 'seller', 'investor'])),
    agent_id: IdSchema.optional(),
    preferences: PreferencesSchema.default({}),
    history: z
      .array(
        z.object({
          listing_id: IdSchema,
          feedback: z.preprocess(lowercase, z.enum(['interested', 'viewed', 'offered', 'rejected'])).default('viewed'),
          date: z.string().optional(),
        })
      )
      .default([]),
  })
  .transform((raw): Client => {
    const prefs = raw.preferences;
    const propertyTypes = [...prefs.property_types];
    if (prefs.property_type && !propertyTypes.includes(prefs.property_type)) {
      propertyTypes.push(prefs.property_type);
    }

    return {
      id: raw.id,
      name: raw.name,
      role: raw.type,
      agentId: raw.agent_id,
      preferences: {
        priceRange: { min: prefs.budget_range.min, max: prefs.budget_range.max },
        minBedrooms: prefs.min_bedrooms,
        desiredAreas: prefs.desired_areas,
        propertyTypes,
        weightHints: prefs.weights,
      },
      history: raw.history.map((entry) => ({
        listingId: entry.listing_id,
        feedback: entry.feedback,
        date: entry.date,
      })),
    };
  });

export const TransactionRecordSchema = z
  .object({
    id: IdSchema,
    listing_id: IdSchema,
    agent_id: IdSchema,
    sale_price: z.number().nonnegative(),
    sale_date: z.string().min(1),
    type: z.preprocess(lowercase, z.enum(['sale', 'lease'])).default('sale'),
    area: z.string().optional(),
    days_on_market: z.number().int().nonnegative().optional(),
    price_per_sqft: z.number().nonnegative().optional(),
  })
  .transform(
    (raw): Transaction => ({
      id: raw.id,
      listingId: raw.listing_id,
      agentId: raw.agent_id,
      closingPrice: raw.sale_price,
      closingDate: raw.sale_date,
      type: raw.type,
      area: raw.area,
      daysOnMarket: raw.days_on_market,
      pricePerSqft: raw.price_per_sqft,
    })
  );

export const AreaRecordSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(''),
    demographics: z.record(z.unknown()).default({}),
    walkability_score: z.number().optional(),
    school_rating: z.number().optional(),
    median_home_price: z.number().nonnegative().optional(),
    amenity_ids: z.array(IdSchema).default([]),
  })
  .transform(
    (raw): Area => ({
      name: raw.name,
      description: raw.description,
      demographics: raw.demographics,
      walkabilityScore: raw.walkability_score,
      schoolRating: raw.school_rating,
      medianHomePrice: raw.median_home_price,
      amenityIds: raw.amenity_ids,
    })
  );

export const AmenityRecordSchema = z
  .object({
    id: IdSchema,
    name: z.string().min(1),
    category: z.preprocess(lowercase, z.enum(AMENITY_CATEGORIES)),
    area: z.string().min(1),
    rating: z.number().optional(),
    description: z.string().optional(),
  })
  .transform(
    (raw): Amenity => ({
      id: raw.id,
      name: raw.name,
      category: raw.category,
      area: raw.area,
      rating: raw.rating,
      description: raw.description,
    })
  );

export const CityOverviewSchema = z
  .object({
    city_name: z.string().optional(),
    state: z.string().optional(),
    population: z.number().int().nonnegative().optional(),
    median_income: z.number().nonnegative().optional(),
    school_districts: z.array(z.record(z.unknown())).optional(),
    market_trends: z.record(z.unknown()).optional(),
  })
  .transform(
    (raw): CityOverview => ({
      cityName: raw.city_name,
      state: raw.state,
      population: raw.population,
      medianIncome: raw.median_income,
      schoolDistricts: raw.school_districts,
      marketTrends: raw.market_trends,
    })
  );

export const MarketAnalyticsSchema = z
  .object({
    market_overview: z.record(z.unknown()).default({}),
    area_performance: z.record(z.record(z.unknown())).default({}),
    price_analytics: z.record(z.unknown()).default({}),
    investment_opportunities: z.record(z.unknown()).default({}),
  })
  .transform(
    (raw): MarketAnalytics => ({
      overview: raw.market_overview,
      areaPerformance: raw.area_performance,
      priceAnalytics: raw.price_analytics,
      investmentOpportunities: raw.investment_opportunities,
    })
  );

// --- Category registry ---

export type EntityCategory = 'properties' | 'agents' | 'clients' | 'transactions' | 'areas' | 'amenities';
export type Category = EntityCategory | 'market';

export interface CategoryDefinition<T> {
  category: EntityCategory;
  /** Path relative to the data directory. */
  file: string;
  /** Key of the record array inside the category document. */
  rootKey: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const CATEGORY_DEFINITIONS: { [K in EntityType]: CategoryDefinition<EntityMap[K]> } = {
  listing: {
    category: 'properties',
    file: 'properties/active_listings.json',
    rootKey: 'active_listings',
    schema: ListingRecordSchema,
  },
  agent: {
    category: 'agents',
    file: 'agents/agent_profiles.json',
    rootKey: 'agents',
    schema: AgentRecordSchema,
  },
  client: {
    category: 'clients',
    file: 'clients/client_database.json',
    rootKey: 'clients',
    schema: ClientRecordSchema,
  },
  transaction: {
    category: 'transactions',
    file: 'transactions/recent_sales.json',
    rootKey: 'recent_sales',
    schema: TransactionRecordSchema,
  },
  area: {
    category: 'areas',
    file: 'areas/city_overview.json',
    rootKey: 'areas',
    schema: AreaRecordSchema,
  },
  amenity: {
    category: 'amenities',
    file: 'amenities/local_amenities.json',
    rootKey: 'amenities',
    schema: AmenityRecordSchema,
  },
};

export const MARKET_FILE = 'market/market_analytics.json';

export const CATEGORY_FILES: Record<Category, string> = {
  properties: CATEGORY_DEFINITIONS.listing.file,
  agents: CATEGORY_DEFINITIONS.agent.file,
  clients: CATEGORY_DEFINITIONS.client.file,
  transactions: CATEGORY_DEFINITIONS.transaction.file,
  areas: CATEGORY_DEFINITIONS.area.file,
  amenities: CATEGORY_DEFINITIONS.amenity.file,
  market: MARKET_FILE,
};
