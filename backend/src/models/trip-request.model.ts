export const BUDGET_TIERS = ['economy', 'mid-range', 'luxury'] as const;
export type BudgetTier = (typeof BUDGET_TIERS)[number];

export const LODGING_PREFERENCES = ['hotel', 'airbnb', 'resort', 'hostel', 'already_booked'] as const;
export type LodgingPreference = (typeof LODGING_PREFERENCES)[number];

export const TRANSPORT_MODES = [
  'plane',
  'drive',
  'train',
  'cruise',
  'rental_car',
  'public_transport',
  'walking',
  'rideshare'
] as const;
export type TransportMode = (typeof TRANSPORT_MODES)[number];

export const MAX_TRIP_DAYS = 30;
export const MAX_CHILD_AGE = 17;

export interface Travelers {
  adults: number;
  childAges: readonly number[];
}

export interface TripRequest {
  destination: string;
  /** YYYY-MM-DD */
  startDate: string;
  /** YYYY-MM-DD */
  endDate: string;
  budget: BudgetTier;
  lodging?: LodgingPreference;
  transportModes: readonly TransportMode[];
  travelers: Travelers;
  interests: readonly string[];
  specialRequests?: string;
}

/** Body accepted by POST /api/itineraries/generate, before normalization. */
export interface TripRequestInput {
  destination: string;
  start_date: string;
  end_date: string;
  budget: BudgetTier;
  lodging?: LodgingPreference;
  transport_modes?: TransportMode[];
  adults?: number;
  child_ages?: number[];
  interests?: string[];
  special_requests?: string;
}
