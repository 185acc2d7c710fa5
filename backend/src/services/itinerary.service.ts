import { UpstreamServiceError, ValidationError } from '../middleware/error.middleware';
import { EnvironmentContext } from '../models/environment.model';
import { Itinerary } from '../models/itinerary.model';
import { MAX_TRIP_DAYS, TripRequest, TripRequestInput } from '../models/trip-request.model';
import { countTripDays } from '../utils/dates';
import { AdapterFailure } from './adapter-result';
import { countryFromDestination, getCountryCurrency } from './currency.service';
import { EnvironmentService } from './environment.service';
import { TextGenerator } from './gemini.service';
import { ItineraryFrame, parseItinerary } from './itinerary.parser';
import { buildItineraryPrompt, buildRefinementPrompt } from './prompt.builder';

export interface ItineraryDependencies {
  ai: TextGenerator;
  environment: Pick<EnvironmentService, 'gather'>;
}

export interface GeneratedItinerary {
  itinerary: Itinerary;
  environment: EnvironmentContext;
}

/** Normalizes a validated request body into an immutable Trip Request. */
export const toTripRequest = (input: TripRequestInput): TripRequest => {
  const interests = [...new Set((input.interests ?? []).map((tag) => tag.trim().toLowerCase()).filter(Boolean))];
  const specialRequests = input.special_requests?.trim();

  return Object.freeze({
    destination: input.destination.trim(),
    startDate: input.start_date,
    endDate: input.end_date,
    budget: input.budget,
    ...(input.lodging ? { lodging: input.lodging } : {}),
    transportModes: Object.freeze([...new Set(input.transport_modes ?? [])]),
    travelers: Object.freeze({
      adults: input.adults ?? 1,
      childAges: Object.freeze([...(input.child_ages ?? [])])
    }),
    interests: Object.freeze(interests),
    ...(specialRequests ? { specialRequests } : {})
  });
};

const AI_NOT_CONFIGURED: AdapterFailure = {
  service: 'gemini',
  reason: 'not_configured',
  message: 'GEMINI_API_KEY is not set'
};

const ensureTripDates = (trip: TripRequest): number => {
  const dayCount = countTripDays(trip.startDate, trip.endDate);
  if (dayCount === 0) {
    throw new ValidationError([{ field: 'end_date', message: 'End date must be on or after start date' }]);
  }
  if (dayCount > MAX_TRIP_DAYS) {
    throw new ValidationError([{ field: 'end_date', message: `Trips can be at most ${MAX_TRIP_DAYS} days long` }]);
  }
  return dayCount;
};

export class ItineraryService {
  constructor(private readonly deps: ItineraryDependencies) {}

  async generate(trip: TripRequest): Promise<GeneratedItinerary> {
    const dayCount = ensureTripDates(trip);
    const { ai, environment: environmentService } = this.deps;

    if (!ai.isConfigured) {
      throw new UpstreamServiceError(AI_NOT_CONFIGURED);
    }

    const environment = await environmentService.gather(trip.destination, trip.startDate, trip.endDate);
    const currency =
      environment.currency?.localCurrency ??
      getCountryCurrency(environment.location?.country ?? countryFromDestination(trip.destination));

    console.log(`Generating itinerary for ${trip.destination} (${dayCount} days, ${currency})`);

    const answer = await ai.generate(buildItineraryPrompt(trip, environment, currency));
    if (!answer.ok) {
      throw new UpstreamServiceError(answer.failure);
    }

    const frame: ItineraryFrame = {
      destination: trip.destination,
      startDate: trip.startDate,
      endDate: trip.endDate,
      dayCount,
      currency
    };
    const itinerary = parseItinerary(answer.data, frame);
    if (!itinerary.ok) {
      throw new UpstreamServiceError(itinerary.failure);
    }

    return { itinerary: itinerary.data, environment };
  }

  /**
   * Asks the model to rewrite the whole itinerary with the instruction
   * applied. The answer replaces the previous plan; nothing is merged.
   */
  async refine(current: Itinerary, instruction: string): Promise<Itinerary> {
    const { ai } = this.deps;
    if (!ai.isConfigured) {
      throw new UpstreamServiceError(AI_NOT_CONFIGURED);
    }

    console.log(`Refining ${current.days.length}-day itinerary for ${current.destination}`);

    const answer = await ai.generate(buildRefinementPrompt(current, instruction));
    if (!answer.ok) {
      throw new UpstreamServiceError(answer.failure);
    }

    const refined = parseItinerary(answer.data, {
      destination: current.destination,
      startDate: current.startDate,
      endDate: current.endDate,
      dayCount: current.days.length,
      currency: current.currency
    });
    if (!refined.ok) {
      throw new UpstreamServiceError(refined.failure);
    }

    return refined.data;
  }
}
