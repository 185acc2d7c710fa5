import { EnvironmentContext } from '../models/environment.model';
import { Itinerary } from '../models/itinerary.model';
import { BudgetTier, LodgingPreference, TransportMode, TripRequest } from '../models/trip-request.model';
import { countTripDays } from '../utils/dates';

const NEARBY_NAMES_IN_PROMPT = 5;

const BUDGET_GUIDANCE: Record<BudgetTier, string> = {
  economy: 'Focus on budget-friendly options, free attractions, and affordable accommodations',
  'mid-range': 'Include mid-range accommodations and dining options',
  luxury: 'Include luxury accommodations, fine dining, and premium experiences'
};

const LODGING_GUIDANCE: Record<LodgingPreference, string> = {
  hotel: 'Recommend hotels with appropriate amenities for the group size',
  airbnb: 'Suggest vacation rental properties suitable for the group',
  resort: 'Focus on resort accommodations with inclusive amenities',
  hostel: 'Recommend hostels with private rooms or dorms as appropriate',
  already_booked: 'Accommodation is already booked, focus on activities and dining'
};

const TRANSPORT_GUIDANCE: Record<TransportMode, string> = {
  plane: 'Arriving by plane: include airport transfer recommendations',
  drive: 'Arriving by car: include parking information and scenic route suggestions',
  train: 'Arriving by train: include train station information and connections',
  cruise: 'Arriving by cruise: include port information and shore excursions',
  rental_car: 'Getting around by rental car: include rental locations, parking, and driving tips',
  public_transport: 'Getting around by public transport: include transit passes, routes, and schedules',
  walking: 'Getting around on foot: focus on walkable attractions and neighborhoods',
  rideshare: 'Getting around by rideshare: include ride-hailing apps and taxi information'
};

const plural = (count: number, singular: string, pluralForm: string): string =>
  `${count} ${count === 1 ? singular : pluralForm}`;

export const describeTravelers = ({ travelers }: TripRequest): string => {
  const children = travelers.childAges.length;
  const total = travelers.adults + children;
  let text = plural(total, 'person', 'people');
  if (children > 0) {
    text += ` (including ${plural(children, 'child', 'children')} aged ${travelers.childAges.join(', ')})`;
  }
  return text;
};

const groupGuidance = ({ travelers }: TripRequest): string[] => {
  const total = travelers.adults + travelers.childAges.length;
  if (travelers.childAges.length > 0) {
    return [
      'Plan family-friendly activities suitable for children',
      'Consider child safety, accessibility, and age-appropriate attractions'
    ];
  }
  if (total === 1) return ['Plan activities suitable for solo travelers'];
  if (total === 2) return ['Plan romantic and couple-friendly activities'];
  if (total <= 4) return ['Plan activities suitable for small groups'];
  return ['Plan activities suitable for larger groups, consider group discounts and reservations'];
};

const locationContext = (context: EnvironmentContext): string[] => {
  const lines: string[] = [];
  if (context.location) {
    lines.push(`Address: ${context.location.formattedAddress}`);
  }
  if (context.timezone) {
    lines.push(`Time zone: ${context.timezone.timeZoneName} (${context.timezone.timeZoneId})`);
  }
  if (context.weather && context.weather.days.length > 0) {
    const forecast = context.weather.days
      .map((day) => `${day.date}: ${day.tempMin}-${day.tempMax}°C, ${day.description}`)
      .join('; ');
    lines.push(`Weather forecast: ${forecast}`);
  }
  if (context.nearby) {
    const attractions = context.nearby.attractions.slice(0, NEARBY_NAMES_IN_PROMPT).map((place) => place.name);
    const restaurants = context.nearby.restaurants.slice(0, NEARBY_NAMES_IN_PROMPT).map((place) => place.name);
    if (attractions.length > 0) lines.push(`Nearby attractions: ${attractions.join(', ')}`);
    if (restaurants.length > 0) lines.push(`Nearby restaurants: ${restaurants.join(', ')}`);
  }
  return lines;
};

const jsonContract = (dayCount: number, currency: string): string => `OUTPUT FORMAT:
Return ONLY a JSON object (no markdown, no code fences, no commentary) with exactly this shape:
{"summary":"string","days":[{"day":1,"title":"string","activities":[{"time":"09:00","description":"string","location":"string","estimatedCost":0}]}],"tips":["string"]}
- "days" must contain exactly ${dayCount} entries, numbered 1 to ${dayCount} in order
- Each day lists its activities in chronological order, starting with the morning
- "time" is a local start time (HH:MM) or a part of the day (Morning, Afternoon, Evening)
- "location" is the full street address of the place
- "estimatedCost" is a plain number: the total cost for the whole group in ${currency}, 0 when free`;

const bulletList = (lines: string[]): string => lines.map((line) => `- ${line}`).join('\n');

/** Prompt for a brand-new itinerary. */
export const buildItineraryPrompt = (trip: TripRequest, context: EnvironmentContext, currency: string): string => {
  const dayCount = countTripDays(trip.startDate, trip.endDate);
  const travelers = describeTravelers(trip);
  const interests = trip.interests.length > 0 ? trip.interests.join(', ') : 'general sightseeing';

  const preferences = [
    `Group size: ${travelers}`,
    `Interests: ${interests}`,
    BUDGET_GUIDANCE[trip.budget],
    ...(trip.lodging ? [LODGING_GUIDANCE[trip.lodging]] : []),
    ...trip.transportModes.map((mode) => TRANSPORT_GUIDANCE[mode]),
    ...groupGuidance(trip),
    ...(trip.specialRequests ? [`Special considerations: ${trip.specialRequests}`] : [])
  ];

  const sections = [
    `As a travel planner, create a detailed ${dayCount}-day travel itinerary for ${trip.destination} from ${trip.startDate} to ${trip.endDate} for ${travelers}.`,
    `TRAVELER PREFERENCES:\n${bulletList(preferences)}`,
    `REQUIREMENTS:\n${bulletList([
      'Provide a day-by-day plan with specific activities, attractions, and restaurants',
      'Use real places that exist and give their exact addresses',
      'Consider opening hours, travel time between places, and seasonal factors',
      `Give realistic prices in ${currency} for ${travelers}`,
      'Put practical safety advice, local customs, and emergency numbers in "tips"'
    ])}`
  ];

  const contextLines = locationContext(context);
  if (contextLines.length > 0) {
    sections.push(`LOCATION CONTEXT:\n${bulletList(contextLines)}`);
  }

  sections.push(jsonContract(dayCount, currency));
  return sections.join('\n\n');
};

/** Prompt that asks for a full replacement of an existing itinerary. */
export const buildRefinementPrompt = (itinerary: Itinerary, instruction: string): string => {
  const dayCount = itinerary.days.length;
  const current = {
    summary: itinerary.summary ?? '',
    days: itinerary.days.map((day) => ({ day: day.dayNumber, title: day.title, activities: day.activities })),
    tips: itinerary.tips ?? []
  };

  return [
    `The traveler has requested changes to their ${dayCount}-day itinerary for ${itinerary.destination} (${itinerary.startDate} to ${itinerary.endDate}).`,
    `CURRENT ITINERARY:\n${JSON.stringify(current, null, 2)}`,
    `REQUESTED CHANGES:\n${instruction}`,
    'Rewrite the itinerary to apply the requested changes. Keep every part the traveler did not ask to change, keep the same destination and dates, and keep the level of detail.',
    jsonContract(dayCount, itinerary.currency)
  ].join('\n\n');
};
