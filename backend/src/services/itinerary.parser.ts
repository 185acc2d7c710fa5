import { z } from 'zod';
import { ActivityBlock, DayEntry, Itinerary } from '../models/itinerary.model';
import { addDays } from '../utils/dates';
import { AdapterResult, fail, succeed } from './adapter-result';

/** What the caller already knows about the itinerary it asked for. */
export interface ItineraryFrame {
  destination: string;
  startDate: string;
  endDate: string;
  dayCount: number;
  currency: string;
}

interface RawDay {
  day?: number;
  title: string;
  activities: ActivityBlock[];
}

interface RawItinerary {
  days: RawDay[];
  summary?: string;
  tips?: string[];
}

/**
 * Reads a cost the way models tend to write it: 25, "25", "€25",
 * "EUR 1,200.50 (~$1300 USD)", "Free". Anything unreadable counts as 0.
 */
export const toCost = (value: unknown): number => {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value > 0 ? value : 0;
  }
  if (typeof value !== 'string') {
    return 0;
  }
  const match = value.replace(/(\d),(?=\d{3}\b)/g, '$1').match(/\d+(?:\.\d+)?/);
  return match ? Number(match[0]) : 0;
};

const costSchema = z.union([z.number(), z.string(), z.null()]).optional().transform(toCost);

const activitySchema = z.object({
  time: z.string().default(''),
  description: z.string().default(''),
  location: z.string().default(''),
  estimatedCost: costSchema
});

const daySchema = z.object({
  day: z.coerce.number().int().positive().optional(),
  title: z.string().default(''),
  activities: z.array(activitySchema).default([])
});

const aiItinerarySchema = z.object({
  summary: z.string().optional(),
  days: z.array(daySchema).min(1),
  tips: z.array(z.string()).optional()
});

/** Removes a ```json fence and any prose around the outermost object. */
export const extractJsonObject = (raw: string): string | null => {
  const unfenced = raw.replace(/```(?:json)?/gi, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  return unfenced.slice(start, end + 1);
};

const parseJsonItinerary = (raw: string): RawItinerary | null => {
  const candidate = extractJsonObject(raw);
  if (!candidate) {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(candidate);
  } catch {
    return null;
  }

  const parsed = aiItinerarySchema.safeParse(data);
  if (!parsed.success) {
    return null;
  }

  const { summary, tips, days } = parsed.data;
  return {
    days,
    ...(summary ? { summary } : {}),
    ...(tips && tips.length > 0 ? { tips } : {})
  };
};

/** Strips markdown emphasis and headings while keeping their text. */
export const cleanItineraryText = (text: string): string =>
  text
    .replace(/^#{1,6}\s*/gm, '')
    .replace(/^(\s*)\*\s+/gm, '$1- ')
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/(?<!\*)\*(?!\*)/g, '')
    .replace(/\n\s*\n\s*\n+/g, '\n\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trim();

const DAY_HEADING = /^\s*(?:[-•]\s*)?day\s+(\d+)\b\s*[:.\-–—]?\s*(.*)$/i;
const TIME_MARKER =
  /^\s*(?:[-•]\s*)?(\d{1,2}[:.]\d{2}\s*(?:am|pm)?(?:\s*[-–]\s*\d{1,2}[:.]\d{2}\s*(?:am|pm)?)?|morning|late morning|afternoon|evening|night|breakfast|lunch|dinner)\b\s*[:\-–—]?\s*(.*)$/i;
const BULLET = /^\s*[-•]\s+(.*)$/;
const ADDRESS = /^\s*(?:[-•]\s*)?address\s*:\s*(.+)$/i;
const SECTION_HEADING = /^[^a-z]*[A-Z]{4,}[^a-z]*$/;
const PRICE = /(?:[$€£¥₹]|\b(?:USD|EUR|GBP|JPY|CAD|AUD|CHF|INR|THB)\s?)(\d[\d,]*(?:\.\d+)?)/;

const costFromText = (text: string): number => {
  const match = text.match(PRICE);
  return match?.[1] ? toCost(match[1]) : 0;
};

/**
 * Fallback for answers that ignored the JSON contract and came back as the
 * "Day 1: ... Morning: ..." prose the model writes by default.
 */
export const parseTextItinerary = (raw: string): RawItinerary | null => {
  const days: RawDay[] = [];
  const seen = new Set<number>();
  let day: RawDay | null = null;
  let activity: ActivityBlock | null = null;

  const closeActivity = (): void => {
    if (day && activity && activity.description) {
      activity.estimatedCost = costFromText(activity.description);
      day.activities.push(activity);
    }
    activity = null;
  };

  for (const line of cleanItineraryText(raw).split('\n')) {
    if (!line.trim()) continue;

    const heading = line.match(DAY_HEADING);
    if (heading) {
      closeActivity();
      const number = Number(heading[1]);
      // Budget summaries repeat "Day 1: ..." lines after the plan itself.
      if (seen.has(number)) {
        day = null;
        continue;
      }
      seen.add(number);
      day = { day: number, title: (heading[2] ?? '').trim(), activities: [] };
      days.push(day);
      continue;
    }

    const marker = line.match(TIME_MARKER);
    if (!marker && SECTION_HEADING.test(line.trim())) {
      closeActivity();
      day = null;
      continue;
    }

    if (!day) continue;

    const address = line.match(ADDRESS);
    if (address) {
      if (activity) activity.location = (address[1] ?? '').trim();
      continue;
    }

    const bullet = marker ? null : line.match(BULLET);
    if (marker || bullet) {
      closeActivity();
      activity = {
        time: marker ? (marker[1] ?? '').trim() : '',
        description: ((marker ? marker[2] : bullet?.[1]) ?? '').trim(),
        location: '',
        estimatedCost: 0
      };
      continue;
    }

    if (activity) {
      activity.description = `${activity.description} ${line.trim()}`.trim();
    }
  }
  closeActivity();

  return days.length > 0 ? { days } : null;
};

/** Keeps the first entry for each day number, in day order. */
const orderDays = (days: RawDay[]): RawDay[] => {
  if (!days.every((day) => day.day !== undefined)) {
    return days;
  }
  const seen = new Set<number>();
  return days
    .filter((day) => {
      const number = day.day ?? 0;
      if (seen.has(number)) return false;
      seen.add(number);
      return true;
    })
    .sort((a, b) => (a.day ?? 0) - (b.day ?? 0));
};

const normalize = (raw: RawItinerary, frame: ItineraryFrame): AdapterResult<Itinerary> => {
  const ordered = orderDays(raw.days);

  if (ordered.length < frame.dayCount) {
    return fail(
      'gemini',
      'malformed_response',
      `Expected ${frame.dayCount} days but the itinerary has ${ordered.length}`
    );
  }

  const days: DayEntry[] = ordered.slice(0, frame.dayCount).map((day, index) => ({
    dayNumber: index + 1,
    date: addDays(frame.startDate, index),
    title: day.title.trim() || `Day ${index + 1}`,
    activities: day.activities
      .filter((activity) => activity.description.trim() !== '')
      .map((activity) => ({
        time: activity.time.trim(),
        description: activity.description.trim(),
        location: activity.location.trim(),
        estimatedCost: activity.estimatedCost
      }))
  }));

  if (days.every((day) => day.activities.length === 0)) {
    return fail('gemini', 'malformed_response', 'The itinerary has no activities');
  }

  return succeed({
    destination: frame.destination,
    startDate: frame.startDate,
    endDate: frame.endDate,
    currency: frame.currency,
    days,
    ...(raw.summary ? { summary: raw.summary } : {}),
    ...(raw.tips ? { tips: raw.tips } : {})
  });
};

/** Turns a model answer into an Itinerary covering exactly the frame's dates. */
export const parseItinerary = (raw: string, frame: ItineraryFrame): AdapterResult<Itinerary> => {
  const parsed = parseJsonItinerary(raw) ?? parseTextItinerary(raw);
  if (!parsed) {
    return fail('gemini', 'malformed_response', 'No day-by-day plan found in the response');
  }
  return normalize(parsed, frame);
};
