export interface ActivityBlock {
  time: string;
  description: string;
  location: string;
  estimatedCost: number;
}

export interface DayEntry {
  dayNumber: number;
  /** YYYY-MM-DD */
  date: string;
  title: string;
  activities: ActivityBlock[];
}

export interface Itinerary {
  destination: string;
  startDate: string;
  endDate: string;
  /** ISO 4217 code the estimated costs are expressed in */
  currency: string;
  days: DayEntry[];
  summary?: string;
  tips?: string[];
}

export interface RefinementInput {
  itinerary: Itinerary;
  instruction: string;
}
