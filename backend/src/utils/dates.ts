const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Parses YYYY-MM-DD as a UTC calendar day; null for anything else. */
export const parseIsoDate = (value: string): Date | null => {
  if (!ISO_DATE.test(value)) {
    return null;
  }
  const date = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
    return null;
  }
  return date;
};

export const formatIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

export const addDays = (isoDate: string, days: number): string => {
  const start = parseIsoDate(isoDate);
  if (!start) {
    throw new RangeError(`Not a calendar date: ${isoDate}`);
  }
  return formatIsoDate(new Date(start.getTime() + days * DAY_MS));
};

/** Inclusive number of calendar days from start to end; 0 when end < start. */
export const countTripDays = (startDate: string, endDate: string): number => {
  const start = parseIsoDate(startDate);
  const end = parseIsoDate(endDate);
  if (!start || !end || end < start) {
    return 0;
  }
  return Math.round((end.getTime() - start.getTime()) / DAY_MS) + 1;
};
