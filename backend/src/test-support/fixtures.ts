import { Itinerary } from '../models/itinerary.model';

export const TEST_KEY = 'test-secret';

export const geocodePayload = (address: string, lat: number, lng: number, country: string) => ({
  status: 'OK',
  results: [
    {
      formatted_address: address,
      place_id: `place-${lat}-${lng}`,
      geometry: { location: { lat, lng } },
      address_components: [
        { long_name: country, short_name: country.slice(0, 2).toUpperCase(), types: ['country', 'political'] }
      ]
    }
  ]
});

export const placesPayload = (...names: string[]) => ({
  status: 'OK',
  results: names.map((name, index) => ({
    place_id: `${name.toLowerCase().replace(/\s+/g, '-')}`,
    name,
    vicinity: `${index + 1} Test Street`,
    rating: 4.5,
    geometry: { location: { lat: 48.85 + index / 100, lng: 2.35 } }
  }))
});

export const timezonePayload = {
  status: 'OK',
  timeZoneId: 'Europe/Paris',
  timeZoneName: 'Central European Summer Time',
  rawOffset: 3600,
  dstOffset: 3600
};

/** Two 3-hourly entries per day, starting at midnight UTC of `startDate`. */
export const forecastPayload = (startDate: string, days: number) => {
  const start = Date.parse(`${startDate}T00:00:00Z`) / 1000;
  const list = [];
  for (let day = 0; day < days; day++) {
    for (const hour of [9, 15]) {
      list.push({
        dt: start + day * 86400 + hour * 3600,
        main: { temp_min: 14 + day, temp_max: 22 + day, humidity: 60 },
        weather: [{ description: 'clear sky' }],
        pop: 0.1
      });
    }
  }
  return { list, city: { timezone: 0 } };
};

export const ratesPayload = (rates: Record<string, number>) => ({ base: 'USD', rates });

export const aiItineraryJson = (dayCount: number, describe = (day: number) => `Explore district ${day}`): string =>
  JSON.stringify({
    summary: 'A short city break',
    days: Array.from({ length: dayCount }, (_, index) => ({
      day: index + 1,
      title: `Day ${index + 1} highlights`,
      activities: [
        { time: '09:00', description: describe(index + 1), location: `${index + 1} Rue de Test`, estimatedCost: 20 },
        { time: '19:00', description: 'Dinner at a bistro', location: '5 Rue de Test', estimatedCost: '€45' }
      ]
    })),
    tips: ['Carry a metro card']
  });

export const parisItinerary = (): Itinerary => ({
  destination: 'Paris, France',
  startDate: '2024-06-01',
  endDate: '2024-06-03',
  currency: 'EUR',
  days: [1, 2, 3].map((dayNumber) => ({
    dayNumber,
    date: `2024-06-0${dayNumber}`,
    title: `Day ${dayNumber} highlights`,
    activities: [
      { time: '09:00', description: `Explore district ${dayNumber}`, location: `${dayNumber} Rue de Test`, estimatedCost: 20 },
      { time: '19:00', description: 'Dinner at a bistro', location: '5 Rue de Test', estimatedCost: 45 }
    ]
  })),
  summary: 'A short city break',
  tips: ['Carry a metro card']
});
