// ============================================
// Vacation extractor — answers only the fields the question asks about
// Expects trip records shaped like:
//   Thailand – Bangkok & Phuket (2023)
//   Airline: Thai Airways
//   Hotel: Riverside Inn - $900
//   Rental Car: Toyota Yaris - $250
//   Total Cost: $3,200
// ============================================

import type { SynthesisInput } from "./types.js";

export type TripField = "destination" | "car" | "cost" | "airline" | "hotel";

export interface TripRecord {
  country: string;
  cities: string;
  year: string;
  rentalCar?: string;
  carCost?: string;
  totalCost?: string;
  airline?: string;
  hotel?: string;
  hotelCost?: string;
}

/** One header per line; the country may be several words */
const TRIP_HEADER = /^[ \t]*([A-Z][\w ]*?)[ \t]*[-–][ \t]*([^(\n]+?)[ \t]*\((\d{4})\)/gm;
const QUESTION_YEAR = /\b((?:19|20)\d{2})\b/;

const FIELD_WORDS: ReadonlyArray<[TripField, string[]]> = [
  ["destination", ["where", "destination", "location"]],
  ["car", ["car", "rental", "vehicle"]],
  ["cost", ["cost", "spend", "spent", "money", "price", "total"]],
  ["airline", ["airline", "flight", "flew"]],
  ["hotel", ["hotel", "stay", "stayed"]],
];

export function requestedFields(questionLower: string): TripField[] {
  return FIELD_WORDS.filter(([, words]) => words.some((w) => new RegExp(`\\b${w}`).test(questionLower))).map(
    ([field]) => field
  );
}

/** "Toyota Yaris - $250" -> ["Toyota Yaris", "$250"] */
function splitPricedValue(value: string): [string, string | undefined] {
  const priced = /^(.*?)\s*[-–]\s*(\$[0-9,]+(?:\.\d{2})?)\s*$/.exec(value);
  return priced ? [(priced[1] ?? "").trim(), priced[2]] : [value.trim(), undefined];
}

function field(segment: string, label: string): string | undefined {
  const match = new RegExp(`${label}:[ \\t]*([^\\n]+)`).exec(segment);
  return match?.[1]?.trim() || undefined;
}

/**
 * First trip header (in passage order) matching the year, with its fields
 * read from the text up to the next header.
 */
export function findTrip(texts: readonly string[], year?: string): TripRecord | null {
  for (const text of texts) {
    const headers = [...text.matchAll(TRIP_HEADER)];

    for (const [i, header] of headers.entries()) {
      const [, country, cities, headerYear] = header;
      if (!country || !cities || !headerYear) continue;
      if (year && headerYear !== year) continue;

      const start = (header.index ?? 0) + header[0].length;
      const end = headers[i + 1]?.index ?? text.length;
      const segment = text.slice(start, end);

      const trip: TripRecord = { country: country.trim(), cities: cities.trim(), year: headerYear };

      const car = field(segment, "Rental Car");
      if (car) [trip.rentalCar, trip.carCost] = splitPricedValue(car);

      const hotel = field(segment, "Hotel");
      if (hotel) [trip.hotel, trip.hotelCost] = splitPricedValue(hotel);

      const total = /Total Cost:\s*(\$[0-9,]+(?:\.\d{2})?)/.exec(segment);
      if (total?.[1]) trip.totalCost = total[1];

      trip.airline = field(segment, "Airline");

      return trip;
    }
  }
  return null;
}

/** "a", "a and b", "a, b, and c" */
export function joinNatural(parts: readonly string[]): string {
  if (parts.length <= 1) return parts[0] ?? "";
  if (parts.length === 2) return `${parts[0]} and ${parts[1]}`;
  return `${parts.slice(0, -1).join(", ")}, and ${parts[parts.length - 1]}`;
}

function describe(trip: TripRecord, wanted: TripField): string | undefined {
  switch (wanted) {
    case "destination":
      return trip.cities ? `${trip.country} (${trip.cities})` : trip.country;
    case "car":
      return trip.rentalCar && (trip.carCost ? `${trip.rentalCar} for ${trip.carCost}` : trip.rentalCar);
    case "cost":
      return trip.totalCost;
    case "airline":
      return trip.airline;
    case "hotel":
      return trip.hotel && (trip.hotelCost ? `${trip.hotel} for ${trip.hotelCost}` : trip.hotel);
  }
}

export function synthesizeVacation({ question, passages, classification }: SynthesisInput): string | null {
  const lower = question.toLowerCase();
  const wanted = requestedFields(lower);
  if (wanted.length === 0 || !(classification.isVacation || lower.includes("where"))) {
    return null;
  }

  const year = classification.years[0] ?? QUESTION_YEAR.exec(question)?.[1];
  const trip = findTrip(
    passages.map((p) => p.text),
    year
  );
  if (!trip) return null;

  const parts = wanted.map((w) => describe(trip, w)).filter((p): p is string => Boolean(p));
  return parts.length > 0 ? joinNatural(parts) : null;
}
