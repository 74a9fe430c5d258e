// =============================================================================
// Raw facts and leg-grain marts
//
// Booking and flight records arrive from ingestion and are never mutated.
// Everything downstream (leg facts, segment rollups, yield index) is rebuilt
// from them on every run.
//
// A ratio that cannot be computed (zero seats, zero pax, empty denominator)
// is `null`, never 0 and never NaN.
// =============================================================================

export type BookingRecord = {
  flightNumber: string;
  flightDate: string;          // YYYY-MM-DD
  origin: string;
  destination: string;
  passengerCount: number;
  ticketRevenue: number;
  ancillaryPreCheckinRevenue: number;
  ancillaryAtCheckinRevenue: number;
  cancellationDate: string | null;
  daysAfterBookingToCancel: number | null;
  daysBeforeFlightToCancel: number | null;
  bookingChannel: string | null;
  dayOfWeek: string | null;
};

export type FlightRecord = {
  flightNumber: string;
  flightDate: string;
  availableCapacity: number;
  timeOfDay: string | null;
  routeType: string | null;
};

export type LegKey = {
  flightNumber: string;
  flightDate: string;
  origin: string;
  destination: string;
};

export type LegFact = LegKey & {
  bookings: number;
  pax: number;
  ticketRevenue: number;
  ancillaryRevenue: number;
  totalRevenue: number;
  cancels: number;
  seats: number | null;
  timeOfDay: string | null;
  routeType: string | null;
  loadFactor: number | null;
};

export type YieldIndexedLeg = LegFact & {
  revPerPax: number | null;
  yieldBucket: number | null;  // 1..5
  yieldIndex: number | null;   // 0..1
};

export type SegmentRollup = {
  origin: string;
  destination: string;
  legs: number;
  pax: number;
  seats: number;
  totalRevenue: number;
};

export const DAYS_OF_WEEK = [
  'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday',
] as const;

export type DayOfWeek = typeof DAYS_OF_WEEK[number];

// Grouping keys are JSON tuples: field values may contain any delimiter, and
// two different tuples must never map to the same key.
export function legKey(leg: LegKey): string {
  return JSON.stringify([leg.flightNumber, leg.flightDate, leg.origin, leg.destination]);
}

export function flightKey(flightNumber: string, flightDate: string): string {
  return JSON.stringify([flightNumber, flightDate]);
}

export function segmentKey(origin: string, destination: string): string {
  return JSON.stringify([origin, destination]);
}

export function ancillaryRevenue(booking: BookingRecord): number {
  return booking.ancillaryPreCheckinRevenue + booking.ancillaryAtCheckinRevenue;
}

export function bookingRevenue(booking: BookingRecord): number {
  return booking.ticketRevenue + ancillaryRevenue(booking);
}

export function isCancelled(booking: BookingRecord): boolean {
  return booking.cancellationDate !== null;
}

/** Weekday of a YYYY-MM-DD date, read in UTC so the host timezone never shifts it */
export function dayOfWeekFromDate(dateStr: string): DayOfWeek | null {
  const date = new Date(`${dateStr}T00:00:00Z`);
  if (Number.isNaN(date.getTime())) return null;
  // getUTCDay: 0 = Sunday
  return DAYS_OF_WEEK[(date.getUTCDay() + 6) % 7];
}

/** Division with an explicit null for a zero (or missing) denominator */
export function ratio(numerator: number, denominator: number | null): number | null {
  if (denominator === null || denominator === 0) return null;
  return numerator / denominator;
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function groupBy<T>(items: T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) group.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}
