import {
  ancillaryRevenue,
  flightKey,
  isCancelled,
  legKey,
  type BookingRecord,
  type FlightRecord,
  type LegFact,
} from './records.js';

// =============================================================================
// Leg Aggregator
//
// Bookings → one leg fact per (flight number, flight date, origin,
// destination). All four fields form the key: grouping on fewer silently
// merges revenue from different legs of the same flight.
//
// Capacity and schedule metadata come from the flight record with the same
// (flight number, flight date). A leg without one keeps null seats, null
// time-of-day/route-type and a null load factor. Capacity ≤ 0 also yields a
// null load factor.
// =============================================================================

export type LegAggregation = {
  legs: LegFact[];
  /** Legs whose (flight number, date) had no flight record */
  unmatchedLegs: number;
  /** (flight number, date) pairs seen more than once in the flight table (first record wins) */
  duplicateFlightKeys: FlightKey[];
};

export type FlightKey = Pick<FlightRecord, 'flightNumber' | 'flightDate'>;

function indexFlights(flights: FlightRecord[]): { byKey: Map<string, FlightRecord>; duplicates: FlightKey[] } {
  const byKey = new Map<string, FlightRecord>();
  const duplicates = new Map<string, FlightKey>();

  for (const flight of flights) {
    const key = flightKey(flight.flightNumber, flight.flightDate);
    if (byKey.has(key)) {
      duplicates.set(key, { flightNumber: flight.flightNumber, flightDate: flight.flightDate });
      continue;
    }
    byKey.set(key, flight);
  }

  return { byKey, duplicates: [...duplicates.values()] };
}

export function loadFactor(pax: number, seats: number | null): number | null {
  if (seats === null || seats <= 0) return null;
  return pax / seats;
}

export function aggregateLegs(bookings: BookingRecord[], flights: FlightRecord[]): LegAggregation {
  const groups = new Map<string, LegFact>();

  for (const b of bookings) {
    const key = legKey(b);
    let leg = groups.get(key);
    if (!leg) {
      leg = {
        flightNumber: b.flightNumber,
        flightDate: b.flightDate,
        origin: b.origin,
        destination: b.destination,
        bookings: 0,
        pax: 0,
        ticketRevenue: 0,
        ancillaryRevenue: 0,
        totalRevenue: 0,
        cancels: 0,
        seats: null,
        timeOfDay: null,
        routeType: null,
        loadFactor: null,
      };
      groups.set(key, leg);
    }

    const ancillary = ancillaryRevenue(b);
    leg.bookings += 1;
    leg.pax += b.passengerCount;
    leg.ticketRevenue += b.ticketRevenue;
    leg.ancillaryRevenue += ancillary;
    leg.totalRevenue += b.ticketRevenue + ancillary;
    if (isCancelled(b)) leg.cancels += 1;
  }

  const { byKey, duplicates } = indexFlights(flights);
  let unmatchedLegs = 0;

  const legs = [...groups.values()].map(leg => {
    const flight = byKey.get(flightKey(leg.flightNumber, leg.flightDate));
    if (!flight) {
      unmatchedLegs++;
      return leg;
    }
    return {
      ...leg,
      seats: flight.availableCapacity,
      timeOfDay: flight.timeOfDay,
      routeType: flight.routeType,
      loadFactor: loadFactor(leg.pax, flight.availableCapacity),
    };
  });

  if (unmatchedLegs > 0) {
    console.warn(`[Legs] ${unmatchedLegs} of ${legs.length} legs have no flight record (seats left null)`);
  }
  if (duplicates.length > 0) {
    console.warn(`[Legs] ${duplicates.length} duplicate flight keys; first record used`);
  }

  return { legs, unmatchedLegs, duplicateFlightKeys: duplicates };
}
