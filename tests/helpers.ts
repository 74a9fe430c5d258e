import { parseKpiConfig, type KpiConfig } from '../server/config.js';
import { loadFactor } from '../server/legs.js';
import type { BookingRecord, FlightRecord, LegFact, YieldIndexedLeg } from '../server/records.js';

export function makeBooking(overrides: Partial<BookingRecord> = {}): BookingRecord {
  return {
    flightNumber: 'LH100',
    flightDate: '2024-01-01',
    origin: 'FRA',
    destination: 'FCO',
    passengerCount: 1,
    ticketRevenue: 0,
    ancillaryPreCheckinRevenue: 0,
    ancillaryAtCheckinRevenue: 0,
    cancellationDate: null,
    daysAfterBookingToCancel: null,
    daysBeforeFlightToCancel: null,
    bookingChannel: 'website',
    dayOfWeek: 'Monday',
    ...overrides,
  };
}

export function makeFlight(overrides: Partial<FlightRecord> = {}): FlightRecord {
  return {
    flightNumber: 'LH100',
    flightDate: '2024-01-01',
    availableCapacity: 180,
    timeOfDay: 'Morning',
    routeType: 'Leisure',
    ...overrides,
  };
}

/** Leg fact whose load factor follows pax/seats unless given explicitly */
export function makeLeg(overrides: Partial<LegFact> = {}): LegFact {
  const base: LegFact = {
    flightNumber: 'LH100',
    flightDate: '2024-01-01',
    origin: 'FRA',
    destination: 'FCO',
    bookings: 1,
    pax: 100,
    ticketRevenue: 0,
    ancillaryRevenue: 0,
    totalRevenue: 0,
    cancels: 0,
    seats: 180,
    timeOfDay: 'Morning',
    routeType: 'Leisure',
    loadFactor: null,
    ...overrides,
  };
  return {
    ...base,
    loadFactor: 'loadFactor' in overrides ? base.loadFactor : loadFactor(base.pax, base.seats),
  };
}

export function makeIndexedLeg(overrides: Partial<YieldIndexedLeg> = {}): YieldIndexedLeg {
  const { revPerPax = null, yieldBucket = null, yieldIndex = null, ...leg } = overrides;
  return { ...makeLeg(leg), revPerPax, yieldBucket, yieldIndex };
}

export const testConfig: KpiConfig = parseKpiConfig({
  variableCostPerSeatLeg: 25,
  connectionValuePct: 0.15,
});
