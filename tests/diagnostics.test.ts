import { describe, it, expect } from 'vitest';
import {
  ancillaryShareBySegment,
  cancelRateBySegment,
  loadFactorByTimeOfDay,
  rankLegs,
  runBookingChecks,
  runLegChecks,
} from '../server/diagnostics.js';
import { makeBooking, makeIndexedLeg, makeLeg } from './helpers.js';

describe('Leg boundary checks', () => {
  it('finds nothing wrong with clean legs', () => {
    expect(runLegChecks([makeLeg(), makeLeg({ flightNumber: 'X', pax: 180, seats: 180 })])).toEqual({
      negativePax: 0,
      badSeats: 0,
      loadFactorOutOfBounds: 0,
    });
  });

  it('counts negative pax, missing or non-positive seats, and out-of-range load factor', () => {
    const legs = [
      makeLeg({ flightNumber: 'A', pax: -3, seats: 100 }),
      makeLeg({ flightNumber: 'B', seats: null }),
      makeLeg({ flightNumber: 'C', seats: 0 }),
      makeLeg({ flightNumber: 'D', pax: 130, seats: 100 }),
    ];

    // A also has LF -0.03
    expect(runLegChecks(legs)).toEqual({ negativePax: 1, badSeats: 2, loadFactorOutOfBounds: 2 });
  });

  it('allows load factor up to the tolerance, exclusive above it', () => {
    const atTolerance = makeLeg({ pax: 120, seats: 100 });
    const above = makeLeg({ flightNumber: 'X', pax: 121, seats: 100 });

    expect(runLegChecks([atTolerance]).loadFactorOutOfBounds).toBe(0);
    expect(runLegChecks([above]).loadFactorOutOfBounds).toBe(1);
    expect(runLegChecks([above], { lfUpperTolerance: 1.5, rankingSize: 10 }).loadFactorOutOfBounds).toBe(0);
  });
});

describe('Booking checks', () => {
  it('counts each rule independently', () => {
    const bookings = [
      makeBooking({ cancellationDate: '2023-12-01', passengerCount: 0, ancillaryAtCheckinRevenue: 15 }),
      makeBooking({ cancellationDate: '2023-12-01', passengerCount: 2, daysAfterBookingToCancel: -1 }),
      makeBooking({ passengerCount: 0, ticketRevenue: 50 }),
      makeBooking({ ticketRevenue: -10 }),
      makeBooking({ passengerCount: -1 }),
      makeBooking(),
    ];

    expect(runBookingChecks(bookings, [])).toEqual({
      cancelledWithCheckinAncillary: 1,
      cancellationBeforeReservation: 1,
      // the first booking has check-in ancillary with zero passengers
      revenueWithZeroPassengers: 2,
      negativeRevenueFields: 1,
      negativePassengers: 1,
      cancellationWithPositivePax: 1,
      missingCapacityForLeg: 0,
      paxExceedsCapacity: 0,
    });
  });

  it('counts legs without capacity and legs with more pax than seats', () => {
    const legs = [
      makeLeg({ flightNumber: 'A', seats: null }),
      makeLeg({ flightNumber: 'B', pax: 181, seats: 180 }),
      makeLeg({ flightNumber: 'C', pax: 180, seats: 180 }),
    ];
    const counts = runBookingChecks([], legs);
    expect(counts.missingCapacityForLeg).toBe(1);
    expect(counts.paxExceedsCapacity).toBe(1);
  });
});

describe('Breakdowns', () => {
  it('averages leg load factor per time of day, keeping unknown time apart', () => {
    const legs = [
      makeLeg({ flightNumber: 'A', timeOfDay: 'Morning', pax: 90, seats: 100 }),
      makeLeg({ flightNumber: 'B', timeOfDay: 'Evening', pax: 50, seats: 100 }),
      makeLeg({ flightNumber: 'C', timeOfDay: 'Morning', pax: 70, seats: 100 }),
      makeLeg({ flightNumber: 'D', timeOfDay: null, seats: null }),
    ];

    const rows = loadFactorByTimeOfDay(legs);

    expect(rows).toHaveLength(3);
    expect(rows[0].timeOfDay).toBe('Morning');
    expect(rows[0].legs).toBe(2);
    expect(rows[0].avgLoadFactor).toBeCloseTo(0.8, 10);
    expect(rows[1]).toEqual({ timeOfDay: 'Evening', legs: 1, avgLoadFactor: 0.5 });
    expect(rows[2]).toEqual({ timeOfDay: null, legs: 1, avgLoadFactor: null });
  });

  it('averages per-leg cancel rates per segment', () => {
    const legs = [
      makeLeg({ flightNumber: 'A', pax: 3, cancels: 1 }),
      makeLeg({ flightNumber: 'B', pax: 1, cancels: 1 }),
      makeLeg({ flightNumber: 'C', origin: 'MUC', destination: 'PMI', pax: 0, cancels: 0 }),
    ];

    expect(cancelRateBySegment(legs)).toEqual([
      { origin: 'FRA', destination: 'FCO', value: (0.25 + 0.5) / 2 },
      { origin: 'MUC', destination: 'PMI', value: null },
    ]);
  });

  it('reports ancillary share of revenue per segment', () => {
    const legs = [
      makeLeg({ flightNumber: 'A', ancillaryRevenue: 100, totalRevenue: 1000 }),
      makeLeg({ flightNumber: 'B', ancillaryRevenue: 300, totalRevenue: 1000 }),
      makeLeg({ flightNumber: 'C', origin: 'MUC', destination: 'PMI', ancillaryRevenue: 0, totalRevenue: 0 }),
    ];

    expect(ancillaryShareBySegment(legs)).toEqual([
      { origin: 'FRA', destination: 'FCO', value: 0.2 },
      { origin: 'MUC', destination: 'PMI', value: null },
    ]);
  });
});

describe('Rankings', () => {
  const legs = [
    makeIndexedLeg({ flightNumber: 'A', pax: 50, seats: 100, revPerPax: 120 }),
    makeIndexedLeg({ flightNumber: 'B', pax: 90, seats: 100, revPerPax: null }),
    makeIndexedLeg({ flightNumber: 'C', pax: 20, seats: 100, revPerPax: 300 }),
    makeIndexedLeg({ flightNumber: 'D', pax: 10, seats: null, revPerPax: 80 }),
  ];

  it('ranks ascending and descending by load factor with nulls last', () => {
    expect(rankLegs(legs, 'loadFactor', 'asc').map(l => l.flightNumber)).toEqual(['C', 'A', 'B', 'D']);
    expect(rankLegs(legs, 'loadFactor', 'desc').map(l => l.flightNumber)).toEqual(['B', 'A', 'C', 'D']);
  });

  it('ranks by revenue per pax with nulls last', () => {
    expect(rankLegs(legs, 'revPerPax', 'asc').map(l => l.flightNumber)).toEqual(['D', 'A', 'C', 'B']);
    expect(rankLegs(legs, 'revPerPax', 'desc').map(l => l.flightNumber)).toEqual(['C', 'A', 'D', 'B']);
  });

  it('returns at most n legs', () => {
    expect(rankLegs(legs, 'loadFactor', 'desc', 2).map(l => l.flightNumber)).toEqual(['B', 'A']);
    expect(rankLegs(legs, 'loadFactor', 'desc', 0)).toEqual([]);
  });
});
