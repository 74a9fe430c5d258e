import { DEFAULT_DIAGNOSTICS_OPTIONS, type DiagnosticsOptions } from './config.js';
import {
  bookingRevenue,
  groupBy,
  isCancelled,
  mean,
  ratio,
  segmentKey,
  type BookingRecord,
  type LegFact,
  type YieldIndexedLeg,
} from './records.js';

// =============================================================================
// Diagnostics & data-quality checks
//
// Boundary checks report violation counts; nothing here throws or stops the
// run. Whether a non-zero count fails a build is the caller's decision
// (see run.ts --strict).
//
// A load factor above 1.0 means overbooking or a data problem. The 1.2
// tolerance is configurable, not a business rule.
// =============================================================================

export type LegCheckCounts = {
  negativePax: number;
  badSeats: number;
  loadFactorOutOfBounds: number;
};

export type BookingCheckCounts = {
  cancelledWithCheckinAncillary: number;
  cancellationBeforeReservation: number;
  revenueWithZeroPassengers: number;
  negativeRevenueFields: number;
  negativePassengers: number;
  cancellationWithPositivePax: number;
  missingCapacityForLeg: number;
  paxExceedsCapacity: number;
};

export function runLegChecks(
  legs: LegFact[],
  options: DiagnosticsOptions = DEFAULT_DIAGNOSTICS_OPTIONS,
): LegCheckCounts {
  let negativePax = 0;
  let badSeats = 0;
  let loadFactorOutOfBounds = 0;

  for (const leg of legs) {
    if (leg.pax < 0) negativePax++;
    if (leg.seats === null || leg.seats <= 0) badSeats++;
    if (leg.loadFactor !== null && (leg.loadFactor < 0 || leg.loadFactor > options.lfUpperTolerance)) {
      loadFactorOutOfBounds++;
    }
  }

  return { negativePax, badSeats, loadFactorOutOfBounds };
}

export function runBookingChecks(bookings: BookingRecord[], legs: LegFact[]): BookingCheckCounts {
  const counts: BookingCheckCounts = {
    cancelledWithCheckinAncillary: 0,
    cancellationBeforeReservation: 0,
    revenueWithZeroPassengers: 0,
    negativeRevenueFields: 0,
    negativePassengers: 0,
    cancellationWithPositivePax: 0,
    missingCapacityForLeg: 0,
    paxExceedsCapacity: 0,
  };

  for (const b of bookings) {
    const cancelled = isCancelled(b);
    if (cancelled && b.ancillaryAtCheckinRevenue > 0) counts.cancelledWithCheckinAncillary++;
    if (cancelled && b.daysAfterBookingToCancel !== null && b.daysAfterBookingToCancel < 0) {
      counts.cancellationBeforeReservation++;
    }
    if (b.passengerCount === 0 && bookingRevenue(b) > 0) counts.revenueWithZeroPassengers++;
    if (b.ticketRevenue < 0 || b.ancillaryPreCheckinRevenue < 0 || b.ancillaryAtCheckinRevenue < 0) {
      counts.negativeRevenueFields++;
    }
    if (b.passengerCount < 0) counts.negativePassengers++;
    if (cancelled && b.passengerCount > 0) counts.cancellationWithPositivePax++;
  }

  for (const leg of legs) {
    if (leg.seats === null) counts.missingCapacityForLeg++;
    else if (leg.pax > leg.seats) counts.paxExceedsCapacity++;
  }

  return counts;
}

// ---------------------------------------------------------------------------
// Breakdowns
// ---------------------------------------------------------------------------

export type TimeOfDayLoadFactor = {
  timeOfDay: string | null;
  legs: number;
  avgLoadFactor: number | null;
};

export type SegmentValue = {
  origin: string;
  destination: string;
  value: number | null;
};

export function loadFactorByTimeOfDay(legs: LegFact[]): TimeOfDayLoadFactor[] {
  // Keyed by JSON so a null bucket stays separate from a literal "null" label
  const groups = groupBy(legs, leg => JSON.stringify(leg.timeOfDay));
  return [...groups.values()].map(group => ({
    timeOfDay: group[0].timeOfDay,
    legs: group.length,
    avgLoadFactor: mean(group.flatMap(leg => (leg.loadFactor === null ? [] : [leg.loadFactor]))),
  }));
}

/** Mean of per-leg cancels / (pax + cancels); legs with nothing booked are skipped */
export function cancelRateBySegment(legs: LegFact[]): SegmentValue[] {
  const groups = groupBy(legs, leg => segmentKey(leg.origin, leg.destination));
  return [...groups.values()].map(group => {
    const rates = group.flatMap(leg => {
      const rate = ratio(leg.cancels, leg.pax + leg.cancels);
      return rate === null ? [] : [rate];
    });
    return { origin: group[0].origin, destination: group[0].destination, value: mean(rates) };
  });
}

export function ancillaryShareBySegment(legs: LegFact[]): SegmentValue[] {
  const groups = groupBy(legs, leg => segmentKey(leg.origin, leg.destination));
  return [...groups.values()].map(group => {
    const ancillary = group.reduce((sum, leg) => sum + leg.ancillaryRevenue, 0);
    const revenue = group.reduce((sum, leg) => sum + leg.totalRevenue, 0);
    return { origin: group[0].origin, destination: group[0].destination, value: ratio(ancillary, revenue) };
  });
}

// ---------------------------------------------------------------------------
// Rankings
// ---------------------------------------------------------------------------

export type RankField = 'loadFactor' | 'revPerPax';
export type RankDirection = 'asc' | 'desc';

/** Top/bottom-N; null values sort last whichever way the ranking runs */
export function rankLegs(
  legs: YieldIndexedLeg[],
  field: RankField,
  direction: RankDirection,
  n: number = DEFAULT_DIAGNOSTICS_OPTIONS.rankingSize,
): YieldIndexedLeg[] {
  const sign = direction === 'asc' ? 1 : -1;
  const sorted = [...legs].sort((a, b) => {
    const av = a[field];
    const bv = b[field];
    if (av === null && bv === null) return 0;
    if (av === null) return 1;
    if (bv === null) return -1;
    return sign * (av - bv);
  });
  return sorted.slice(0, Math.max(0, n));
}
