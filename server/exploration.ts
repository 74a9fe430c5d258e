import {
  DAYS_OF_WEEK,
  dayOfWeekFromDate,
  groupBy,
  isCancelled,
  mean,
  ratio,
  segmentKey,
  type BookingRecord,
  type DayOfWeek,
  type LegFact,
  type YieldIndexedLeg,
} from './records.js';

// =============================================================================
// Exploratory breakdowns
//
// Cancellation behaviour by weekday, channel and lead time (booking grain),
// load factor by weekday, segment × weekday and direction (leg grain), and
// the revenue-per-pax vs load-factor correlation. Descriptive only.
// =============================================================================

export type DayOfWeekCancellations = {
  dayOfWeek: DayOfWeek;
  bookings: number;
  cancels: number;
  cancelRate: number | null;
};

export type ChannelCancellations = {
  channel: string;
  bookings: number;
  cancels: number;
  cancelRate: number | null;
};

export type LeadTimeBucket = {
  days: number;
  count: number;
};

export type LeadTimeField = 'daysAfterBookingToCancel' | 'daysBeforeFlightToCancel';

export type DayOfWeekLoadFactor = {
  dayOfWeek: DayOfWeek;
  avgLoadFactor: number | null;
};

export type SegmentDayOfWeekLoadFactor = {
  origin: string;
  destination: string;
  dayOfWeek: DayOfWeek;
  legs: number;
  avgLoadFactor: number | null;
};

export type DirectionalImbalance = {
  origin: string;
  destination: string;
  loadFactor: number | null;
  reverseLoadFactor: number | null;
  diff: number | null;
};

const UNKNOWN_CHANNEL = 'unknown';

function canonicalDay(booking: BookingRecord): DayOfWeek | null {
  if (booking.dayOfWeek !== null) {
    const lower = booking.dayOfWeek.toLowerCase();
    return DAYS_OF_WEEK.find(d => d.toLowerCase() === lower) ?? null;
  }
  return dayOfWeekFromDate(booking.flightDate);
}

function definedLoadFactors(legs: LegFact[]): number[] {
  return legs.flatMap(leg => (leg.loadFactor === null ? [] : [leg.loadFactor]));
}

export function cancellationsByDayOfWeek(bookings: BookingRecord[]): DayOfWeekCancellations[] {
  const rows = new Map<DayOfWeek, { bookings: number; cancels: number }>(
    DAYS_OF_WEEK.map(d => [d, { bookings: 0, cancels: 0 }]),
  );

  for (const b of bookings) {
    const day = canonicalDay(b);
    if (day === null) continue;
    const row = rows.get(day);
    if (!row) continue;
    row.bookings++;
    if (isCancelled(b)) row.cancels++;
  }

  return DAYS_OF_WEEK.map(day => {
    const row = rows.get(day) ?? { bookings: 0, cancels: 0 };
    return { dayOfWeek: day, ...row, cancelRate: ratio(row.cancels, row.bookings) };
  });
}

export function cancellationsByChannel(bookings: BookingRecord[]): ChannelCancellations[] {
  const groups = groupBy(bookings, b => b.bookingChannel ?? UNKNOWN_CHANNEL);
  return [...groups.entries()]
    .map(([channel, group]) => {
      const cancels = group.filter(isCancelled).length;
      return { channel, bookings: group.length, cancels, cancelRate: ratio(cancels, group.length) };
    })
    .sort((a, b) => b.bookings - a.bookings);
}

export function cancellationLeadTimes(bookings: BookingRecord[], field: LeadTimeField): LeadTimeBucket[] {
  const counts = new Map<number, number>();
  for (const b of bookings) {
    const days = b[field];
    if (!isCancelled(b) || days === null) continue;
    counts.set(days, (counts.get(days) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([days, count]) => ({ days, count }))
    .sort((a, b) => a.days - b.days);
}

/** Average per flight date first, so busy dates don't outweigh quiet ones */
export function loadFactorByDayOfWeek(legs: LegFact[]): DayOfWeekLoadFactor[] {
  const byDay = new Map<DayOfWeek, number[]>();

  for (const [date, group] of groupBy(legs, leg => leg.flightDate)) {
    const day = dayOfWeekFromDate(date);
    const dateMean = mean(definedLoadFactors(group));
    if (day === null || dateMean === null) continue;
    const values = byDay.get(day);
    if (values) values.push(dateMean);
    else byDay.set(day, [dateMean]);
  }

  return DAYS_OF_WEEK.map(day => ({ dayOfWeek: day, avgLoadFactor: mean(byDay.get(day) ?? []) }));
}

/**
 * Mean leg LF per segment and weekday of the flight date. Segments keep
 * first-seen order, weekdays run Monday..Sunday within each; only
 * segment/weekday pairs that have legs appear.
 */
export function loadFactorBySegmentAndDayOfWeek(legs: LegFact[]): SegmentDayOfWeekLoadFactor[] {
  const rows: SegmentDayOfWeekLoadFactor[] = [];

  for (const group of groupBy(legs, leg => segmentKey(leg.origin, leg.destination)).values()) {
    const { origin, destination } = group[0];
    const byDay = groupBy(
      group.flatMap(leg => {
        const day = dayOfWeekFromDate(leg.flightDate);
        return day === null ? [] : [{ day, leg }];
      }),
      entry => entry.day,
    );

    for (const day of DAYS_OF_WEEK) {
      const entries = byDay.get(day);
      if (!entries) continue;
      rows.push({
        origin,
        destination,
        dayOfWeek: day,
        legs: entries.length,
        avgLoadFactor: mean(definedLoadFactors(entries.map(e => e.leg))),
      });
    }
  }

  return rows;
}

export function directionalImbalance(legs: LegFact[]): DirectionalImbalance[] {
  const segments = groupBy(legs, leg => segmentKey(leg.origin, leg.destination));
  const lfBySegment = new Map<string, number | null>();
  for (const [key, group] of segments) {
    lfBySegment.set(key, mean(definedLoadFactors(group)));
  }

  return [...segments.values()].map(group => {
    const { origin, destination } = group[0];
    const loadFactor = lfBySegment.get(segmentKey(origin, destination)) ?? null;
    const reverseLoadFactor = lfBySegment.get(segmentKey(destination, origin)) ?? null;
    const diff = loadFactor !== null && reverseLoadFactor !== null ? loadFactor - reverseLoadFactor : null;
    return { origin, destination, loadFactor, reverseLoadFactor, diff };
  });
}

/** Pearson r over legs with both values; null below 3 pairs or with zero variance */
export function revPerPaxLoadFactorCorrelation(legs: YieldIndexedLeg[]): number | null {
  const pairs = legs.flatMap(leg =>
    leg.loadFactor !== null && leg.revPerPax !== null ? [[leg.loadFactor, leg.revPerPax] as const] : [],
  );
  if (pairs.length < 3) return null;

  const mx = pairs.reduce((s, [x]) => s + x, 0) / pairs.length;
  const my = pairs.reduce((s, [, y]) => s + y, 0) / pairs.length;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (const [x, y] of pairs) {
    sxy += (x - mx) * (y - my);
    sxx += (x - mx) ** 2;
    syy += (y - my) ** 2;
  }

  return ratio(sxy, Math.sqrt(sxx * syy));
}
