import {
  segmentKey,
  type LegFact,
  type SegmentRollup,
  type YieldIndexedLeg,
} from './records.js';

// =============================================================================
// Derived marts
//
// Segment rollup: plain sums per (origin, destination). Weighted ratios are
// the KPI engine's job, not this one.
//
// Yield index: a revenue-yield proxy for when fare class is unavailable.
// Within each segment, legs are ranked by revenue per passenger and split
// into 5 equal-frequency buckets (NTILE(5)); bucket b maps to (b - 1) / 4.
// Legs with no revenue per passenger (pax = 0) are left unranked.
// =============================================================================

export const YIELD_BUCKETS = 5;

export function buildSegments(legs: LegFact[]): SegmentRollup[] {
  const segments = new Map<string, SegmentRollup>();

  for (const leg of legs) {
    const key = segmentKey(leg.origin, leg.destination);
    let seg = segments.get(key);
    if (!seg) {
      seg = { origin: leg.origin, destination: leg.destination, legs: 0, pax: 0, seats: 0, totalRevenue: 0 };
      segments.set(key, seg);
    }
    seg.legs += 1;
    seg.pax += leg.pax;
    seg.seats += leg.seats ?? 0;
    seg.totalRevenue += leg.totalRevenue;
  }

  return [...segments.values()];
}

export function revPerPax(leg: LegFact): number | null {
  if (leg.pax <= 0) return null;
  return leg.totalRevenue / leg.pax;
}

/**
 * Bucket numbers (1-indexed) for n ordered rows, NTILE semantics: the first
 * n mod buckets groups hold one extra row. With n < buckets only 1..n appear.
 */
export function ntile(n: number, buckets: number): number[] {
  if (n <= 0 || buckets <= 0) return [];
  const base = Math.floor(n / buckets);
  const extra = n % buckets;
  const result: number[] = [];

  for (let b = 1; b <= buckets; b++) {
    const size = base + (b <= extra ? 1 : 0);
    for (let i = 0; i < size; i++) result.push(b);
  }
  return result;
}

export function yieldIndexForBucket(bucket: number): number {
  return (bucket - 1) / (YIELD_BUCKETS - 1);
}

export function assignYieldIndex(legs: LegFact[]): YieldIndexedLeg[] {
  const out: YieldIndexedLeg[] = legs.map(leg => ({
    ...leg,
    revPerPax: revPerPax(leg),
    yieldBucket: null,
    yieldIndex: null,
  }));

  const partitions = new Map<string, number[]>();
  out.forEach((leg, i) => {
    if (leg.revPerPax === null) return;
    const key = segmentKey(leg.origin, leg.destination);
    const members = partitions.get(key);
    if (members) members.push(i);
    else partitions.set(key, [i]);
  });

  for (const members of partitions.values()) {
    // Array.prototype.sort is stable: equal yields keep input order
    const ranked = [...members].sort((a, b) => (out[a].revPerPax ?? 0) - (out[b].revPerPax ?? 0));
    const buckets = ntile(ranked.length, YIELD_BUCKETS);
    ranked.forEach((idx, rank) => {
      out[idx].yieldBucket = buckets[rank];
      out[idx].yieldIndex = yieldIndexForBucket(buckets[rank]);
    });
  }

  return out;
}
