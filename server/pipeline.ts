import { DEFAULT_DIAGNOSTICS_OPTIONS, type DiagnosticsOptions, type KpiConfig } from './config.js';
import { aggregateLegs } from './legs.js';
import { assignYieldIndex, buildSegments } from './marts.js';
import { KpiEngine, type PacsRow, type SegmentLoadFactor, type UnavailableKpi } from './kpis.js';
import {
  ancillaryShareBySegment,
  cancelRateBySegment,
  loadFactorByTimeOfDay,
  rankLegs,
  runBookingChecks,
  runLegChecks,
  type BookingCheckCounts,
  type LegCheckCounts,
  type SegmentValue,
  type TimeOfDayLoadFactor,
} from './diagnostics.js';
import {
  cancellationLeadTimes,
  cancellationsByChannel,
  cancellationsByDayOfWeek,
  directionalImbalance,
  loadFactorByDayOfWeek,
  loadFactorBySegmentAndDayOfWeek,
  revPerPaxLoadFactorCorrelation,
  type ChannelCancellations,
  type DayOfWeekCancellations,
  type DayOfWeekLoadFactor,
  type DirectionalImbalance,
  type LeadTimeBucket,
  type SegmentDayOfWeekLoadFactor,
} from './exploration.js';
import type {
  BookingRecord,
  FlightRecord,
  LegFact,
  SegmentRollup,
  YieldIndexedLeg,
} from './records.js';

// =============================================================================
// Batch pipeline
//
// raw bookings + flights → leg mart → segment / yield-index marts → KPIs,
// checks and breakdowns. Single pass; each stage is fully built before the
// next one reads it. Every result is published under a stable name so
// downstream consumers can ask for "fwlf_overall" without knowing how it is
// derived.
// =============================================================================

export type RawTables = {
  bookings: BookingRecord[];
  flights: FlightRecord[];
};

export type PipelineOutputs = {
  mart_leg: LegFact[];
  mart_segment: SegmentRollup[];
  mart_leg_yield_index: YieldIndexedLeg[];

  fwlf_overall: number | null;
  fwlf_by_segment: SegmentLoadFactor[];
  pacs_leg: PacsRow[];
  yalf_overall: number | null;
  aras_overall: number | null;
  srm_proxy: number | null;
  calf_overall: number | null;
  otri: UnavailableKpi;

  dq_legs: LegCheckCounts;
  dq_bookings: BookingCheckCounts;

  exp_lf_by_time: TimeOfDayLoadFactor[];
  exp_cancel_rate_segment: SegmentValue[];
  exp_anc_share_segment: SegmentValue[];
  exp_low_lf_legs: YieldIndexedLeg[];
  exp_high_lf_legs: YieldIndexedLeg[];
  exp_low_yield_legs: YieldIndexedLeg[];
  exp_high_yield_legs: YieldIndexedLeg[];
  exp_cancel_by_dow: DayOfWeekCancellations[];
  exp_cancel_by_channel: ChannelCancellations[];
  exp_cancel_days_after_booking: LeadTimeBucket[];
  exp_cancel_days_before_flight: LeadTimeBucket[];
  exp_lf_by_dow: DayOfWeekLoadFactor[];
  exp_lf_by_segment_dow: SegmentDayOfWeekLoadFactor[];
  exp_directional_imbalance: DirectionalImbalance[];
  exp_rev_lf_correlation: number | null;
};

export type OutputName = keyof PipelineOutputs;

export const SCALAR_KPI_NAMES = [
  'fwlf_overall',
  'yalf_overall',
  'aras_overall',
  'srm_proxy',
  'calf_overall',
  'otri',
] as const satisfies readonly OutputName[];

export type PipelineSummary = {
  bookings: number;
  flights: number;
  legs: number;
  segments: number;
  unmatchedLegs: number;
  duplicateFlightKeys: number;
  legChecks: LegCheckCounts;
  durationMs: number;
};

export type PipelineResult = {
  outputs: PipelineOutputs;
  summary: PipelineSummary;
};

export type PipelineOptions = {
  diagnostics?: DiagnosticsOptions;
};

export function runPipeline(tables: RawTables, config: KpiConfig, options: PipelineOptions = {}): PipelineResult {
  const started = Date.now();
  const diagnostics = options.diagnostics ?? DEFAULT_DIAGNOSTICS_OPTIONS;
  // Built first: a bad config fails before any aggregation work
  const engine = new KpiEngine(config);

  const { legs, unmatchedLegs, duplicateFlightKeys } = aggregateLegs(tables.bookings, tables.flights);
  console.log(`[Pipeline] legs: ${legs.length} from ${tables.bookings.length} bookings (${unmatchedLegs} without capacity)`);

  const segments = buildSegments(legs);
  const indexed = assignYieldIndex(legs);
  console.log(`[Pipeline] marts: ${segments.length} segments, ${indexed.filter(l => l.yieldIndex !== null).length} legs yield-ranked`);

  const legChecks = runLegChecks(legs, diagnostics);
  const n = diagnostics.rankingSize;

  const outputs: PipelineOutputs = {
    mart_leg: legs,
    mart_segment: segments,
    mart_leg_yield_index: indexed,

    fwlf_overall: engine.fwlfOverall(legs),
    fwlf_by_segment: engine.fwlfBySegment(segments),
    pacs_leg: engine.pacsLeg(legs),
    yalf_overall: engine.yalfOverall(indexed),
    aras_overall: engine.arasOverall(legs),
    srm_proxy: engine.srmProxy(legs),
    calf_overall: engine.calfOverall(legs),
    otri: engine.otri(),

    dq_legs: legChecks,
    dq_bookings: runBookingChecks(tables.bookings, legs),

    exp_lf_by_time: loadFactorByTimeOfDay(legs),
    exp_cancel_rate_segment: cancelRateBySegment(legs),
    exp_anc_share_segment: ancillaryShareBySegment(legs),
    exp_low_lf_legs: rankLegs(indexed, 'loadFactor', 'asc', n),
    exp_high_lf_legs: rankLegs(indexed, 'loadFactor', 'desc', n),
    exp_low_yield_legs: rankLegs(indexed, 'revPerPax', 'asc', n),
    exp_high_yield_legs: rankLegs(indexed, 'revPerPax', 'desc', n),
    exp_cancel_by_dow: cancellationsByDayOfWeek(tables.bookings),
    exp_cancel_by_channel: cancellationsByChannel(tables.bookings),
    exp_cancel_days_after_booking: cancellationLeadTimes(tables.bookings, 'daysAfterBookingToCancel'),
    exp_cancel_days_before_flight: cancellationLeadTimes(tables.bookings, 'daysBeforeFlightToCancel'),
    exp_lf_by_dow: loadFactorByDayOfWeek(legs),
    exp_lf_by_segment_dow: loadFactorBySegmentAndDayOfWeek(legs),
    exp_directional_imbalance: directionalImbalance(legs),
    exp_rev_lf_correlation: revPerPaxLoadFactorCorrelation(indexed),
  };

  const summary: PipelineSummary = {
    bookings: tables.bookings.length,
    flights: tables.flights.length,
    legs: legs.length,
    segments: segments.length,
    unmatchedLegs,
    duplicateFlightKeys: duplicateFlightKeys.length,
    legChecks,
    durationMs: Date.now() - started,
  };

  console.log(
    `[Pipeline] checks: negativePax=${legChecks.negativePax} badSeats=${legChecks.badSeats} ` +
    `lfOutOfBounds=${legChecks.loadFactorOutOfBounds}`,
  );

  return { outputs, summary };
}

/** True when any leg boundary check found a violation */
export function hasViolations(summary: PipelineSummary): boolean {
  const c = summary.legChecks;
  return c.negativePax > 0 || c.badSeats > 0 || c.loadFactorOutOfBounds > 0;
}
