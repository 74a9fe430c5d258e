import { parseKpiConfig, type KpiConfig } from './config.js';
import {
  flightKey,
  ratio,
  type LegFact,
  type SegmentRollup,
  type YieldIndexedLeg,
} from './records.js';

// =============================================================================
// KPI Engine
//
// Every KPI is a pure function of the leg/segment marts plus the frozen
// config record the engine was built with. Ratios come back as null when the
// denominator is zero; callers never see NaN or a substituted 0.
//
//   FWLF  fleet-wide load factor        Σpax / Σseats
//   PACS  profit after connection value and seat cost, per seat-leg
//   YALF  yield-adjusted load factor    Σ(pax × yieldIndex) / Σseats
//   ARAS  ancillary revenue per available seat
//   SRM   passenger-legs per flight (proxy)
//   CALF  capacity-adjusted load factor (FWLF until no-shows are modeled)
//   OTRI  on-time reliability index (no OTP feed yet)
// =============================================================================

export type SegmentLoadFactor = {
  origin: string;
  destination: string;
  pax: number;
  seats: number;
  fwlf: number | null;
};

export type PacsRow = {
  flightNumber: string;
  flightDate: string;
  origin: string;
  destination: string;
  seats: number | null;
  totalRevenue: number;
  connectionValue: number;
  pacsPerSeatLeg: number | null;
};

export type UnavailableKpi = {
  available: false;
  value: null;
  message: string;
};

export const OTRI_UNAVAILABLE_MESSAGE = 'On-time performance feed not connected; OTRI not computed';

export class KpiEngine {
  readonly config: KpiConfig;

  constructor(config: KpiConfig) {
    // Re-validate: a hand-built record must fail as loudly as a bad file
    this.config = parseKpiConfig(config, 'KpiEngine');
  }

  /** Scenario runs: same marts, different constants */
  withOverrides(overrides: Partial<KpiConfig>): KpiEngine {
    return new KpiEngine({ ...this.config, ...overrides });
  }

  fwlfOverall(legs: LegFact[]): number | null {
    let pax = 0;
    let seats = 0;
    for (const leg of legs) {
      pax += leg.pax;
      seats += leg.seats ?? 0;
    }
    return ratio(pax, seats);
  }

  fwlfBySegment(segments: SegmentRollup[]): SegmentLoadFactor[] {
    return segments.map(seg => ({
      origin: seg.origin,
      destination: seg.destination,
      pax: seg.pax,
      seats: seg.seats,
      fwlf: ratio(seg.pax, seg.seats),
    }));
  }

  pacsLeg(legs: LegFact[]): PacsRow[] {
    const { connectionValuePct, variableCostPerSeatLeg } = this.config;

    return legs.map(leg => {
      const connectionValue = leg.totalRevenue * connectionValuePct;
      const pacs = leg.seats === null
        ? null
        : ratio(leg.totalRevenue + connectionValue - leg.seats * variableCostPerSeatLeg, leg.seats);

      return {
        flightNumber: leg.flightNumber,
        flightDate: leg.flightDate,
        origin: leg.origin,
        destination: leg.destination,
        seats: leg.seats,
        totalRevenue: leg.totalRevenue,
        connectionValue,
        pacsPerSeatLeg: pacs,
      };
    });
  }

  /**
   * Legs without a yield index (pax = 0) never add to the numerator. With
   * `yalfUnrankedSeats: 'exclude'` their seats stay out of the denominator
   * too, so YALF is measured over ranked capacity only; 'include' counts them
   * as empty capacity and pulls YALF down.
   */
  yalfOverall(legs: YieldIndexedLeg[]): number | null {
    const includeUnranked = this.config.yalfUnrankedSeats === 'include';
    let weightedPax = 0;
    let seats = 0;

    for (const leg of legs) {
      if (leg.seats === null) continue;
      if (leg.yieldIndex === null) {
        if (includeUnranked) seats += leg.seats;
        continue;
      }
      weightedPax += leg.pax * leg.yieldIndex;
      seats += leg.seats;
    }

    return ratio(weightedPax, seats);
  }

  /**
   * Ancillary revenue is summed per (flight, date); capacity belongs to the
   * flight record for that key, so it is counted once per flight-date no
   * matter how many legs share it. Flight-dates without capacity are left out.
   */
  arasOverall(legs: LegFact[]): number | null {
    const flights = new Map<string, { ancillary: number; seats: number }>();

    for (const leg of legs) {
      if (leg.seats === null) continue;
      const key = flightKey(leg.flightNumber, leg.flightDate);
      const entry = flights.get(key);
      if (entry) entry.ancillary += leg.ancillaryRevenue;
      else flights.set(key, { ancillary: leg.ancillaryRevenue, seats: leg.seats });
    }

    let ancillary = 0;
    let seats = 0;
    for (const f of flights.values()) {
      ancillary += f.ancillary;
      seats += f.seats;
    }
    return ratio(ancillary, seats);
  }

  /**
   * Passenger-legs per distinct flight-date. Only an approximation of seat
   * reuse: true reuse needs passenger identity stitched across itineraries.
   */
  srmProxy(legs: LegFact[]): number | null {
    const flights = new Set<string>();
    let pax = 0;
    for (const leg of legs) {
      flights.add(flightKey(leg.flightNumber, leg.flightDate));
      pax += leg.pax;
    }
    return ratio(pax, flights.size);
  }

  // TODO: subtract modeled no-shows from pax once a no-show rate per route is available
  calfOverall(legs: LegFact[]): number | null {
    return this.fwlfOverall(legs);
  }

  otri(): UnavailableKpi {
    return { available: false, value: null, message: OTRI_UNAVAILABLE_MESSAGE };
  }
}
