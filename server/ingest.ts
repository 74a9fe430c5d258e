import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { SchemaMismatchError, TableMissingError } from './errors.js';
import type { BookingRecord, FlightRecord } from './records.js';

// =============================================================================
// Raw table loading
//
// booking.csv / flight.csv as exported from the booking workbook, headers in
// snake_case (the workbook's column names lower-cased, spaces to underscores,
// parentheses dropped).
//
// A missing file or a missing required column fails the run. A single bad
// row is rejected with its line number and the rest of the table loads.
// =============================================================================

export type RejectedRow = {
  line: number;
  message: string;
};

export type TableLoad<T> = {
  rows: T[];
  rejected: RejectedRow[];
};

// ---------------------------------------------------------------------------
// CSV parser (tiny, zero-dep)
// ---------------------------------------------------------------------------
export function parseCSV(text: string): Record<string, string>[] {
  const lines = text.replace(/\r\n?/g, '\n').trim().split('\n');
  if (lines.length === 0 || lines[0] === '') return [];
  const headers = lines[0].split(',').map(h => h.trim().toLowerCase());
  return lines.slice(1).map(line => {
    const vals = line.split(',');
    const obj: Record<string, string> = {};
    headers.forEach((h, i) => { obj[h] = (vals[i] || '').trim(); });
    return obj;
  });
}

function csvHeaders(text: string): string[] {
  const first = text.replace(/\r\n?/g, '\n').trim().split('\n')[0] ?? '';
  return first.split(',').map(h => h.trim().toLowerCase()).filter(h => h !== '');
}

// ---------------------------------------------------------------------------
// Field schemas
// ---------------------------------------------------------------------------
const text = z.string().trim().min(1);
const optionalText = z.string().default('').transform(v => (v.trim() === '' ? null : v.trim()));
const airport = z.string().trim().min(1).transform(v => v.toUpperCase());
// Workbook dates sometimes carry a time part; the leg grain is the calendar day
const date = z.string().trim().regex(/^\d{4}-\d{2}-\d{2}/, 'expected YYYY-MM-DD').transform(v => v.slice(0, 10));
const optionalDate = z.string().default('').transform(v => (v.trim() === '' ? null : v.trim().slice(0, 10)));
const count = z.string().trim().min(1, 'required').transform(Number).pipe(z.number().finite());
const amount = z.string().default('').transform(v => (v.trim() === '' ? 0 : Number(v))).pipe(z.number().finite());
const optionalNumber = z.string().default('')
  .transform(v => (v.trim() === '' ? null : Number(v)))
  .pipe(z.number().finite().nullable());

const CHANNEL_ALIASES: Record<string, string> = {
  'app': 'app',
  'mobile app': 'app',
  'mobile-app': 'app',
  'website': 'website',
  'web': 'website',
  'call center': 'call center',
  'travel agency': 'travel agency',
  'ota': 'ota',
  'online travel agency': 'ota',
};

export function normalizeChannel(raw: string | null): string | null {
  if (raw === null) return null;
  const key = raw.trim().toLowerCase();
  if (key === '') return null;
  return CHANNEL_ALIASES[key] ?? key;
}

const bookingRowSchema = z.object({
  flightnumber: text,
  flight_date: date,
  origin: airport,
  destination: airport,
  passengercount: count,
  revenue_per_booking_ticket: amount,
  revenue_per_booking_ancilliary_pre_check_in: amount,
  revenue_per_booking_ancilliary_at_check_in: amount,
  cancellation_date: optionalDate,
  days_after_booking_to_cancel: optionalNumber,
  days_before_flight_to_cancel: optionalNumber,
  booking_channel: optionalText,
  flight_dow: optionalText,
});

const flightRowSchema = z.object({
  flightnumber: text,
  flightdate: date,
  availablecapacity: count,
  timeofday: optionalText,
  routetype: optionalText,
});

const BOOKING_REQUIRED = [
  'flightnumber',
  'flight_date',
  'origin',
  'destination',
  'passengercount',
  'revenue_per_booking_ticket',
  'revenue_per_booking_ancilliary_pre_check_in',
  'revenue_per_booking_ancilliary_at_check_in',
  'cancellation_date',
];

const FLIGHT_REQUIRED = ['flightnumber', 'flightdate', 'availablecapacity'];

function loadTable<R, T>(
  table: string,
  csv: string,
  required: string[],
  schema: z.ZodType<R, z.ZodTypeDef, unknown>,
  toRecord: (row: R) => T,
): TableLoad<T> {
  const headers = new Set(csvHeaders(csv));
  const missing = required.filter(col => !headers.has(col));
  if (missing.length > 0) {
    throw new SchemaMismatchError(table, missing);
  }

  const rows: T[] = [];
  const rejected: RejectedRow[] = [];

  parseCSV(csv).forEach((raw, i) => {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      rows.push(toRecord(parsed.data));
    } else {
      rejected.push({
        line: i + 2, // header is line 1
        message: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
    }
  });

  if (rejected.length > 0) {
    console.warn(`[Ingest] ${table}: rejected ${rejected.length} of ${rows.length + rejected.length} rows`);
  }

  return { rows, rejected };
}

export function parseBookings(csv: string): TableLoad<BookingRecord> {
  return loadTable('booking', csv, BOOKING_REQUIRED, bookingRowSchema, row => ({
    flightNumber: row.flightnumber,
    flightDate: row.flight_date,
    origin: row.origin,
    destination: row.destination,
    passengerCount: row.passengercount,
    ticketRevenue: row.revenue_per_booking_ticket,
    ancillaryPreCheckinRevenue: row.revenue_per_booking_ancilliary_pre_check_in,
    ancillaryAtCheckinRevenue: row.revenue_per_booking_ancilliary_at_check_in,
    cancellationDate: row.cancellation_date,
    daysAfterBookingToCancel: row.days_after_booking_to_cancel,
    daysBeforeFlightToCancel: row.days_before_flight_to_cancel,
    bookingChannel: normalizeChannel(row.booking_channel),
    dayOfWeek: row.flight_dow,
  }));
}

export function parseFlights(csv: string): TableLoad<FlightRecord> {
  return loadTable('flight', csv, FLIGHT_REQUIRED, flightRowSchema, row => ({
    flightNumber: row.flightnumber,
    flightDate: row.flightdate,
    availableCapacity: row.availablecapacity,
    timeOfDay: row.timeofday,
    routeType: row.routetype,
  }));
}

function readTable(table: string, path: string): string {
  if (!existsSync(path)) {
    throw new TableMissingError(table, path);
  }
  return readFileSync(path, 'utf-8');
}

export function readBookings(path: string): TableLoad<BookingRecord> {
  return parseBookings(readTable('booking', path));
}

export function readFlights(path: string): TableLoad<FlightRecord> {
  return parseFlights(readTable('flight', path));
}
