import path from 'path';
import { fileURLToPath } from 'url';
import { loadDiagnosticsOptions, loadKpiConfig } from './config.js';
import { readBookings, readFlights } from './ingest.js';
import { hasViolations, runPipeline, type PipelineSummary } from './pipeline.js';
import { OutputStore, DEFAULT_DB_PATH } from './store.js';

// =============================================================================
// Batch run
//
// Load config once → read raw tables → run pipeline → replace stored outputs.
// With `strict`, any leg boundary violation turns into a failing exit code;
// without it violations are only reported.
// =============================================================================

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.resolve(__dirname, '..');

export type BatchOptions = {
  strict?: boolean;
};

export type BatchResult = {
  summary: PipelineSummary;
  rejectedBookings: number;
  rejectedFlights: number;
  exitCode: number;
};

export function runBatch(env: NodeJS.ProcessEnv = process.env, options: BatchOptions = {}): BatchResult {
  const config = loadKpiConfig(env);
  const diagnostics = loadDiagnosticsOptions(env);

  const bookingsPath = env.BOOKINGS_CSV || path.join(ROOT, 'data', 'sample', 'booking.csv');
  const flightsPath = env.FLIGHTS_CSV || path.join(ROOT, 'data', 'sample', 'flight.csv');

  const bookings = readBookings(bookingsPath);
  const flights = readFlights(flightsPath);
  console.log(`[Batch] loaded ${bookings.rows.length} bookings, ${flights.rows.length} flights`);

  const { outputs, summary } = runPipeline(
    { bookings: bookings.rows, flights: flights.rows },
    config,
    { diagnostics },
  );

  const store = new OutputStore(env.OUTPUT_DB_PATH || DEFAULT_DB_PATH);
  try {
    store.save(outputs);
  } finally {
    store.close();
  }

  const violations = hasViolations(summary);
  if (violations) {
    console.warn('[Batch] data quality violations found', summary.legChecks);
  }

  return {
    summary,
    rejectedBookings: bookings.rejected.length,
    rejectedFlights: flights.rejected.length,
    exitCode: options.strict && violations ? 1 : 0,
  };
}
