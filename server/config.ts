import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';
import { ConfigurationMissingError } from './errors.js';

// =============================================================================
// KPI configuration
//
// One immutable record per run, handed to the KPI engine at construction.
// Values come from config/metrics.json (or KPI_CONFIG_PATH), with env vars
// taking precedence. There is no silent fallback: the cost and connection
// constants move PACS materially, so an absent value is a hard error.
//
// Documented defaults (shipped in config/metrics.json):
//   variable_cost_per_seat_leg = 25.0   (currency per seat-leg)
//   connection_value_pct       = 0.15   (share of revenue counted as connection value)
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const DEFAULT_CONFIG_PATH = join(__dirname, '..', 'config', 'metrics.json');

export const DOCUMENTED_DEFAULTS = {
  variableCostPerSeatLeg: 25.0,
  connectionValuePct: 0.15,
} as const;

export type YalfUnrankedSeats = 'exclude' | 'include';

export type KpiConfig = Readonly<{
  variableCostPerSeatLeg: number;
  connectionValuePct: number;
  /** Whether seats of legs without a yield index count in the YALF denominator */
  yalfUnrankedSeats: YalfUnrankedSeats;
}>;

export type DiagnosticsOptions = {
  lfUpperTolerance: number;
  rankingSize: number;
};

export const DEFAULT_DIAGNOSTICS_OPTIONS: DiagnosticsOptions = {
  lfUpperTolerance: 1.2,
  rankingSize: 10,
};

const kpiConfigSchema = z.object({
  variableCostPerSeatLeg: z.number().finite().nonnegative(),
  connectionValuePct: z.number().finite().min(0).max(1),
  yalfUnrankedSeats: z.enum(['exclude', 'include']).default('exclude'),
});

const configFileSchema = z.object({
  costs: z.object({ variable_cost_per_seat_leg: z.number().optional() }).optional(),
  uplifts: z.object({ connection_value_pct: z.number().optional() }).optional(),
  yalf: z.object({ unranked_seats: z.enum(['exclude', 'include']).optional() }).optional(),
});

const PUBLIC_NAMES: Record<string, string> = {
  variableCostPerSeatLeg: 'variable_cost_per_seat_leg',
  connectionValuePct: 'connection_value_pct',
  yalfUnrankedSeats: 'yalf.unranked_seats',
};

function issueNames(error: z.ZodError): string[] {
  const names = error.issues.map(issue => {
    const path = issue.path.join('.');
    return PUBLIC_NAMES[path] ?? (path || 'root');
  });
  return [...new Set(names)];
}

/** Validate a candidate record; throws ConfigurationMissingError on any gap */
export function parseKpiConfig(input: unknown, source = 'inline'): KpiConfig {
  const parsed = kpiConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationMissingError(issueNames(parsed.error), source);
  }
  return Object.freeze({ ...parsed.data });
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function readConfigFile(path: string): z.infer<typeof configFileSchema> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationMissingError([`readable JSON (${reason})`], path);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationMissingError(issueNames(parsed.error), path);
  }
  return parsed.data;
}

export function loadKpiConfig(env: NodeJS.ProcessEnv = process.env): KpiConfig {
  const explicitPath = env.KPI_CONFIG_PATH;
  const path = explicitPath || DEFAULT_CONFIG_PATH;

  let file: z.infer<typeof configFileSchema> = {};
  if (existsSync(path)) {
    file = readConfigFile(path);
  } else if (explicitPath) {
    throw new ConfigurationMissingError(['config file'], path);
  }

  const candidate = {
    variableCostPerSeatLeg:
      envNumber(env.VARIABLE_COST_PER_SEAT_LEG) ?? file.costs?.variable_cost_per_seat_leg,
    connectionValuePct:
      envNumber(env.CONNECTION_VALUE_PCT) ?? file.uplifts?.connection_value_pct,
    yalfUnrankedSeats: env.YALF_UNRANKED_SEATS || file.yalf?.unranked_seats,
  };

  return parseKpiConfig(candidate, existsSync(path) ? path : 'environment');
}

export function loadDiagnosticsOptions(env: NodeJS.ProcessEnv = process.env): DiagnosticsOptions {
  const tolerance = envNumber(env.LF_UPPER_TOLERANCE);
  const size = envNumber(env.RANKING_SIZE);
  const options = { ...DEFAULT_DIAGNOSTICS_OPTIONS };

  if (tolerance !== undefined) {
    if (Number.isFinite(tolerance) && tolerance > 0) {
      options.lfUpperTolerance = tolerance;
    } else {
      console.warn(`[Config] ignoring LF_UPPER_TOLERANCE=${env.LF_UPPER_TOLERANCE}; using ${options.lfUpperTolerance}`);
    }
  }

  if (size !== undefined) {
    if (Number.isInteger(size) && size > 0) {
      options.rankingSize = size;
    } else {
      console.warn(`[Config] ignoring RANKING_SIZE=${env.RANKING_SIZE}; using ${options.rankingSize}`);
    }
  }

  return options;
}
