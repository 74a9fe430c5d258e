import dotenv from 'dotenv';
import { runBatch } from './batch.js';
import { PipelineError } from './errors.js';

dotenv.config({ path: '.env.local' });
dotenv.config();

// Usage: tsx server/run.ts [--strict]
try {
  const result = runBatch(process.env, { strict: process.argv.includes('--strict') });
  console.log(`[Batch] done in ${result.summary.durationMs}ms: ${result.summary.legs} legs, ${result.summary.segments} segments`);
  process.exitCode = result.exitCode;
} catch (err) {
  if (err instanceof PipelineError) {
    console.error(`[Batch] ${err.code}: ${err.message}`);
  } else {
    console.error('[Batch] run failed:', err);
  }
  process.exitCode = 1;
}
