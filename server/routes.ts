/**
 * Read-only API over the stored pipeline outputs. Nothing here computes a
 * metric; it only hands back what the last batch run saved.
 */
import type { Express, Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { SCALAR_KPI_NAMES } from './pipeline.js';
import type { OutputStore } from './store.js';

export function registerRoutes(app: Express, store: OutputStore): void {
  // ---------------------------------------------------------------------------
  // CORS
  // ---------------------------------------------------------------------------
  const isDev = process.env.NODE_ENV !== 'production';
  const corsOptions: cors.CorsOptions = isDev
    ? { origin: ['http://localhost:3000', 'http://localhost:5173'], credentials: true }
    : { origin: false }; // same-origin only in production

  app.use(cors(corsOptions));

  // ---------------------------------------------------------------------------
  // Rate limiting
  // ---------------------------------------------------------------------------
  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 120,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });

  app.use('/api/', apiLimiter);

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // ---------------------------------------------------------------------------
  // Output catalogue
  // GET /api/outputs
  // ---------------------------------------------------------------------------
  app.get('/api/outputs', (_req: Request, res: Response) => {
    try {
      const outputs = store.list();
      res.json({ outputs, count: outputs.length });
    } catch (err) {
      console.error('Output list error:', err);
      res.status(500).json({ error: 'Failed to list outputs', outputs: [] });
    }
  });

  // ---------------------------------------------------------------------------
  // Single output by stable name
  // GET /api/outputs/fwlf_by_segment
  // ---------------------------------------------------------------------------
  app.get('/api/outputs/:name', (req: Request, res: Response) => {
    try {
      const name = String(req.params.name).toLowerCase();
      if (!store.has(name)) {
        return res.status(404).json({ error: `Unknown output: ${name}` });
      }
      return res.json({ name, value: store.get(name) });
    } catch (err) {
      console.error('Output read error:', err);
      return res.status(500).json({ error: 'Failed to read output' });
    }
  });

  // ---------------------------------------------------------------------------
  // Scalar KPI summary (for dashboard)
  // GET /api/kpis
  // ---------------------------------------------------------------------------
  app.get('/api/kpis', (_req: Request, res: Response) => {
    try {
      const kpis: Record<string, unknown> = {};
      for (const name of SCALAR_KPI_NAMES) {
        kpis[name] = store.has(name) ? store.get(name) : null;
      }
      res.json({ kpis, timestamp: new Date().toISOString() });
    } catch (err) {
      console.error('KPI summary error:', err);
      res.status(500).json({ error: 'Failed to build KPI summary' });
    }
  });
}
