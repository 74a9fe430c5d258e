import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import express from 'express';
import request from 'supertest';
import { registerRoutes } from '../server/routes.js';
import { runPipeline } from '../server/pipeline.js';
import { OutputStore } from '../server/store.js';
import { makeBooking, makeFlight, testConfig } from './helpers.js';

function buildApp(store: OutputStore): express.Express {
  const app = express();
  app.use(express.json());
  registerRoutes(app, store);
  return app;
}

describe('API routes', () => {
  const store = new OutputStore(':memory:');
  const app = buildApp(store);

  beforeAll(() => {
    const { outputs } = runPipeline(
      {
        bookings: [
          makeBooking({ passengerCount: 90, ticketRevenue: 9000 }),
          makeBooking({ flightNumber: 'LH101', origin: 'FCO', destination: 'FRA', passengerCount: 30 }),
        ],
        flights: [
          makeFlight({ availableCapacity: 100 }),
          makeFlight({ flightNumber: 'LH101', availableCapacity: 100 }),
        ],
      },
      testConfig,
    );
    store.save(outputs);
  });

  afterAll(() => {
    store.close();
  });

  it('GET /api/health reports ok', async () => {
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('GET /api/outputs lists every stored output', async () => {
    const res = await request(app).get('/api/outputs');
    expect(res.status).toBe(200);
    expect(res.body.count).toBe(store.list().length);
    expect(res.body.outputs.map((o: { name: string }) => o.name)).toContain('fwlf_by_segment');
  });

  it('GET /api/outputs/:name returns the stored value, case-insensitively', async () => {
    const res = await request(app).get('/api/outputs/FWLF_OVERALL');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ name: 'fwlf_overall', value: 0.6 });
  });

  it('GET /api/outputs/:name 404s for an unknown name', async () => {
    const res = await request(app).get('/api/outputs/profit_forecast');
    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Unknown output: profit_forecast');
  });

  it('GET /api/kpis returns the scalar KPIs with OTRI unavailable', async () => {
    const res = await request(app).get('/api/kpis');
    expect(res.status).toBe(200);
    expect(res.body.kpis.fwlf_overall).toBe(0.6);
    expect(res.body.kpis.srm_proxy).toBe(60);
    expect(res.body.kpis.otri.available).toBe(false);
    expect(res.body.kpis.otri.value).toBeNull();
  });

  it('GET /api/kpis gives nulls before any run', async () => {
    const empty = new OutputStore(':memory:');
    try {
      const res = await request(buildApp(empty)).get('/api/kpis');
      expect(res.body.kpis).toEqual({
        fwlf_overall: null,
        yalf_overall: null,
        aras_overall: null,
        srm_proxy: null,
        calf_overall: null,
        otri: null,
      });
    } finally {
      empty.close();
    }
  });
});
