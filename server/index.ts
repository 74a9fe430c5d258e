import express from 'express';
import dotenv from 'dotenv';
import { registerRoutes } from './routes.js';
import { OutputStore, DEFAULT_DB_PATH } from './store.js';

dotenv.config({ path: '.env.local' });
dotenv.config();

const app = express();
const PORT = process.env.API_PORT || 3001;
const store = new OutputStore(process.env.OUTPUT_DB_PATH || DEFAULT_DB_PATH);

app.use(express.json());
registerRoutes(app, store);

// =============================================================================
// Start server
// =============================================================================
app.listen(PORT, () => {
  console.log(`Route KPI API running on http://localhost:${PORT}`);
  console.log(`   Outputs: ${store.list().length} stored (run \`npm run pipeline\` to refresh)`);
  console.log('   Endpoints:');
  console.log('     GET /api/health');
  console.log('     GET /api/outputs');
  console.log('     GET /api/outputs/:name');
  console.log('     GET /api/kpis');
});
