import { serve } from '@hono/node-server';
import { createApp } from '../worker/app';
import { closePgDb, getDb } from '../worker/db';
import { PgTrackerStore } from '../worker/db/pgStore';

const store = new PgTrackerStore(getDb());
const app = createApp(store, { requestLog: true });

const port = parseInt(process.env.PORT || '3000', 10);

console.info(`Starting server on port ${port}...`);

const server = serve({
  fetch: app.fetch,
  port,
});

console.info(`Server is running on http://localhost:${port}`);

const shutdown = (signal: string) => {
  console.info(`Received ${signal}, closing...`);
  server.close();
  closePgDb().catch((error: unknown) => {
    console.error('Failed to close database pool:', error);
    process.exitCode = 1;
  });
};

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
