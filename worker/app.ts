import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { TrackerStore } from './db/store';
import { isTrackerError } from './services/errors';
import { jsonError, jsonTrackerError } from './routes/helpers';
import { cardsRoute } from './routes/cards';
import { projectsRoute } from './routes/projects';
import { orgsRoute, rulesRoute } from './routes/rules';
import { tasksRoute } from './routes/tasks';
import type { AppEnv } from './types';

export type { AppEnv };

export const createApp = (store: TrackerStore, options: { requestLog?: boolean } = {}) => {
  const app = new Hono<AppEnv>();

  if (options.requestLog) app.use('*', logger());

  // Must be registered before the routes.
  app.use('*', async (c, next) => {
    c.set('store', store);
    await next();
  });

  app.get('/health', (c) => c.json({ status: 'ok' }));
  app.route('/api/tasks', tasksRoute);
  app.route('/api/cards', cardsRoute);
  app.route('/api/projects', projectsRoute);
  app.route('/api/rules', rulesRoute);
  app.route('/api/orgs', orgsRoute);

  app.onError((err, c) => {
    if (isTrackerError(err)) return jsonTrackerError(c, err);
    console.error('Server error:', err);
    return jsonError(c, 'INTERNAL_ERROR', 'Internal server error.', 500);
  });

  return app;
};
