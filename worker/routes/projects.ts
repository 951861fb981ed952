import { Hono } from 'hono';
import { z } from 'zod';
import { id, jsonOk, validate } from './helpers';
import { activateMilestone } from '../services/milestoneService';
import { releaseAllForUser } from '../services/taskLifecycle';
import type { AppEnv } from '../types';

export const projectsRoute = new Hono<AppEnv>();

projectsRoute.post(
  '/:projectId/milestones/:id/activate',
  validate('param', z.object({ projectId: id, id })),
  async (c) => {
    const { projectId, id: milestoneId } = c.req.valid('param');
    const snapshot = await activateMilestone(c.get('store'), milestoneId, projectId);
    return jsonOk(c, snapshot);
  }
);

projectsRoute.post(
  '/:projectId/members/:userId/release-all',
  validate('param', z.object({ projectId: id, userId: id })),
  async (c) => {
    const { projectId, userId } = c.req.valid('param');
    const result = await releaseAllForUser(c.get('store'), projectId, userId);
    return jsonOk(c, result);
  }
);
