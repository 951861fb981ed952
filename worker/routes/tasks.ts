import { Hono } from 'hono';
import { z } from 'zod';
import { id, jsonOk, requireActor, validate } from './helpers';
import { claimTask, completeTask, editTask, releaseTask } from '../services/taskLifecycle';
import type { AppEnv } from '../types';

const taskParams = z.object({ id });

const versionBody = z.object({
  version: z.number().int().positive(),
});

const taskEditBody = versionBody.extend({
  title: z.string().optional(),
  description: z.string().nullable().optional(),
  priority: z.number().int().optional(),
  typeId: z.number().int().positive().optional(),
});

export const tasksRoute = new Hono<AppEnv>();

tasksRoute.use('*', requireActor);

tasksRoute.post('/:id/claim', validate('param', taskParams), validate('json', versionBody), async (c) => {
  const result = await claimTask(c.get('store'), c.req.valid('param').id, c.get('actorId'), c.req.valid('json').version);
  return jsonOk(c, result);
});

tasksRoute.post('/:id/release', validate('param', taskParams), validate('json', versionBody), async (c) => {
  const result = await releaseTask(c.get('store'), c.req.valid('param').id, c.get('actorId'), c.req.valid('json').version);
  return jsonOk(c, result);
});

tasksRoute.post('/:id/complete', validate('param', taskParams), validate('json', versionBody), async (c) => {
  const result = await completeTask(c.get('store'), c.req.valid('param').id, c.get('actorId'), c.req.valid('json').version);
  return jsonOk(c, result);
});

tasksRoute.patch('/:id', validate('param', taskParams), validate('json', taskEditBody), async (c) => {
  const { version, ...edit } = c.req.valid('json');
  const task = await editTask(c.get('store'), c.req.valid('param').id, c.get('actorId'), version, edit);
  return jsonOk(c, task);
});
