import { Hono } from 'hono';
import { z } from 'zod';
import { id, jsonOk, validate, windowQuery } from './helpers';
import { getRuleMetrics, getWorkflowMetrics, listRuleExecutions, resolveWindow } from '../services/executionRecorder';
import type { AppEnv } from '../types';

const executionsQuery = windowQuery.extend({
  page: z.coerce.number().int().optional(),
  pageSize: z.coerce.number().int().optional(),
});

export const rulesRoute = new Hono<AppEnv>();

rulesRoute.get('/:id/metrics', validate('param', z.object({ id })), validate('query', windowQuery), async (c) => {
  const { from, to } = c.req.valid('query');
  const metrics = await getRuleMetrics(c.get('store'), c.req.valid('param').id, resolveWindow(from, to));
  return jsonOk(c, metrics);
});

rulesRoute.get('/:id/executions', validate('param', z.object({ id })), validate('query', executionsQuery), async (c) => {
  const { from, to, page, pageSize } = c.req.valid('query');
  const result = await listRuleExecutions(c.get('store'), c.req.valid('param').id, resolveWindow(from, to), {
    page,
    pageSize,
  });
  return jsonOk(c, result);
});

export const orgsRoute = new Hono<AppEnv>();

orgsRoute.get('/:orgId/rule-metrics', validate('param', z.object({ orgId: id })), validate('query', windowQuery), async (c) => {
  const { from, to } = c.req.valid('query');
  const workflows = await getWorkflowMetrics(c.get('store'), c.req.valid('param').orgId, resolveWindow(from, to));
  return jsonOk(c, workflows);
});
