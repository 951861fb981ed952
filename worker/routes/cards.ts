import { Hono } from 'hono';
import { z } from 'zod';
import { id, jsonOk, validate } from './helpers';
import { moveCard } from '../services/milestoneService';
import type { AppEnv } from '../types';

const cardPatchBody = z.object({
  version: z.number().int().positive(),
  title: z.string().optional(),
  // null moves the card back to the pool; absent leaves it where it is.
  milestoneId: z.number().int().positive().nullable().optional(),
});

export const cardsRoute = new Hono<AppEnv>();

cardsRoute.patch('/:id', validate('param', z.object({ id })), validate('json', cardPatchBody), async (c) => {
  const { version, ...patch } = c.req.valid('json');
  const card = await moveCard(c.get('store'), c.req.valid('param').id, version, patch);
  return jsonOk(c, card);
});
