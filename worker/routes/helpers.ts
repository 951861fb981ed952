import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ValidationTargets } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { ZodSchema } from 'zod';
import type { TrackerError, TrackerErrorCode } from '../services/errors';
import type { AppEnv } from '../types';

export const jsonOk = <T>(c: Context, data: T, status: ContentfulStatusCode = 200) =>
  c.json({ success: true, data }, status);

export const jsonError = (c: Context, code: string, message: string, status: ContentfulStatusCode) =>
  c.json({ success: false, error: { code, message } }, status);

const STATUS_BY_CODE: Record<TrackerErrorCode, ContentfulStatusCode> = {
  NOT_FOUND: 404,
  NOT_AUTHORIZED: 403,
  INVALID_TRANSITION: 409,
  ALREADY_CLAIMED: 409,
  VERSION_CONFLICT: 409,
  ALREADY_ACTIVE: 409,
  VALIDATION_ERROR: 400,
  STORAGE_ERROR: 500,
};

export const jsonTrackerError = (c: Context, error: TrackerError) =>
  jsonError(c, error.code, error.message, STATUS_BY_CODE[error.code]);

const INVALID_CODES = {
  json: 'INVALID_BODY',
  param: 'INVALID_PARAMS',
  query: 'INVALID_QUERY',
} as const;

type CheckedTarget = keyof typeof INVALID_CODES & keyof ValidationTargets;

/** zValidator answering with the error envelope instead of the raw zod issues. */
export const validate = <Target extends CheckedTarget, T extends ZodSchema>(target: Target, schema: T) =>
  zValidator(target, schema, (result, c) => {
    if (!result.success) {
      return jsonError(c, INVALID_CODES[target], `Invalid request ${target}.`, 400);
    }
  });

export const id = z.coerce.number().int().positive();

/** Optional epoch-ms bounds shared by the metrics endpoints. */
export const windowQuery = z.object({
  from: z.coerce.number().int().nonnegative().optional(),
  to: z.coerce.number().int().nonnegative().optional(),
});

/** The authentication layer in front of this service forwards the user as X-User-Id. */
export const requireActor = createMiddleware<AppEnv>(async (c, next) => {
  const parsed = id.safeParse(c.req.header('X-User-Id'));
  if (!parsed.success) {
    return jsonError(c, 'UNAUTHENTICATED', 'Missing or invalid X-User-Id header.', 401);
  }
  c.set('actorId', parsed.data);
  await next();
});
