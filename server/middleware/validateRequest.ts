import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { withSource } from '../logger';
import { ERROR_CODES, isScheduleError } from '../types/errors';
import { normalizeWeek } from '../utils/season/weeks';

const log = withSource('validateRequest');

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .optional()
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const ScheduleParamsSchema = z.object({
  year: z.string().trim().regex(/^\d{4}$/, 'year must be a four-digit season year'),
  week: z.string().trim().min(1),
});

const ScheduleQuerySchema = z.object({
  format: z
    .string()
    .optional()
    .transform((s) => (s ? s.toLowerCase() : 'text'))
    .pipe(z.enum(['text', 'html', 'json'])),
  links: booleanFlag,
  quality: booleanFlag,
  records: booleanFlag,
});

function sendValidationError(res: Response, reqPath: string, issues: Array<{ path: (string | number)[]; message: string }>) {
  const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;
  log.warn({ path: reqPath, issues, requestId }, 'request validation failed');
  return res.status(400).json({
    error: {
      code: ERROR_CODES.VALIDATION_ERROR,
      message: 'Invalid request',
      timestamp: new Date().toISOString(),
      requestId,
      details: { issues },
    },
  });
}

/**
 * Validates /api/schedule/:year/:week and normalizes the week designator
 * ("17", "wild card", "Super Bowl") to a canonical week.
 */
export function validateScheduleRequest(req: Request, res: Response, next: NextFunction) {
  const params = ScheduleParamsSchema.safeParse(req.params);
  if (!params.success) {
    return sendValidationError(res, req.path, params.error.issues);
  }
  const query = ScheduleQuerySchema.safeParse(req.query);
  if (!query.success) {
    return sendValidationError(res, req.path, query.error.issues);
  }

  try {
    const { year, week } = normalizeWeek(params.data.year, params.data.week);
    req.validated = {
      ...(req.validated ?? {}),
      schedule: { year, week, ...query.data },
    };
  } catch (err) {
    if (isScheduleError(err)) {
      return sendValidationError(res, req.path, [{ path: ['week'], message: err.message }]);
    }
    return next(err);
  }
  return next();
}
