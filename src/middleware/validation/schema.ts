import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

/**
 * Middleware factory to validate UUID path parameters
 */
export function validateUuidParam(paramName: string = 'id') {
  const uuidSchema = z.string().uuid();

  return (req: Request, res: Response, next: NextFunction) => {
    const result = uuidSchema.safeParse(req.params[paramName]);

    if (!result.success) {
      return res.status(400).json({
        error: `Invalid ${paramName}.`,
        details: result.error.flatten()
      });
    }

    next();
  };
}

export type Parsed<T> = { ok: true; data: T } | { ok: false };

/**
 * Parses `input` with `schema`; on failure the 400 response is already sent.
 */
export function parseOrReject<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  res: Response,
  label: string = 'request body'
): Parsed<z.infer<T>> {
  const result = schema.safeParse(input);
  if (!result.success) {
    res.status(400).json({ error: `Invalid ${label}.`, details: result.error.flatten() });
    return { ok: false };
  }
  return { ok: true, data: result.data };
}
