import { timingSafeEqual } from 'crypto';
import { NextFunction, Request, RequestHandler, Response } from 'express';

export const API_KEY_HEADER = 'X-Api-Key';

function matches(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Rejects requests whose X-Api-Key header differs from the configured key.
 */
export function apiKeyMiddleware(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const provided = req.header(API_KEY_HEADER);

    if (provided === undefined || !matches(provided, apiKey)) {
      res.status(401).send('UNAUTHORIZED');
      return;
    }

    next();
  };
}
