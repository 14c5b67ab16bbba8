// src/middleware/internalSecret.ts
import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Rejects requests whose `header` does not carry `configuredSecret`.
 * Without a configured secret nothing is blocked.
 */
export function verifySharedSecret(
  configuredSecret: string | null | undefined,
  header = 'x-internal-secret'
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!configuredSecret) {
      return next();
    }

    const headerSecret = req.header(header);

    if (!headerSecret || headerSecret !== configuredSecret) {
      return res.status(401).json({ error: 'Unauthorized' });
    }

    return next();
  };
}

export const WEBHOOK_SECRET_HEADER = 'x-telegram-bot-api-secret-token';
