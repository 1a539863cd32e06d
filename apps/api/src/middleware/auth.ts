import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest();
}

/** Whether `token` matches `password`, compared in constant time. */
export function passwordMatches(token: string, password: string): boolean {
  return timingSafeEqual(digest(token), digest(password));
}

/**
 * Guard for routes that start or stop scans. Expects `Authorization: Bearer
 * <adminPassword>`. With no password configured every guarded route answers 503.
 */
export function createAdminGuard(adminPassword: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!adminPassword) {
      res.status(503).json({ error: 'Scan control is disabled: ADMIN_PASSWORD is not configured' });
      return;
    }

    const match = /^Bearer (\S+)$/.exec(req.headers.authorization ?? '');
    if (!match?.[1]) {
      res.status(401).json({ error: 'Expected Authorization: Bearer <admin password>' });
      return;
    }

    if (!passwordMatches(match[1], adminPassword)) {
      res.status(403).json({ error: 'Invalid admin password' });
      return;
    }

    next();
  };
}
