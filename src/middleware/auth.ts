import { timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

export interface AuthOptions {
  token: string;
  // Exact paths served without a token
  publicPaths?: string[];
}

export function createAuthMiddleware(options: AuthOptions) {
  const expectedBuf = Buffer.from(options.token, 'utf-8');
  const publicPaths = new Set(options.publicPaths ?? []);

  return (req: Request, res: Response, next: NextFunction): void => {
    if (publicPaths.has(req.path)) {
      next();
      return;
    }

    const header = req.headers.authorization;
    if (!header) {
      res.status(401).json({ error: 'Authorization header is required', code: 'unauthorized' });
      return;
    }

    if (!header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Invalid authorization scheme; use Bearer', code: 'unauthorized' });
      return;
    }

    const tokenBuf = Buffer.from(header.slice(7), 'utf-8');

    // timingSafeEqual requires same-length buffers
    const valid = tokenBuf.length === expectedBuf.length && timingSafeEqual(tokenBuf, expectedBuf);
    if (!valid) {
      res.status(401).json({ error: 'Invalid token', code: 'unauthorized' });
      return;
    }

    next();
  };
}
