import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Security headers. The API serves JSON only, so the CSP is locked down completely.
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  frameguard: { action: 'deny' },
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
});

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}

/**
 * Admin authentication. When an admin key is configured, requires a matching X-API-Key header.
 */
export function adminAuth(adminKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!adminKey) {
      next();
      return;
    }

    const providedKey = req.header('X-API-Key');

    if (!providedKey) {
      res.status(401).json({ error: 'API key required. Provide X-API-Key header.' });
      return;
    }

    if (!safeEqual(providedKey, adminKey)) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}

// In production the dashboard is served from the same origin
export function corsMiddleware(frontendUrl: string | undefined, production: boolean): RequestHandler {
  return cors({
    origin: frontendUrl || (production ? true : 'http://localhost:5173'),
    credentials: true
  });
}

export const ingestRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 5,
  message: { error: 'Too many requests, please try again later.' },
  standardHeaders: true,
  legacyHeaders: false
});

/**
 * Wrap an async route so rejections reach the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function errorHandler(
  err: Error & { status?: number },
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error('Error:', err);

  res.status(err.status || 500).json({
    error: 'Internal server error',
    message: process.env.NODE_ENV === 'development' ? err.message : undefined
  });
}

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(`${req.method} ${req.path} - ${res.statusCode} - ${duration}ms`);
  });

  next();
}
