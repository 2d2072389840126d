import { Request, Response, NextFunction } from 'express';
import { AppError } from './errorHandler';

/**
 * Debug-token guard for operator routes.
 * The token may arrive as the X-Debug-Token header, a `token` query parameter,
 * or an `access_token` cookie, checked in that order.
 */

export const TOKEN_HEADER = 'X-Debug-Token';
export const TOKEN_COOKIE = 'access_token';

export function getTokenFromRequest(req: Request): string {
  const header = req.header(TOKEN_HEADER)?.trim();
  if (header) return header;

  const query = typeof req.query.token === 'string' ? req.query.token.trim() : '';
  if (query) return query;

  // populated by cookie-parser
  const cookie: unknown = req.cookies?.[TOKEN_COOKIE];
  return typeof cookie === 'string' ? cookie.trim() : '';
}

/**
 * With no token configured every guarded route is closed.
 */
export function requireToken(expectedToken: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const token = getTokenFromRequest(req);
    if (!expectedToken || token !== expectedToken) {
      next(new AppError('Unauthorized', 401));
      return;
    }
    next();
  };
}
