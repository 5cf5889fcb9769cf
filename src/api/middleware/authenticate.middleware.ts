import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { Errors } from '../../utils/errors.js';

/**
 * Bearer JWT issued by the auth service (HS256, shared secret). The user id is
 * taken from the `user_id` claim, falling back to `sub`.
 */
export function createAuthenticate(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      next(Errors.unauthorized('Missing or invalid Authorization header'));
      return;
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(header.slice(7).trim(), secret, { algorithms: ['HS256'] });
    } catch {
      next(Errors.unauthorized('Invalid or expired token'));
      return;
    }

    const userId =
      typeof payload === 'string' ? undefined : (payload.user_id ?? payload.sub);
    if (typeof userId !== 'string' || userId === '') {
      next(Errors.unauthorized('Token does not identify a user'));
      return;
    }

    req.userId = userId;
    next();
  };
}
