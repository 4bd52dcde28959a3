import { Request, Response, NextFunction, RequestHandler } from 'express';
import { IdentityProvider } from '../../services/auth/identity.service';
import { AuthenticationError, AppError } from '../../utils/errors';

const BEARER_PREFIX = /^Bearer\s+(.+)$/i;

/**
 * Reads the bearer token of the request, or null when the header is absent or malformed.
 */
export function extractBearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) {
    return null;
  }
  const match = BEARER_PREFIX.exec(header);
  return match ? match[1].trim() : null;
}

/**
 * The authenticated user id set by `authenticate`.
 *
 * @throws {AuthenticationError} If the route is not behind `authenticate`
 */
export function currentUserId(res: Response): string {
  const userId: unknown = res.locals.userId;
  if (typeof userId !== 'string' || userId.length === 0) {
    throw new AuthenticationError('Authentication required');
  }
  return userId;
}

/**
 * Express middleware resolving `Authorization: Bearer <token>` through the identity provider.
 * On success the user id is stored on `res.locals.userId`; otherwise 401 with a Bearer challenge.
 *
 * @example
 * router.use(authenticate(identityProvider));
 */
export const authenticate = (identity: IdentityProvider): RequestHandler =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const token = extractBearerToken(req);
    if (!token) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      res.status(401).json({ message: 'Not authenticated', code: 'AUTHENTICATION_ERROR' });
      return;
    }

    try {
      res.locals.userId = await identity.getUserId(token);
      next();
    } catch (err) {
      if (!(err instanceof AppError)) {
        console.error('Authentication error:', err);
      }
      const message = err instanceof AuthenticationError ? err.message : 'Invalid authentication credentials';
      res.setHeader('WWW-Authenticate', 'Bearer');
      res.status(401).json({ message, code: 'AUTHENTICATION_ERROR' });
    }
  };
