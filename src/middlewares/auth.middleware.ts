import { Response, NextFunction } from 'express';
import { AuthService } from '../modules/auth/auth.service';
import { AuthRequest } from '../types/request.types';
import { UnauthorizedError } from '../utils/errors';

const BEARER_SCHEME = 'bearer';

const readBearerToken = (header: string | undefined): string | undefined => {
  if (!header) {
    return undefined;
  }
  // Everything after the first space is the token, verbatim
  const separator = header.indexOf(' ');
  if (separator === -1 || header.slice(0, separator).toLowerCase() !== BEARER_SCHEME) {
    return undefined;
  }
  const token = header.slice(separator + 1);
  return token || undefined;
};

/**
 * Requires the administrator's bearer token; sets req.admin on success.
 */
export const authenticate = (auth: AuthService) => {
  return (req: AuthRequest, _res: Response, next: NextFunction) => {
    const token = readBearerToken(req.headers.authorization);

    if (!token) {
      return next(new UnauthorizedError('Not authenticated'));
    }

    try {
      req.admin = auth.authorize(token);
      next();
    } catch (error) {
      next(error);
    }
  };
};
