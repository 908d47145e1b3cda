import { Request, Response, NextFunction } from 'express';
import { AuthService } from './auth.service';
import { loginSchema } from './auth.validation';
import { ResponseHandler } from '../../utils/response';
import { logger } from '../../utils/logging';

export const createAuthController = (auth: AuthService) => ({
  login: (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password } = loginSchema.parse(req.body ?? {});
      const token = auth.login(username, password);

      logger.info('[Auth] Admin logged in', { username, ip: req.ip });
      return ResponseHandler.success(res, token);
    } catch (error) {
      next(error);
    }
  },
});
