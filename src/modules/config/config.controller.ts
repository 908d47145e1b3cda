import { Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ConfigStore, esignKey } from '../../connections/store';
import { AuthRequest } from '../../types/request.types';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { ResponseHandler } from '../../utils/response';
import { esignImageSchema, esignIndexSchema, publicImageSchema } from './config.validation';

// A missing body field is reported by its own message, e.g. "Missing url field"
const parseBody = <T>(parse: () => T): T => {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError(error.issues[0]?.message ?? 'Invalid request data', error.issues);
    }
    throw error;
  }
};

export const createConfigController = (config: ConfigStore) => ({
  getConfig: (_req: AuthRequest, res: Response) => {
    return ResponseHandler.success(res, config.getAll());
  },

  updatePublicImageUrl: (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { public_image_url } = parseBody(() => publicImageSchema.parse(req.body ?? {}));
      config.setPublicImageUrl(public_image_url);

      logger.info('[Config] Public image URL updated', { admin: req.admin });
      return ResponseHandler.success(res, {
        message: 'Public image URL updated',
        public_image_url,
      });
    } catch (error) {
      next(error);
    }
  },

  updateEsignImageUrl: (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const index = parseBody(() => esignIndexSchema.parse(req.params.index));
      esignKey(index);
      const { url } = parseBody(() => esignImageSchema.parse(req.body ?? {}));
      const key = config.setEsignUrl(index, url);

      logger.info('[Config] Esign image URL updated', { index, admin: req.admin });
      return ResponseHandler.success(res, {
        message: `Esign image ${index} updated`,
        [key]: url,
      });
    } catch (error) {
      next(error);
    }
  },
});
