import express from 'express';
import { AppContext } from '../../connections/context';
import { authenticate } from '../../middlewares/auth.middleware';
import { createConfigController } from './config.controller';

export const createConfigRouter = (context: AppContext) => {
  const router = express.Router();
  const configController = createConfigController(context.config);

  // Only the admin reads or writes configuration
  router.use(authenticate(context.auth));

  router.get('/', configController.getConfig);
  router.put('/public', configController.updatePublicImageUrl);
  router.put('/esign/:index', configController.updateEsignImageUrl);

  return router;
};
