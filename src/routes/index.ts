import express from 'express';
import { AppContext } from '../connections/context';
import { createAuthRouter } from '../modules/auth/auth.routes';
import { createConfigRouter } from '../modules/config/config.routes';
import { createImagesRouter } from '../modules/images/images.routes';
import { createOrdersRouter } from '../modules/orders/orders.routes';

export const createRoutes = (context: AppContext) => {
  const router = express.Router();

  // Health check
  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', orders: context.orders.size });
  });

  router.use('/login', createAuthRouter(context.auth));
  router.use('/images', createImagesRouter(context.images));
  router.use('/orders', createOrdersRouter(context));
  router.use('/config', createConfigRouter(context));

  return router;
};
