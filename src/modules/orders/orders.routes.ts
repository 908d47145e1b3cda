import express from 'express';
import { AppContext } from '../../connections/context';
import { authenticate } from '../../middlewares/auth.middleware';
import { createOrdersController } from './orders.controller';
import { createImageUpload } from './orders.upload';

export const createOrdersRouter = (context: AppContext) => {
  const router = express.Router();
  const ordersController = createOrdersController(context);
  const imageUpload = createImageUpload();
  const requireAdmin = authenticate(context.auth);

  // Public
  router.post('/', imageUpload, ordersController.createOrder);
  router.get('/', ordersController.getOrders);

  // Admin only
  router.get('/:id', requireAdmin, ordersController.getOrderById);
  router.put('/:id', requireAdmin, imageUpload, ordersController.updateOrder);
  router.delete('/:id', requireAdmin, ordersController.deleteOrder);

  return router;
};
