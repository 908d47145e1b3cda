import { Request, Response, NextFunction } from 'express';
import { AppContext } from '../../connections/context';
import { OrderListResponse } from '../../connections/store/models/order.model';
import { AuthRequest } from '../../types/request.types';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { toOrderView } from '../../utils/price';
import { ResponseHandler } from '../../utils/response';
import {
  createOrderSchema,
  listOrdersQuerySchema,
  orderIdSchema,
  updateOrderSchema,
} from './orders.validation';
import { originalFileName } from './orders.upload';

export const createOrdersController = ({ orders, images }: Pick<AppContext, 'orders' | 'images'>) => ({
  // Public: submit an order with its image
  createOrder: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validated = createOrderSchema.parse(req.body ?? {});
      const file = req.file;
      if (!file) {
        throw new ValidationError('image file is required');
      }

      const order = await orders.create(validated, orderId =>
        images.save(file.buffer, originalFileName(file), orderId)
      );

      logger.info('[Orders] Order created', { orderId: order.id, udid: order.udid, ip: req.ip });
      return ResponseHandler.created(res, toOrderView(order));
    } catch (error) {
      next(error);
    }
  },

  // Public: filter, search, sort newest first and paginate
  getOrders: (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listOrdersQuerySchema.parse(req.query);
      const { items, total } = orders.list(query);

      const response: OrderListResponse = {
        items: items.map(toOrderView),
        total,
        page: query.page,
        page_size: query.page_size,
      };
      return ResponseHandler.success(res, response);
    } catch (error) {
      next(error);
    }
  },

  getOrderById: (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const id = orderIdSchema.parse(req.params.id);
      return ResponseHandler.success(res, toOrderView(orders.get(id)));
    } catch (error) {
      next(error);
    }
  },

  updateOrder: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const id = orderIdSchema.parse(req.params.id);
      const validated = updateOrderSchema.parse(req.body ?? {});

      // 404 before anything is written to disk
      orders.get(id);

      const file = req.file;
      const imageUrl = file && file.originalname
        ? await images.save(file.buffer, originalFileName(file), id)
        : undefined;

      const order = orders.update(id, { ...validated, image_url: imageUrl });

      logger.info('[Orders] Order updated', {
        orderId: id,
        status: order.status,
        imageReplaced: imageUrl !== undefined,
        admin: req.admin,
      });
      return ResponseHandler.success(res, toOrderView(order));
    } catch (error) {
      next(error);
    }
  },

  deleteOrder: (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const id = orderIdSchema.parse(req.params.id);
      orders.delete(id);

      logger.info('[Orders] Order deleted', { orderId: id, admin: req.admin });
      return ResponseHandler.noContent(res);
    } catch (error) {
      next(error);
    }
  },
});
