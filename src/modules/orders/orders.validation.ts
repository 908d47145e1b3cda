import { z } from 'zod';
import { ORDER_STATUSES, PAGINATION } from '../../constants';

// Validation schemas for the orders module

export const orderIdSchema = z.coerce
  .number({ invalid_type_error: 'Order id must be a number' })
  .int('Order id must be an integer')
  .positive('Order id must be positive');

export const createOrderSchema = z.object({
  name: z.string({ required_error: 'name is required' }).min(1, 'name must not be empty').max(100),
  udid: z.string({ required_error: 'udid is required' }).min(1, 'udid must not be empty').max(50),
});

export const updateOrderSchema = createOrderSchema.extend({
  status: z
    .string({ required_error: 'status is required' })
    .transform(status => status.toLowerCase())
    .pipe(z.enum(ORDER_STATUSES)),
  // An empty link clears it
  download_link: z
    .string()
    .optional()
    .transform(link => (link ? link : null)),
});

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

// A repeated query key (?status=a&status=b) arrives as an array; the last one wins
const lastValue = (value: unknown): unknown => (Array.isArray(value) ? value[value.length - 1] : value);

export const listOrdersQuerySchema = z.object({
  page: z
    .preprocess(
      lastValue,
      z.coerce
        .number({ invalid_type_error: 'page must be a number' })
        .int()
        .default(PAGINATION.DEFAULT_PAGE)
    )
    .transform(page => Math.max(page, 1)),
  page_size: z
    .preprocess(
      lastValue,
      z.coerce
        .number({ invalid_type_error: 'page_size must be a number' })
        .int()
        .default(PAGINATION.DEFAULT_PAGE_SIZE)
    )
    .transform(size => clamp(size, 1, PAGINATION.MAX_PAGE_SIZE)),
  status: z.preprocess(lastValue, z.string().optional()),
  q: z.preprocess(lastValue, z.string().optional()),
});
