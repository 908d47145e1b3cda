import { v4 as uuidv4 } from 'uuid';
import { ORDER_STATUS, OrderStatus } from '../../constants';
import { logger } from '../../utils/logging';
import { Clock, OrderStore, systemClock } from './order.store';

const SECONDS_PER_HOUR = 3600;

const seedStatus = (i: number): OrderStatus => {
  if (i % 3 === 0) return ORDER_STATUS.APPROVED;
  if (i % 5 === 0) return ORDER_STATUS.REJECTED;
  return ORDER_STATUS.PENDING;
};

/**
 * Fill the store with dummy orders 1..count, each one hour older than the last.
 */
export const seedOrders = (
  store: OrderStore,
  count: number,
  imageUrl: string,
  clock: Clock = systemClock
): void => {
  const now = clock();

  for (let i = 1; i <= count; i++) {
    store.insert({
      id: i,
      name: `Dummy Item ${i} $${100 + i}`,
      udid: `dummy-${i}-${uuidv4().replace(/-/g, '').substring(0, 12)}`,
      image_url: imageUrl,
      status: seedStatus(i),
      download_link: i % 3 === 0 ? `http://example.com/download/${i}` : null,
      created_at: now - i * SECONDS_PER_HOUR,
    });
  }

  logger.info('Seeded dummy orders', { count });
};
