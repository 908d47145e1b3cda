export { OrderStore, systemClock } from './order.store';
export type { Clock } from './order.store';
export { ConfigStore, esignKey } from './config.store';
export { seedOrders } from './seed';
