export * from './order.constants';
export * from './config.constants';
