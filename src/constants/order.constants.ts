/**
 * Order Status Constants
 */
export const ORDER_STATUS = {
  PENDING: 'pending',
  APPROVED: 'approved',
  REJECTED: 'rejected',
} as const;

export type OrderStatus = typeof ORDER_STATUS[keyof typeof ORDER_STATUS];

export const ORDER_STATUSES = [
  ORDER_STATUS.PENDING,
  ORDER_STATUS.APPROVED,
  ORDER_STATUS.REJECTED,
] as const;

export const isOrderStatus = (value: string): value is OrderStatus =>
  ORDER_STATUSES.some(status => status === value);

/**
 * Listing defaults
 */
export const PAGINATION = {
  DEFAULT_PAGE: 1,
  DEFAULT_PAGE_SIZE: 12,
  MAX_PAGE_SIZE: 100,
} as const;

export const PRICE_NOT_AVAILABLE = 'N/A';
