import { PRICE_NOT_AVAILABLE } from '../constants';
import { Order, OrderView } from '../connections/store/models/order.model';

const PRICE_PATTERN = /\$(\d+)/;

/**
 * Extract the price token from an order name: "Case $999" -> "999".
 * Returns "N/A" when the name carries no "$<digits>".
 */
export const extractPrice = (name: string): string => {
  const match = PRICE_PATTERN.exec(name);
  return match ? match[1] : PRICE_NOT_AVAILABLE;
};

export const toOrderView = (order: Order): OrderView => ({
  ...order,
  price: extractPrice(order.name),
});
