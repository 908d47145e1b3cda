// Order Model - held in memory by OrderStore

import { OrderStatus } from '../../../constants';

export interface Order {
  id: number;
  name: string; // max 100 chars, may embed "$<digits>"
  udid: string; // max 50 chars
  image_url: string; // server-relative, e.g. /images/order_1_ab12cd34_photo.jpg
  status: OrderStatus;
  download_link: string | null;
  created_at: number; // seconds since epoch, fractional
}

/**
 * Order as sent to clients, with the price derived from the name
 */
export interface OrderView extends Order {
  price: string;
}

export interface CreateOrderInput {
  name: string;
  udid: string;
}

export interface UpdateOrderInput {
  name: string;
  udid: string;
  status: OrderStatus;
  download_link: string | null;
  image_url?: string; // only replaced when a new file was stored
}

export interface ListOrdersQuery {
  status?: string;
  q?: string;
  page: number;
  page_size: number;
}

export interface OrderPage {
  items: Order[];
  total: number;
}

export interface OrderListResponse {
  items: OrderView[];
  total: number;
  page: number;
  page_size: number;
}
