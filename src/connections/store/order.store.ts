import { ORDER_STATUS, isOrderStatus } from '../../constants';
import { NotFoundError } from '../../utils/errors';
import {
  CreateOrderInput,
  ListOrdersQuery,
  Order,
  OrderPage,
  UpdateOrderInput,
} from './models/order.model';

export type Clock = () => number;

/** Seconds since epoch, fractional */
export const systemClock: Clock = () => Date.now() / 1000;

/**
 * In-memory order collection.
 *
 * Ids come from a counter that only moves forward, so an id is never handed
 * out twice even after deletions.
 */
export class OrderStore {
  private orders: Order[] = [];
  private lastId = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  get size(): number {
    return this.orders.length;
  }

  /**
   * Reserve an id, store the image under it, then append the order.
   * When `storeImage` throws nothing is appended.
   */
  async create(
    input: CreateOrderInput,
    storeImage: (orderId: number) => Promise<string>
  ): Promise<Order> {
    const id = this.nextId();
    const imageUrl = await storeImage(id);

    const order: Order = {
      id,
      name: input.name,
      udid: input.udid,
      image_url: imageUrl,
      status: ORDER_STATUS.PENDING,
      download_link: null,
      created_at: this.clock(),
    };
    this.orders.push(order);
    return { ...order };
  }

  /**
   * Insert a fully formed order, e.g. seed data. Keeps the id counter ahead
   * of every inserted id.
   */
  insert(order: Order): Order {
    if (this.findIndex(order.id) !== -1) {
      throw new Error(`Order ${order.id} already exists`);
    }
    this.orders.push({ ...order });
    this.lastId = Math.max(this.lastId, order.id);
    return { ...order };
  }

  get(id: number): Order {
    const order = this.orders[this.indexOrThrow(id)];
    return { ...order };
  }

  list(query: ListOrdersQuery): OrderPage {
    let filtered = this.orders;

    const status = query.status?.toLowerCase();
    if (status && isOrderStatus(status)) {
      filtered = filtered.filter(order => order.status.toLowerCase() === status);
    }

    if (query.q) {
      const needle = query.q.toLowerCase();
      filtered = filtered.filter(
        order =>
          order.name.toLowerCase().includes(needle) ||
          order.udid.toLowerCase().includes(needle)
      );
    }

    // Array.prototype.sort is stable: equal timestamps keep insertion order
    const sorted = [...filtered].sort((a, b) => b.created_at - a.created_at);

    const start = (query.page - 1) * query.page_size;
    const items = sorted.slice(start, start + query.page_size).map(order => ({ ...order }));

    return { items, total: filtered.length };
  }

  update(id: number, input: UpdateOrderInput): Order {
    const index = this.indexOrThrow(id);
    const current = this.orders[index];

    const updated: Order = {
      ...current,
      name: input.name,
      udid: input.udid,
      status: input.status,
      download_link: input.download_link,
      image_url: input.image_url ?? current.image_url,
    };
    this.orders[index] = updated;
    return { ...updated };
  }

  delete(id: number): void {
    const index = this.indexOrThrow(id);
    this.orders.splice(index, 1);
  }

  private nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  private findIndex(id: number): number {
    return this.orders.findIndex(order => order.id === id);
  }

  private indexOrThrow(id: number): number {
    const index = this.findIndex(id);
    if (index === -1) {
      throw new NotFoundError('Order not found');
    }
    return index;
  }
}
