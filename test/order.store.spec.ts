import { OrderStore, seedOrders } from '../src/connections/store';
import { Order } from '../src/connections/store/models/order.model';
import { NotFoundError } from '../src/utils/errors';

const tickingClock = (start: number) => {
  let now = start;
  return () => {
    now += 1;
    return now;
  };
};

const storeImage = (orderId: number) => Promise.resolve(`/images/order_${orderId}.jpg`);

const makeOrder = (id: number, overrides: Partial<Order> = {}): Order => ({
  id,
  name: `Item ${id}`,
  udid: `udid-${id}`,
  image_url: '/images/default.jpg',
  status: 'pending',
  download_link: null,
  created_at: 1000 - id,
  ...overrides,
});

describe('OrderStore', () => {
  let store: OrderStore;

  beforeEach(() => {
    store = new OrderStore(tickingClock(100));
  });

  describe('create', () => {
    it('assigns increasing ids and pending defaults', async () => {
      const first = await store.create({ name: 'Case $999', udid: 'u1' }, storeImage);
      const second = await store.create({ name: 'Case', udid: 'u2' }, storeImage);

      expect(first).toEqual({
        id: 1,
        name: 'Case $999',
        udid: 'u1',
        image_url: '/images/order_1.jpg',
        status: 'pending',
        download_link: null,
        created_at: 101,
      });
      expect(second.id).toBe(2);
      expect(second.created_at).toBe(102);
    });

    it('never reuses an id after a deletion', async () => {
      await store.create({ name: 'a', udid: 'a' }, storeImage);
      await store.create({ name: 'b', udid: 'b' }, storeImage);
      store.delete(1);

      const next = await store.create({ name: 'c', udid: 'c' }, storeImage);

      expect(next.id).toBe(3);
      expect(store.list({ page: 1, page_size: 10 }).items.map(o => o.id)).toEqual([3, 2]);
    });

    it('appends nothing when the image cannot be stored', async () => {
      const failing = () => Promise.reject(new Error('disk full'));

      await expect(store.create({ name: 'a', udid: 'a' }, failing)).rejects.toThrow('disk full');
      expect(store.size).toBe(0);
    });

    it('continues after seeded ids', async () => {
      store.insert(makeOrder(1));
      store.insert(makeOrder(2));

      const created = await store.create({ name: 'x', udid: 'y' }, storeImage);

      expect(created.id).toBe(3);
    });
  });

  describe('insert', () => {
    it('rejects a duplicate id', () => {
      store.insert(makeOrder(1));
      expect(() => store.insert(makeOrder(1))).toThrow('Order 1 already exists');
    });
  });

  describe('get', () => {
    it('returns a copy of the stored order', () => {
      store.insert(makeOrder(1));
      const order = store.get(1);
      order.name = 'changed';

      expect(store.get(1).name).toBe('Item 1');
    });

    it('throws NotFoundError for an unknown id', () => {
      expect(() => store.get(42)).toThrow(NotFoundError);
    });
  });

  describe('list', () => {
    beforeEach(() => {
      store.insert(makeOrder(1, { status: 'approved', name: 'Blue Case $10', created_at: 50 }));
      store.insert(makeOrder(2, { status: 'pending', udid: 'ABC-device', created_at: 70 }));
      store.insert(makeOrder(3, { status: 'rejected', created_at: 60 }));
      store.insert(makeOrder(4, { status: 'approved', name: 'Red abc case', created_at: 70 }));
    });

    it('sorts newest first, keeping insertion order on ties', () => {
      const { items, total } = store.list({ page: 1, page_size: 10 });

      expect(items.map(o => o.id)).toEqual([2, 4, 3, 1]);
      expect(total).toBe(4);
    });

    it('filters by status case-insensitively', () => {
      const { items, total } = store.list({ status: 'APPROVED', page: 1, page_size: 10 });

      expect(items.map(o => o.id)).toEqual([4, 1]);
      expect(total).toBe(2);
    });

    it('ignores an unknown status', () => {
      expect(store.list({ status: 'shipped', page: 1, page_size: 10 }).total).toBe(4);
    });

    it('searches name and udid case-insensitively', () => {
      const { items } = store.list({ q: 'abc', page: 1, page_size: 10 });

      expect(items.map(o => o.id)).toEqual([2, 4]);
    });

    it('applies the status filter before the search', () => {
      const { items, total } = store.list({ status: 'pending', q: 'abc', page: 1, page_size: 10 });

      expect(items.map(o => o.id)).toEqual([2]);
      expect(total).toBe(1);
    });

    it('pages through the filtered set', () => {
      expect(store.list({ page: 2, page_size: 3 }).items.map(o => o.id)).toEqual([1]);
      expect(store.list({ page: 3, page_size: 3 })).toEqual({ items: [], total: 4 });
    });
  });

  describe('update', () => {
    it('overwrites the editable fields and keeps the image when none is given', () => {
      store.insert(makeOrder(1, { download_link: 'http://old.test/1' }));

      const updated = store.update(1, {
        name: 'Renamed $5',
        udid: 'new-udid',
        status: 'approved',
        download_link: null,
      });

      expect(updated).toEqual({
        ...makeOrder(1),
        name: 'Renamed $5',
        udid: 'new-udid',
        status: 'approved',
        download_link: null,
      });
    });

    it('replaces the image when a new one was stored', () => {
      store.insert(makeOrder(1));

      const updated = store.update(1, {
        name: 'Item 1',
        udid: 'udid-1',
        status: 'pending',
        download_link: null,
        image_url: '/images/order_1_new.jpg',
      });

      expect(updated.image_url).toBe('/images/order_1_new.jpg');
      expect(updated.created_at).toBe(999);
    });

    it('throws NotFoundError for an unknown id', () => {
      expect(() =>
        store.update(9, { name: 'a', udid: 'b', status: 'pending', download_link: null })
      ).toThrow(NotFoundError);
    });
  });

  describe('delete', () => {
    it('removes only the matching order', () => {
      store.insert(makeOrder(1));
      store.insert(makeOrder(2));

      store.delete(1);

      expect(store.size).toBe(1);
      expect(store.get(2).id).toBe(2);
    });

    it('leaves the collection unchanged for an unknown id', () => {
      store.insert(makeOrder(1));

      expect(() => store.delete(5)).toThrow(NotFoundError);
      expect(store.size).toBe(1);
    });
  });
});

describe('seedOrders', () => {
  it('creates dummy orders an hour apart with cycling statuses', () => {
    const store = new OrderStore();
    seedOrders(store, 25, '/images/default.jpg', () => 100_000);

    expect(store.size).toBe(25);

    const third = store.get(3);
    expect(third).toEqual({
      id: 3,
      name: 'Dummy Item 3 $103',
      udid: expect.stringMatching(/^dummy-3-[0-9a-f]{12}$/),
      image_url: '/images/default.jpg',
      status: 'approved',
      download_link: 'http://example.com/download/3',
      created_at: 100_000 - 3 * 3600,
    });
    expect(store.get(5).status).toBe('rejected');
    expect(store.get(15).status).toBe('approved');
    expect(store.get(1)).toMatchObject({ status: 'pending', download_link: null });
  });
});
