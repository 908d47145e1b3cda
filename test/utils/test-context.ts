import { mkdtempSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { AppContext, IMAGES_PREFIX } from '../../src/connections/context';
import { ConfigStore, OrderStore, seedOrders } from '../../src/connections/store';
import { AuthService } from '../../src/modules/auth/auth.service';
import { ImageStore } from '../../src/modules/upload/localStorage.service';

export const TEST_ADMIN = {
  username: 'test-admin',
  password: 'test-password',
  token: 'test-token',
};

export const TEST_NOW = 1_700_000_000;

export const makeTempDir = () => mkdtempSync(path.join(os.tmpdir(), 'order-desk-'));

export interface TestContextOptions {
  uploadDir: string;
  seed?: number;
  now?: () => number;
}

export const buildTestContext = ({ uploadDir, seed = 0, now }: TestContextOptions): AppContext => {
  const images = new ImageStore({
    uploadDir,
    placeholderName: 'default.jpg',
    publicPrefix: IMAGES_PREFIX,
  });
  images.ensurePlaceholder();

  const orders = new OrderStore(now);
  seedOrders(orders, seed, images.placeholderUrl, () => TEST_NOW);

  return {
    orders,
    config: new ConfigStore('https://placeholder.test/public.png'),
    images,
    auth: new AuthService(TEST_ADMIN),
    corsOrigins: ['http://localhost:5500'],
  };
};

export const bearer = (token: string = TEST_ADMIN.token) => `Bearer ${token}`;
