import { AdminConfig, AppConfig } from './config/app.config';
import { ConfigStore, OrderStore, seedOrders } from './store';
import { AuthService } from '../modules/auth/auth.service';
import { ImageStore } from '../modules/upload/localStorage.service';

/**
 * Everything a request handler may touch. Built once by the composition
 * root and handed to the routers.
 */
export interface AppContext {
  orders: OrderStore;
  config: ConfigStore;
  images: ImageStore;
  auth: AuthService;
  corsOrigins: string[];
}

export const IMAGES_PREFIX = '/images';

export const createAppContext = (app: AppConfig, admin: AdminConfig): AppContext => {
  const images = new ImageStore({
    uploadDir: app.uploadDir,
    placeholderName: app.placeholderImage,
    publicPrefix: IMAGES_PREFIX,
  });
  images.ensurePlaceholder();

  const orders = new OrderStore();
  seedOrders(orders, app.seedOrders, images.placeholderUrl);

  return {
    orders,
    config: new ConfigStore(app.defaultPublicImageUrl),
    images,
    auth: new AuthService(admin),
    corsOrigins: app.corsOrigins,
  };
};
