// Config - All configurations in one place
export { appConfig, adminConfig, loggingConfig } from './config/app.config';

// In-memory state
export { OrderStore, ConfigStore, seedOrders } from './store';

// Composition root
export { createAppContext, IMAGES_PREFIX } from './context';
export type { AppContext } from './context';
