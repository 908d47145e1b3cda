import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

const DEFAULT_CORS_ORIGINS = [
  'http://127.0.0.1:5500',
  'http://localhost:5500',
  'http://127.0.0.1:8000',
  'http://localhost:8000',
  'http://127.0.0.1',
  'http://localhost',
];

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return DEFAULT_CORS_ORIGINS;
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '8000'),
  nodeEnv: process.env.NODE_ENV || 'development',
  corsOrigins: parseCorsOrigins(),
  uploadDir: process.env.UPLOAD_DIR || path.join(process.cwd(), 'images'),
  placeholderImage: process.env.PLACEHOLDER_IMAGE || 'default.jpg',
  defaultPublicImageUrl:
    process.env.PUBLIC_IMAGE_URL ||
    'https://via.placeholder.com/600x400/9C27B0/ffffff?text=Public+Image',
  seedOrders: parseInt(process.env.SEED_ORDERS || '25'),
};

export const adminConfig = {
  username: process.env.ADMIN_USERNAME || 'admin',
  password: process.env.ADMIN_PASSWORD || 'password123',
  token: process.env.ADMIN_TOKEN || 'static-admin-token',
};

export const loggingConfig = {
  logLevel: process.env.LOG_LEVEL || 'info',
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
};

export type AppConfig = typeof appConfig;
export type AdminConfig = typeof adminConfig;
