import express from 'express';
import cors, { CorsOptions } from 'cors';
import { AppContext } from './connections/context';
import { createRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

export const createApp = (context: AppContext) => {
  const app = express();

  // CORS Configuration
  const corsOptions: CorsOptions = {
    origin: context.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
    maxAge: 86400, // 24 hours
    optionsSuccessStatus: 200,
  };

  // Middleware
  app.use(cors(corsOptions));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use(createRoutes(context));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
