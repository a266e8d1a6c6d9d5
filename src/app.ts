import express, { Application } from 'express';
import cookieParser from 'cookie-parser';
import logger from 'morgan';
import cors from 'cors';

import type { AppConfig } from './config';
import type { BlogServices } from './services';
import { createIndexRouter } from './routes/index';
import { createBlogRouter } from './routes/blog';
import { loadCurrentUser } from './middleware/adminAuth';
import { createErrorHandler, notFoundHandler } from './middleware/errors';

export type AppOptions = {
  services: BlogServices;
  config: Pick<AppConfig, 'admin' | 'env' | 'sessionSecret' | 'corsOrigins'>;
};

export function createApp({ services, config }: AppOptions): Application {
  const app: Application = express();

  // CORS configuration
  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Cookie'],
  }));

  // Basic middleware
  if (config.env !== 'test') {
    app.use(logger('dev'));
  }
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser(config.sessionSecret));

  // Session
  app.use(loadCurrentUser(config));

  // Routes
  app.use('/', createIndexRouter(services));
  app.use('/api/blog', createBlogRouter(services, config));

  // Error handling
  app.use(notFoundHandler);
  app.use(createErrorHandler(config.env));

  return app;
}
