import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { config } from './config/env';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import routes from './routes';

export const createApp = (): Express => {
  const app = express();

  // Middleware
  app.use(cors({ origin: config.corsOrigins, credentials: true }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/', (req: Request, res: Response) => {
    res.json({
      message: 'MoodTrack API is running!',
      version: '1.0.0'
    });
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString()
    });
  });

  // API Routes (aggregated)
  app.use(config.apiPrefix, routes);

  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
};
