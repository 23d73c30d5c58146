import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import swaggerUi from 'swagger-ui-express';
import { DispatchCoordinator } from './services/DispatchCoordinator';
import { RecentEventsObserver } from './services/observers';
import { createRideRouter } from './api/routes';
import { createRiderRouter } from './api/userRoutes';
import { createDriverRouter } from './api/driverRoutes';
import { createDispatchRouter } from './api/dispatchRoutes';
import { swaggerSpec } from './api/swagger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

export interface AppDependencies {
  coordinator: DispatchCoordinator;
  history: RecentEventsObserver;
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
}

export function createApp({ coordinator, history, rateLimit: limits }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  if (limits) {
    app.use(
      '/api/',
      rateLimit({
        windowMs: limits.windowMs,
        max: limits.maxRequests,
        message: 'Too many requests from this IP, please try again later'
      })
    );
  }

  // API Documentation
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  // Routes
  app.use('/api/rides', createRideRouter(coordinator));
  app.use('/api/riders', createRiderRouter(coordinator));
  app.use('/api/drivers', createDriverRouter(coordinator));
  app.use('/api/dispatch', createDispatchRouter(coordinator, history));

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
