import express, { Express, Request, Response } from 'express';
import { errorHandler } from './middleware/error-handler';
import { requestContextMiddleware } from './middleware/request-context';
import { requestIdMiddleware } from './middleware/request-id';
import { requestLoggerMiddleware } from './middleware/request-logger';
import { createAuditRoutes } from './routes/audit.routes';
import { createCartRoutes } from './routes/cart.routes';
import { createCategoryRoutes } from './routes/category.routes';
import { createClientRoutes } from './routes/client.routes';
import { createHealthRoutes } from './routes/health.routes';
import { createMetricsRoutes } from './routes/metrics.routes';
import { createOrderRoutes } from './routes/order.routes';
import { createProductRoutes } from './routes/product.routes';
import { Services } from './services/container';

/**
 * HTTP adapter over one set of services
 */
export function createApp(services: Services): Express {
  const app = express();

  // Middleware
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware(services.metrics));
  app.use(express.json());
  app.use(requestContextMiddleware);

  // Routes
  app.use('/api/health', createHealthRoutes(services));
  app.use('/api/metrics', createMetricsRoutes(services));
  app.use('/api/categories', createCategoryRoutes(services));
  app.use('/api/products', createProductRoutes(services));
  app.use('/api/clients', createClientRoutes(services));
  app.use('/api/carts', createCartRoutes(services));
  app.use('/api/orders', createOrderRoutes(services));
  app.use('/api/audit', createAuditRoutes(services));

  // 404 handler for unknown routes
  app.use('*', (_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        name: 'NotFoundError',
        message: 'Route not found',
        code: 'NOT_FOUND',
        statusCode: 404,
        timestamp: new Date().toISOString(),
      },
    });
  });

  // Error handling
  app.use(errorHandler);

  return app;
}
