import express from 'express';
import { requireAuth } from './middleware/auth.middleware';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import authRouter from './routes/auth.routes';
import healthRouter from './routes/health.routes';
import historyRouter from './routes/history.routes';
import ordersRouter from './routes/orders.routes';
import settingsRouter from './routes/settings.routes';
import storesRouter from './routes/stores.routes';

export function createApp() {
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(requestContextMiddleware);
  app.use(requestLoggerMiddleware);

  app.use(healthRouter);
  app.use(authRouter);

  app.use('/api', requireAuth);
  app.use(storesRouter);
  app.use(settingsRouter);
  app.use(ordersRouter);
  app.use(historyRouter);

  app.use((_req, res) => {
    res.status(404).json({ success: false, error: 'Resource not found' });
  });

  return app;
}
