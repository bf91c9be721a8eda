import express from 'express';
import { requireAuth } from './middleware/auth.middleware';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import reservationsRouter from './routes/reservations.routes';
import stockRouter from './routes/stock.routes';
import stockMovementsRouter from './routes/stockMovements.routes';
import valuationRouter from './routes/valuation.routes';

export function createApp() {
  const app = express();
  app.use(express.json());
  app.use(requestContextMiddleware);
  app.use(requestLoggerMiddleware);

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Everything below is tenant-scoped through the bearer token.
  app.use(requireAuth);
  app.use(stockRouter);
  app.use(stockMovementsRouter);
  app.use(valuationRouter);
  app.use(reservationsRouter);

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
