/**
 * Agent Governor HTTP Control Surface
 *
 * Endpoints:
 * - GET  /health - Governor health (503 once the sampling loop has crashed)
 * - GET  /api/v1/mode - Active mode and constraints
 * - GET  /api/v1/mode/history - Mode transition history
 * - POST /api/v1/mode/transition - Manual mode transition
 * - GET  /api/v1/metrics/window - Recent samples and aggregates
 * - POST /api/v1/tasks - Run a task
 * - GET  /api/v1/approvals - Pending approvals
 * - POST /api/v1/approvals/:id/approve|reject - Settle an approval
 * - GET  /metrics - Prometheus metrics
 */
import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Server } from 'http';
import logger from '../utils/logger';
import { Governor } from '../runtime/governor';
import { getMetrics, getMetricsContentType, registerDefaultMetrics } from '../telemetry/metrics';
import { asyncHandler, createErrorHandler } from './middleware/error-handler';
import { traceMiddleware } from './middleware/trace';
import { createApprovalRouter } from './routes/approvals';
import { createMetricsRouter } from './routes/metrics';
import { createModeRouter } from './routes/mode';
import { createTaskRouter } from './routes/tasks';

export interface ServerOptions {
  service: { name: string; version: string };
  exposeInternalErrors?: boolean;
}

export function createApp(governor: Governor, options: ServerOptions): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use(traceMiddleware);

  app.get('/health', (_req: Request, res: Response) => {
    const health = governor.health();
    res.status(health.status === 'healthy' ? 200 : 503).json({
      ...health,
      service: options.service.name,
      version: options.service.version,
      timestamp: new Date().toISOString(),
    });
  });

  app.get(
    '/metrics',
    asyncHandler(async (_req: Request, res: Response) => {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    }),
  );

  app.use('/api/v1/mode', createModeRouter(governor));
  app.use('/api/v1/metrics', createMetricsRouter(governor));
  app.use('/api/v1/tasks', createTaskRouter(governor));
  app.use('/api/v1/approvals', createApprovalRouter(governor));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` } });
  });
  app.use(createErrorHandler(options.exposeInternalErrors ?? false));

  return app;
}

export function startServer(app: Express, port: number): Promise<Server> {
  registerDefaultMetrics();
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info({ port }, 'HTTP control surface listening');
      resolve(server);
    });
    server.once('error', reject);
  });
}
