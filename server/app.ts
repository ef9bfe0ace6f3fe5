import express, { type Express, type RequestHandler } from 'express';
import cors, { type CorsOptions } from 'cors';
import compression from 'compression';
import type { AppConfig } from './core/config';
import { logRequest, requestIdMiddleware } from './core/logger';
import { globalRateLimiter } from './middleware/rateLimiting';
import { getErrorMessage } from './utils/errorUtils';
import { registerRoutes, type RouteServices } from './loaders/routes';

export interface CreateAppOptions {
  config: AppConfig;
  services: RouteServices;
  session: RequestHandler;
  /** Readiness probe backing /api/ready */
  readiness?: () => Promise<{ ready: boolean; reason?: string; details?: Record<string, unknown> }>;
}

function corsOptionsFor(config: AppConfig): CorsOptions {
  return {
    origin: !config.isProduction && config.allowedOrigins.length === 0 ? true : config.allowedOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  };
}

export function createApp(options: CreateAppOptions): Express {
  const { config } = options;
  const app = express();

  app.get('/healthz', (_req, res) => {
    res.status(200).send('OK');
  });

  app.get('/api/ready', async (_req, res) => {
    if (!options.readiness) {
      res.status(200).json({ ready: true });
      return;
    }
    try {
      const result = await options.readiness();
      res.status(result.ready ? 200 : 503).json(result);
    } catch (error: unknown) {
      res.status(503).json({ ready: false, reason: 'readiness_check_failed', details: { error: getErrorMessage(error) } });
    }
  });

  app.set('trust proxy', 1);
  app.disable('x-powered-by');
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'SAMEORIGIN');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (config.isProduction) {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  app.use(requestIdMiddleware);
  app.use(logRequest);
  app.use(cors(corsOptionsFor(config)));
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(options.session);
  app.use(globalRateLimiter);

  registerRoutes(app, options.services);

  app.use('/api', (req, res) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.originalUrl}` });
  });

  return app;
}
