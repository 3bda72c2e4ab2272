// =============================================================================
// PATHGUARD — Express Application
//
//   /api/health         — store availability (unauthenticated)
//   /api/auth/*         — login and current profile (rate-limited)
//   /api/documents/*    — visibility filtering for the caller
//   /api/tickets/*      — support tickets
//   /api/feedback       — answer ratings
//   /api/admin/*        — permission administration (admin override only)
// =============================================================================

import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { requestId, requestSanitization, notFound, errorHandler } from './middleware/security';
import { createServices } from './services';
import { authRoutes } from './routes/auth';
import { documentRoutes } from './routes/documents';
import { feedbackRoutes, ticketRoutes } from './routes/records';
import { adminRoutes } from './routes/admin';
import { AppDeps, HealthCheck } from './types/system';

export const SERVICE_VERSION = '0.3.0';

export function createApp(deps: AppDeps): Express {
  const services = createServices(deps);
  const { settings, stores } = services;
  const app = express();

  // ── Security Middleware ──────────────────────────────────────────────

  app.use(helmet());
  app.use(cors({
    origin: settings.nodeEnv === 'development' ? '*' : undefined,
    credentials: true,
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId());
  app.use(requestSanitization());

  const authLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: settings.rateLimitAuthMax,
    message: { error: 'Too many authentication attempts. Try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    max: 300,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ── Routes ───────────────────────────────────────────────────────────

  const startTime = Date.now();

  app.get('/api/health', async (_req: Request, res: Response) => {
    const dbStart = Date.now();
    const available = await stores.profiles.isAvailable();
    const database: HealthCheck = {
      status: available ? 'healthy' : 'unhealthy',
      latencyMs: Date.now() - dbStart,
    };

    res.status(available ? 200 : 503).json({
      status: available ? 'healthy' : 'degraded',
      service: 'pathguard',
      version: SERVICE_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks: { database },
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/auth', authLimiter, authRoutes(services));
  app.use('/api/documents', apiLimiter, documentRoutes(services));
  app.use('/api/tickets', apiLimiter, ticketRoutes(services));
  app.use('/api/feedback', apiLimiter, feedbackRoutes(services));
  app.use('/api/admin', apiLimiter, adminRoutes(services));

  app.use(notFound());
  app.use(errorHandler());

  return app;
}
