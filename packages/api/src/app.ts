import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import type { SessionRegistry } from '@cadence/bot';
import { errorHandler } from './middleware/errorHandler';
import { requireAuth } from './middleware/requireAuth';
import { createSessionsRouter } from './routes/sessions';

export interface AppOptions {
  registry: SessionRegistry;
  corsOrigin?: string;
}

// ---------------------------------------------------------------------------
// createApp
//
// Builds the Express app without listening, so tests can drive it through
// supertest and the entry point can wrap it in an http.Server for Socket.io.
// ---------------------------------------------------------------------------
export function createApp({ registry, corsOrigin = 'http://localhost:5173' }: AppOptions): Express {
  const app = express();

  app.use(cors({
    origin: corsOrigin,
    credentials: true,
  }));
  app.use(express.json());
  app.use(cookieParser());

  // -------------------------------------------------------------------------
  // Routes
  // -------------------------------------------------------------------------
  app.use('/api/sessions', createSessionsRouter(registry));

  // Stream cache counters for the dashboard's diagnostics panel.
  app.get('/api/cache', requireAuth, (_req, res) => {
    res.json(registry.cacheStats());
  });

  // Health check, useful for verifying the server is up.
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', sessions: registry.listSessions().length });
  });

  // Global error handler, must be registered last.
  app.use(errorHandler);

  return app;
}
