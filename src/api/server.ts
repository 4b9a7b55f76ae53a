/**
 * API Server
 *
 * HTTP adapter over the session boundary for an external presentation layer:
 * - Session lifecycle and message posting
 * - Chart artifacts by handle
 * - Health check
 */

// Load environment variables first
import 'dotenv/config';

import express, { Request, Response, NextFunction } from 'express';
import { createServer, type Server } from 'http';
import { randomUUID } from 'crypto';
import { AnalystAgentError } from '../core/errors.js';
import { loadConfig } from '../config/index.js';
import { createRuntime, type AgentRuntime } from '../runtime.js';
import { createSessionsRouter } from './routes/sessions.js';
import { createArtifactsRouter } from './routes/artifacts.js';

export function getStatusCode(code: string): number {
  const codes: Record<string, number> = {
    INVALID_INPUT: 400,
    QUERY_ERROR: 400,
    RENDER_ERROR: 400,
    NOT_FOUND: 404,
    SESSION_BUSY: 409,
    SESSION_CANCELLED: 409,
    RATE_LIMITED: 429,
    SOURCE_UNAVAILABLE: 503,
    TIMEOUT: 504,
  };
  return codes[code] ?? 500;
}

export function createApp(runtime: AgentRuntime): express.Express {
  const app = express();
  const logger = runtime.logger;

  // Middleware
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const requestId = randomUUID();
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      logger.info('http_request', {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - start,
      });
    });

    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      sessions: runtime.sessions.size,
      cachedDatasets: runtime.datasets.getStats().cached,
      artifacts: runtime.artifacts.size,
    });
  });

  // API routes
  app.use('/sessions', createSessionsRouter(runtime.sessions));
  app.use('/artifacts', createArtifactsRouter(runtime.artifacts));

  // Error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.warn('request_error', {
      method: req.method,
      path: req.path,
      error: {
        code: err instanceof AnalystAgentError ? err.code : 'UNKNOWN',
        message: err.message,
      },
    });

    // Handle JSON parsing errors
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({
        error: {
          code: 'INVALID_JSON',
          message: 'Invalid JSON in request body',
        },
      });
      return;
    }

    if (err instanceof AnalystAgentError) {
      res.status(getStatusCode(err.code)).json({ error: err.toJSON() });
      return;
    }

    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: runtime.config.environment === 'production' ? 'An internal error occurred' : err.message,
      },
    });
  });

  return app;
}

/**
 * Start the HTTP server on PORT (default 3000) from environment configuration.
 */
export function startServer(port: number = Number(process.env.PORT ?? 3000)): Server {
  const runtime = createRuntime(loadConfig());
  const httpServer = createServer(createApp(runtime));

  runtime.sessions.startSweeping();
  httpServer.listen(port, () => {
    runtime.logger.info('server_started', { port, environment: runtime.config.environment });
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    runtime.logger.info('shutdown_initiated');
    runtime.shutdown();
    httpServer.close(() => {
      runtime.logger.info('server_shutdown_complete');
      process.exit(0);
    });
  });

  return httpServer;
}
