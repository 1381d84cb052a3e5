/**
 * HTTP server
 *
 * Claim, graph and agent routes behind the shared-secret gate, plus the
 * ungated /health and /metrics endpoints used for monitoring.
 */
import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { logger } from '../utils/logger';
import { errorMessage, statusFor, ValidationError } from '../utils/errors';
import MetricsService, { getMetrics } from '../metrics/metrics';
import { ClaimLedger } from '../ledger/claim-ledger';
import { PolicyGate } from '../policy/gate';
import { AgentLoop } from '../agent/agent-loop';
import { LanguageModel } from '../llm/types';
import { GraphStore } from '../graph-store';
import { EvidenceStore } from '../evidence-store';
import { requireApiKey } from './auth';
import { asyncHandler } from './async-handler';
import { claimRoutes } from './routes/claims';
import { graphRoutes } from './routes/graph';
import { agentRoutes } from './routes/agent';

/**
 * Everything the routes need, built by the composition root
 */
export interface Services {
  graph: GraphStore;
  evidence: EvidenceStore;
  ledger: ClaimLedger;
  gate: PolicyGate;
  agent: AgentLoop;
  model: LanguageModel;
}

export interface AppOptions {
  apiKey: string;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function createApp(services: Services, options: AppOptions): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  // Log incoming requests
  app.use((req, res, next) => {
    logger.debug({
      method: req.method,
      url: req.url,
    }, 'HTTP request received');
    next();
  });

  app.get(
    '/health',
    asyncHandler(async (req, res) => {
      const [neo4j, postgres] = await Promise.all([services.graph.ping(), services.evidence.ping()]);
      const health = { ok: true, neo4j, postgres };
      logger.debug({ health }, 'Health check');
      res.json(health);
    }),
  );

  // Prometheus metrics endpoint
  app.get('/metrics', async (req, res) => {
    try {
      const metrics = await getMetrics();
      res.set('Content-Type', MetricsService.register.contentType);
      res.end(metrics);
    } catch (error) {
      logger.error({ error }, 'Error serving metrics');
      res.status(500).json({ status: 'error', message: 'Failed to collect metrics' });
    }
  });

  // The key check sits on each route, so unknown paths still fall through to the 404
  const auth = requireApiKey(options.apiKey);
  app.use(claimRoutes(services.gate, services.ledger, auth));
  app.use(graphRoutes(services.ledger, auth));
  app.use(agentRoutes(services.agent, services.model, auth));

  // Catch-all for 404s
  app.use((req, res) => {
    logger.info({
      method: req.method,
      url: req.url,
    }, 'Unknown route');

    res.status(404).json({
      status: 'error',
      message: 'Not found',
    });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = isBodyParseError(err) ? new ValidationError(`malformed JSON body: ${errorMessage(err)}`) : err;
    const status = statusFor(error);

    if (status >= 500) {
      logger.error({ error, method: req.method, url: req.url }, 'Request failed');
    } else {
      logger.info({ method: req.method, url: req.url, status, message: errorMessage(error) }, 'Request refused');
    }

    res.status(status).json({
      status: 'error',
      message: status === 500 ? 'Internal server error' : errorMessage(error),
      ...(error instanceof ValidationError && error.issues.length > 0 ? { issues: error.issues } : {}),
    });
  });

  return app;
}

/**
 * Listen on the given port; resolves once the socket is bound
 */
export function startServer(app: express.Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ port, host }, 'HTTP server started');
      resolve(server);
    });

    server.on('error', (error: Error) => {
      logger.error({ error }, 'HTTP server error');
      reject(error);
    });
  });
}

/**
 * Stop accepting connections and wait for in-flight requests
 */
export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    logger.info('Stopping HTTP server');

    server.close((err: Error | undefined) => {
      if (err) {
        logger.error({ error: err }, 'Error closing HTTP server');
        return reject(err);
      }

      logger.info('HTTP server stopped');
      resolve();
    });
  });
}

export default { createApp, startServer, stopServer };
