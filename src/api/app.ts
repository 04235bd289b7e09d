import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type pino from 'pino';
import type { AppConfig } from '../config/app.js';
import type { SingleFlightExecutor } from '../core/executor.js';
import type { ErrorResponseT } from '../schemas/refactor.js';
import { router } from './routes.js';

function resOnFinish(res: Response, cb: () => void) {
  res.once('finish', cb);
}

/**
 * Builds the Express app without listening, so tests can drive it with
 * supertest.
 */
export function createApp(config: AppConfig, executor: SingleFlightExecutor, log: pino.Logger): express.Express {
  const app = express();
  app.use(express.json({ limit: '512kb' }));

  // CORS from configuration
  const cors = config.cors;
  app.use((req, res, next) => {
    const origin = req.headers.origin;
    const anyOrigin = cors.origins.includes('*');
    if (anyOrigin && !cors.allowCredentials) {
      res.header('Access-Control-Allow-Origin', '*');
    } else if (origin && (anyOrigin || cors.origins.includes(origin))) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }
    if (cors.allowCredentials) res.header('Access-Control-Allow-Credentials', 'true');
    res.header('Access-Control-Allow-Methods', cors.methods.includes('*') ? 'GET, POST, OPTIONS' : cors.methods.join(', '));
    const requested = req.headers['access-control-request-headers'];
    res.header(
      'Access-Control-Allow-Headers',
      cors.headers.includes('*') ? (requested ?? 'Content-Type, Authorization') : cors.headers.join(', '),
    );
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Basic request logging
  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.use('/', router(log, executor, config));

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    // Malformed JSON bodies come from express.json()
    if (err instanceof SyntaxError && 'body' in err) {
      const body: ErrorResponseT = { detail: 'Validation error', status_code: 422, errors: { formErrors: ['Malformed JSON body'], fieldErrors: {} } };
      res.status(422).json(body);
      return;
    }
    log.error({ err }, 'unhandled request error');
    const body: ErrorResponseT = {
      detail: 'Internal server error',
      status_code: 500,
      message: err instanceof Error ? err.message : 'Unknown error',
    };
    res.status(500).json(body);
  });

  return app;
}
