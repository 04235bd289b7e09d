import type { Router } from 'express';
import express from 'express';
import type pino from 'pino';
import type { AppConfig } from '../config/app.js';
import type { SingleFlightExecutor } from '../core/executor.js';
import { HealthResponse, RefactorRequest, RefactorResponse, type ErrorResponseT } from '../schemas/refactor.js';
import { incBusyRejected, snapshot } from '../util/metrics.js';

export const BUSY_DETAIL = 'Agent is busy processing another request. Please try again later.';

export const router = (log: pino.Logger, executor: SingleFlightExecutor, config: AppConfig): Router => {
  const r = express.Router();

  r.get('/', (_req, res) => {
    res.json({
      message: `Welcome to ${config.appName}`,
      version: config.appVersion,
      health: '/health',
    });
  });

  r.get('/health', (_req, res) => {
    res.json(HealthResponse.parse({
      status: 'healthy',
      version: config.appVersion,
      app_name: config.appName,
      busy: executor.isBusy(),
    }));
  });

  r.post('/api/v1/refactor', async (req, res, next) => {
    const parsed = RefactorRequest.safeParse(req.body);
    if (!parsed.success) {
      const body: ErrorResponseT = { detail: 'Validation error', status_code: 422, errors: parsed.error.flatten() };
      res.status(422).json(body);
      return;
    }
    const { class_name, method_name } = parsed.data;
    const target = `${class_name}>>${method_name}`;

    // Check-and-acquire in one step: a busy executor rejects instead of queueing
    const pending = executor.tryRun(class_name, method_name);
    if (!pending) {
      incBusyRejected();
      log.warn({ target }, 'Agent busy, rejecting request');
      const body: ErrorResponseT = { detail: BUSY_DETAIL, status_code: 503 };
      res.status(503).json(body);
      return;
    }

    try {
      log.info({ target }, 'Received refactoring request');
      const record = await pending;
      if (!record.success) {
        log.error({ target, error: record.error }, 'Refactoring failed');
        const body: ErrorResponseT = { detail: `Refactoring failed: ${record.error ?? 'Unknown error'}`, status_code: 500 };
        res.status(500).json(body);
        return;
      }

      log.info({ target, ms: record.durationMs, refinement: record.refinement }, 'Refactoring completed successfully');
      res.json(RefactorResponse.parse({
        success: true,
        class_name: record.className,
        method_name: record.methodName,
        result: record.result,
        refinement: record.refinement,
        duration_ms: record.durationMs,
      }));
    } catch (err) {
      next(err);
    }
  });

  r.get('/metrics', (_req, res) => {
    res.json(snapshot());
  });

  return r;
};
