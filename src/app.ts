import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import {
  ConfigurationError,
  EventLookupError,
  InvalidEventError,
  ModelNotFittedError,
  OrderingViolationError,
  OutcomeAlreadySettledError,
  TemporalLeakError,
} from './errors.js';
import type { RaceRatingService } from './services/race-service.js';
import { SnapshotConflictError } from './store/index.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerEventRoutes } from './routes/events.js';
import { registerRatingRoutes } from './routes/ratings.js';
import { registerModelRoutes } from './routes/model.js';

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const payload = serializeError(err);
  if (payload.log) {
    // eslint-disable-next-line no-console
    console.error(payload.log.context, payload.log.error);
  }

  res.status(payload.status).json(payload.body);
};

const withContext = (context: object | undefined) =>
  context && Object.keys(context).length ? { context } : {};

export const serializeError = (err: unknown): {
  status: number;
  body: Record<string, unknown>;
  log?: { error: unknown; context: string };
} => {
  if (err instanceof InvalidEventError) {
    return { status: 400, body: { error: 'invalid_event', message: err.message, ...withContext(err.context) } };
  }

  if (err instanceof EventLookupError) {
    return { status: 404, body: { error: 'event_not_found', message: err.message } };
  }

  if (err instanceof OrderingViolationError) {
    return { status: 409, body: { error: 'ordering_violation', message: err.message, ...withContext(err.context) } };
  }

  if (err instanceof TemporalLeakError) {
    return {
      status: 409,
      body: { error: 'temporal_leak', message: err.message, ...withContext(err.context) },
      log: { error: err, context: 'temporal_leak' },
    };
  }

  if (err instanceof OutcomeAlreadySettledError) {
    return { status: 409, body: { error: 'already_settled', message: err.message, context: { eventId: err.eventId } } };
  }

  if (err instanceof SnapshotConflictError) {
    return { status: 409, body: { error: 'snapshot_conflict', message: err.message, context: err.context } };
  }

  if (err instanceof ModelNotFittedError) {
    return { status: 409, body: { error: 'model_not_fitted', message: err.message } };
  }

  if (err instanceof ConfigurationError) {
    return {
      status: 500,
      body: { error: 'configuration_error', message: err.message },
      log: { error: err, context: 'configuration_error' },
    };
  }

  return {
    status: 500,
    body: { error: 'internal_error', message: 'Unexpected error' },
    log: { error: err, context: 'unhandled_error' },
  };
};

export const createApp = (service: RaceRatingService): Express => {
  const app = express();
  app.use(express.json({ limit: '5mb' }));

  registerHealthRoutes(app, service);
  registerEventRoutes(app, { service });
  registerRatingRoutes(app, { service });
  registerModelRoutes(app, { service });

  app.use(errorHandler);

  return app;
};
