import type { Express } from 'express';

import type { RaceRatingService } from '../services/race-service.js';

export const registerHealthRoutes = (app: Express, service: RaceRatingService) => {
  app.get('/health', (_req, res) =>
    res.status(200).send({ ok: true, events: service.eventCount, model_fitted: service.modelFitted })
  );
};
