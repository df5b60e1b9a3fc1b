import type { Express } from 'express';

import type { RaceRatingService } from '../services/race-service.js';

interface ModelRouteDeps {
  service: RaceRatingService;
}

export const registerModelRoutes = (app: Express, deps: ModelRouteDeps) => {
  const { service } = deps;

  app.post('/v1/model/fit', async (_req, res, next) => {
    try {
      const summary = await service.fit();
      return res.status(200).send({
        variant: summary.variant,
        races: summary.races,
        usable_races: summary.usableRaces,
        iterations: summary.iterations,
        converged: summary.converged,
        loss: summary.loss,
        weights: summary.weights,
      });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/events/:eventId/predictions', async (req, res, next) => {
    try {
      const assignment = await service.predict(req.params.eventId);
      return res.send({
        event_id: assignment.eventId,
        entrants: assignment.entries.map((entry) => ({
          entrant_id: entry.entrantId,
          competitor_id: entry.competitorId,
          score: entry.score,
          probability: entry.probability,
        })),
        issues: assignment.issues.map((issue) => ({ kind: issue.kind, detail: issue.detail })),
      });
    } catch (err) {
      return next(err);
    }
  });
};
