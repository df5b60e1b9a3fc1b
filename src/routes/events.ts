import type { Express } from 'express';
import { z } from 'zod';

import type { RaceRatingService } from '../services/race-service.js';
import { EventSchema, SettlementSchema, toEntrantResult, toRaceEvent } from '../timeline/schema.js';
import type { IngestedEvent } from '../services/race-service.js';

const EventBatchSchema = z.object({
  events: z.array(EventSchema).min(1, 'at least one event is required'),
});

const toIngestedResponse = (event: IngestedEvent) => ({
  event_id: event.eventId,
  status: event.status,
  snapshots: event.snapshots,
});

interface EventRouteDeps {
  service: RaceRatingService;
}

export const registerEventRoutes = (app: Express, deps: EventRouteDeps) => {
  const { service } = deps;

  app.post('/v1/events', async (req, res, next) => {
    const parsed = EventBatchSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const ingested = await service.ingest(parsed.data.events.map(toRaceEvent));
      return res.status(201).send({ events: ingested.map(toIngestedResponse) });
    } catch (err) {
      return next(err);
    }
  });

  app.post('/v1/events/:eventId/results', async (req, res, next) => {
    const parsed = SettlementSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const results = Object.fromEntries(
      Object.entries(parsed.data.results).map(([entrantId, result]) => [entrantId, toEntrantResult(result)])
    );

    try {
      const settled = await service.settle(req.params.eventId, results);
      return res.status(200).send(toIngestedResponse(settled));
    } catch (err) {
      return next(err);
    }
  });
};
