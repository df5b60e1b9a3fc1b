import type { Express } from 'express';
import { z } from 'zod';

import { ENTITY_KINDS } from '../engine/types.js';
import type { RatingSnapshot } from '../engine/types.js';
import type { RaceRatingService } from '../services/race-service.js';

const EntityParamsSchema = z.object({
  kind: z.enum(ENTITY_KINDS),
  entityId: z.string().trim().min(1),
});

const RatingQuerySchema = z.object({
  as_of: z.string().datetime({ offset: true }).optional(),
  stratum: z.string().trim().min(1).optional(),
});

const HistoryQuerySchema = z.object({
  stratum: z.string().trim().min(1).optional(),
});

const toSnapshotResponse = (snapshot: RatingSnapshot) => ({
  event_id: snapshot.eventId,
  effective_at: snapshot.effectiveAt.toISOString(),
  rating: snapshot.rating,
  raw_rating: snapshot.raw,
  observations: snapshot.observations,
});

interface RatingRouteDeps {
  service: RaceRatingService;
  now?: () => Date;
}

export const registerRatingRoutes = (app: Express, deps: RatingRouteDeps) => {
  const { service } = deps;
  const now = deps.now ?? (() => new Date());

  app.get('/v1/ratings/:kind/:entityId', async (req, res, next) => {
    const params = EntityParamsSchema.safeParse(req.params);
    const query = RatingQuerySchema.safeParse(req.query);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }
    if (!query.success) {
      return res.status(400).send({ error: 'validation_error', details: query.error.flatten() });
    }

    try {
      const asOf = query.data.as_of ? new Date(query.data.as_of) : now();
      const rating = await service.ratingAsOf({ ...params.data, stratum: query.data.stratum }, asOf);
      return res.send({
        entity_key: rating.entityKey,
        kind: rating.kind,
        entity_id: rating.entityId,
        stratum: rating.stratum,
        as_of: rating.asOf.toISOString(),
        rating: rating.rating,
        raw_rating: rating.raw,
        observations: rating.observations,
        effective_at: rating.effectiveAt?.toISOString() ?? null,
        event_id: rating.eventId,
      });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/ratings/:kind/:entityId/history', async (req, res, next) => {
    const params = EntityParamsSchema.safeParse(req.params);
    const query = HistoryQuerySchema.safeParse(req.query);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }
    if (!query.success) {
      return res.status(400).send({ error: 'validation_error', details: query.error.flatten() });
    }

    try {
      const history = await service.history({ ...params.data, stratum: query.data.stratum });
      return res.send({ entity_key: history.entityKey, snapshots: history.snapshots.map(toSnapshotResponse) });
    } catch (err) {
      return next(err);
    }
  });
};
