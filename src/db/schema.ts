import {
  pgTable,
  text,
  timestamp,
  integer,
  doublePrecision,
  serial,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';

export const ratingSnapshots = pgTable(
  'rating_snapshots',
  {
    id: serial('id').primaryKey(),
    entityKey: text('entity_key').notNull(),
    entityId: text('entity_id').notNull(),
    entityKind: text('entity_kind').notNull(),
    stratum: text('stratum'),
    effectiveAt: timestamp('effective_at', { withTimezone: true }).notNull(),
    eventId: text('event_id').notNull(),
    rating: doublePrecision('rating').notNull(),
    rawRating: doublePrecision('raw_rating').notNull(),
    observations: integer('observations').notNull(),
    sequence: integer('sequence').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    entityEventIdx: uniqueIndex('rating_snapshots_entity_event_idx').on(table.entityKey, table.eventId),
    entityTimeIdx: index('rating_snapshots_entity_time_idx').on(table.entityKey, table.effectiveAt),
  })
);

export const racePredictions = pgTable(
  'race_predictions',
  {
    id: serial('id').primaryKey(),
    eventId: text('event_id').notNull(),
    entrantId: text('entrant_id').notNull(),
    competitorId: text('competitor_id').notNull(),
    probability: doublePrecision('probability').notNull(),
    modelVariant: text('model_variant').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    eventIdx: index('race_predictions_event_idx').on(table.eventId),
  })
);
