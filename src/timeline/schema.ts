import { z } from 'zod';

import { InvalidEventError } from '../errors.js';
import type { AgentRef, Entrant, EntrantResult, RaceEvent } from '../engine/types.js';

export const ResultSchema = z.union([
  z.object({ position: z.number().int().min(1) }),
  z.object({ non_finisher: z.literal(true), code: z.string().trim().min(1).optional() }),
]);

export const EntrantSchema = z.object({
  entrant_id: z.string().trim().min(1),
  competitor_id: z.string().trim().min(1),
  jockey_id: z.string().trim().min(1).nullable().optional(),
  trainer_id: z.string().trim().min(1).nullable().optional(),
  attributes: z.record(z.string(), z.number().nullable()).optional(),
  market_price: z.number().positive().nullable().optional(),
  result: ResultSchema.optional(),
});

export const EventSchema = z.object({
  event_id: z.string().trim().min(1),
  starts_at: z.string().datetime({ offset: true }),
  stratum: z.string().trim().min(1).optional(),
  field_size: z.number().int().min(1).optional(),
  venue: z.string().nullable().optional(),
  distance: z.number().positive().nullable().optional(),
  status: z.enum(['pending', 'settled']).optional(),
  entrants: z.array(EntrantSchema).min(1, 'event must have at least one entrant'),
});

export const TimelineFileSchema = z.object({
  events: z.array(EventSchema),
});

export const SettlementSchema = z.object({
  results: z.record(z.string(), ResultSchema),
});

export type EventPayload = z.infer<typeof EventSchema>;
export type EntrantPayload = z.infer<typeof EntrantSchema>;
export type ResultPayload = z.infer<typeof ResultSchema>;

export const DEFAULT_STRATUM = 'ALL';

export const toEntrantResult = (payload: ResultPayload): EntrantResult =>
  'position' in payload
    ? { position: payload.position }
    : { nonFinisher: true, ...(payload.code ? { code: payload.code } : {}) };

const toEntrant = (payload: EntrantPayload): Entrant => {
  const agents: AgentRef[] = [];
  if (payload.jockey_id) agents.push({ role: 'jockey', id: payload.jockey_id });
  if (payload.trainer_id) agents.push({ role: 'trainer', id: payload.trainer_id });
  return {
    entrantId: payload.entrant_id,
    competitorId: payload.competitor_id,
    agents,
    attributes: { ...(payload.attributes ?? {}) },
    marketPrice: payload.market_price ?? null,
    ...(payload.result ? { result: toEntrantResult(payload.result) } : {}),
  };
};

/** Events without an explicit status are settled when every entrant has a result. */
export const toRaceEvent = (payload: EventPayload): RaceEvent => {
  const status =
    payload.status ?? (payload.entrants.every((entrant) => entrant.result !== undefined) ? 'settled' : 'pending');
  return {
    eventId: payload.event_id,
    startsAt: new Date(payload.starts_at),
    stratum: payload.stratum ?? DEFAULT_STRATUM,
    fieldSize: payload.field_size ?? payload.entrants.length,
    venue: payload.venue ?? null,
    distance: payload.distance ?? null,
    status,
    entrants: payload.entrants.map(toEntrant),
  };
};

export const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);

export function parseTimelineFile(input: unknown): RaceEvent[] {
  const parsed = TimelineFileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new InvalidEventError(`timeline file is invalid: ${issues.join('; ')}`, { issues });
  }
  return parsed.data.events.map(toRaceEvent);
}
