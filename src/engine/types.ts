export const ENTITY_KINDS = ['horse', 'jockey', 'trainer'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];
export type AgentRole = Exclude<EntityKind, 'horse'>;
export type EventStatus = 'pending' | 'settled';
export type RatingPartition = 'global' | 'stratum';

export interface AgentRef {
  role: AgentRole;
  id: string;
}

export type EntrantResult =
  | { position: number }
  | { nonFinisher: true; code?: string };

export type StaticAttributes = Record<string, number | null>;

export interface Entrant {
  entrantId: string;
  competitorId: string;
  agents: AgentRef[];
  attributes: StaticAttributes;
  marketPrice?: number | null;
  result?: EntrantResult;
}

export interface RaceEvent {
  eventId: string;
  startsAt: Date;
  stratum: string;
  fieldSize: number;
  venue?: string | null;
  distance?: number | null;
  status: EventStatus;
  entrants: Entrant[];
}

export interface RatingSnapshot {
  entityKey: string;
  entityId: string;
  kind: EntityKind;
  stratum: string | null;
  effectiveAt: Date;
  eventId: string;
  rating: number;
  raw: number;
  observations: number;
  sequence: number;
}

export type NonFinisherPolicy =
  | { kind: 'constant'; value: number }
  | { kind: 'last-place' };

export type UpdateStrategyConfig =
  | { strategy: 'exponential'; alpha: number }
  | { strategy: 'shrinkage'; alpha: number; priorStrength: number; mean: number };

export interface RatingConfig {
  defaultRating: number;
  nonFinisher: NonFinisherPolicy;
  partition: RatingPartition;
  strategies: Record<EntityKind, UpdateStrategyConfig>;
}

export interface EntityUpdate {
  entityKey: string;
  entityId: string;
  kind: EntityKind;
  performance: number;
  ratingBefore: number;
  ratingAfter: number;
  rawBefore: number;
  rawAfter: number;
  observationsBefore: number;
  observationsAfter: number;
  priorSnapshotAt: Date | null;
}

export interface EventUpdateResult {
  eventId: string;
  appliedAt: Date;
  perEntity: EntityUpdate[];
  snapshots: RatingSnapshot[];
}
