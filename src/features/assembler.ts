import { TemporalLeakError } from '../errors.js';
import { buildEntityKey, resolveStratum } from '../engine/rating-store.js';
import type { RatingStore } from '../engine/rating-store.js';
import type { Entrant, EntityKind, RaceEvent, RatingPartition } from '../engine/types.js';

export interface FeatureSpec {
  ratingKinds: EntityKind[];
  attributes: string[];
  includeExperience: boolean;
}

export interface RatingProvenance {
  entityKey: string;
  effectiveAt: Date | null;
}

export interface EntrantFeatures {
  entrantId: string;
  competitorId: string;
  values: Array<number | null>;
  provenance: RatingProvenance[];
}

export interface RaceFeatures {
  eventId: string;
  startsAt: Date;
  names: readonly string[];
  entrants: EntrantFeatures[];
}

export const featureNames = (spec: FeatureSpec): string[] => [
  ...spec.ratingKinds.map((kind) => `${kind}_rating`),
  ...(spec.includeExperience ? ['horse_starts'] : []),
  ...spec.attributes,
];

const entityIdFor = (entrant: Entrant, kind: EntityKind): string | undefined =>
  kind === 'horse' ? entrant.competitorId : entrant.agents.find((agent) => agent.role === kind)?.id;

/**
 * Joins each entrant with the ratings effective strictly before the event, plus its static
 * attributes. Nothing computed from the event itself is read.
 */
export class FeatureAssembler {
  readonly names: readonly string[];

  constructor(
    private readonly store: RatingStore,
    private readonly spec: FeatureSpec,
    private readonly partition: RatingPartition,
    private readonly options: { strict?: boolean } = {}
  ) {
    this.names = featureNames(spec);
  }

  featuresFor(event: RaceEvent): RaceFeatures {
    const last = this.store.lastCommit;
    if (this.options.strict && last && last.startsAt.getTime() > event.startsAt.getTime()) {
      throw new TemporalLeakError(
        `rating store already holds event ${last.eventId} later than ${event.eventId}`,
        {
          eventId: event.eventId,
          eventStartsAt: event.startsAt.toISOString(),
          observedAt: last.startsAt.toISOString(),
        }
      );
    }

    const stratum = resolveStratum(this.partition, event.stratum);

    const entrants = event.entrants.map((entrant): EntrantFeatures => {
      const values: Array<number | null> = [];
      const provenance: RatingProvenance[] = [];
      let horseStarts = 0;

      for (const kind of this.spec.ratingKinds) {
        const entityId = entityIdFor(entrant, kind);
        if (entityId === undefined) {
          // no agent of this role: the default rating, with no snapshot behind it
          values.push(this.store.defaultRating);
          continue;
        }
        const entityKey = buildEntityKey({ kind, entityId, stratum });
        const rating = this.store.ratingAsOf(entityKey, event.startsAt);
        values.push(rating.rating);
        provenance.push({ entityKey, effectiveAt: rating.effectiveAt });
        if (kind === 'horse') horseStarts = rating.observations;
      }

      if (this.spec.includeExperience) {
        if (!this.spec.ratingKinds.includes('horse')) {
          const entityKey = buildEntityKey({ kind: 'horse', entityId: entrant.competitorId, stratum });
          const rating = this.store.ratingAsOf(entityKey, event.startsAt);
          horseStarts = rating.observations;
          provenance.push({ entityKey, effectiveAt: rating.effectiveAt });
        }
        values.push(horseStarts);
      }

      for (const attribute of this.spec.attributes) {
        const value = entrant.attributes[attribute];
        values.push(value === undefined || value === null || !Number.isFinite(value) ? null : value);
      }

      return { entrantId: entrant.entrantId, competitorId: entrant.competitorId, values, provenance };
    });

    return { eventId: event.eventId, startsAt: event.startsAt, names: this.names, entrants };
  }
}

/** Throws unless every rating behind the features predates the event. */
export function assertNoLeak(features: RaceFeatures, fold?: number): void {
  const at = features.startsAt.getTime();
  for (const entrant of features.entrants) {
    for (const source of entrant.provenance) {
      if (source.effectiveAt !== null && source.effectiveAt.getTime() >= at) {
        throw new TemporalLeakError(
          `rating for ${source.entityKey} effective ${source.effectiveAt.toISOString()} used for event ${features.eventId}`,
          {
            fold,
            eventId: features.eventId,
            entityKey: source.entityKey,
            eventStartsAt: features.startsAt.toISOString(),
            observedAt: source.effectiveAt.toISOString(),
          }
        );
      }
    }
  }
}
