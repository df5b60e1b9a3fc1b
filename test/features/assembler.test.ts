import { test } from 'node:test';
import assert from 'node:assert/strict';

import { buildRatingConfig } from '../../src/config.js';
import { RatingEngine } from '../../src/engine/rating.js';
import { TemporalLeakError } from '../../src/errors.js';
import { FeatureAssembler, assertNoLeak, featureNames } from '../../src/features/assembler.js';
import type { FeatureSpec, RaceFeatures } from '../../src/features/assembler.js';
import { at, duel, makeEvent } from '../helpers/events.js';

const spec: FeatureSpec = { ratingKinds: ['horse', 'jockey'], attributes: ['weight'], includeExperience: true };

const setup = () => {
  const engine = new RatingEngine(buildRatingConfig({ nonFinisher: { kind: 'last-place' }, alpha: 0.3 }));
  const store = engine.createStore();
  return { engine, store };
};

test('feature names follow the spec order', () => {
  assert.deepEqual(featureNames(spec), ['horse_rating', 'jockey_rating', 'horse_starts', 'weight']);
});

test('features use ratings from strictly before the event and record their provenance', () => {
  const { engine, store } = setup();
  engine.apply(store, duel('e1', at(1), 'A', 'B'));

  const assembler = new FeatureAssembler(store, spec, 'global', { strict: true });
  const features = assembler.featuresFor(
    makeEvent('e2', at(2), [
      { horse: 'A', jockey: 'J1', attributes: { weight: 57 } },
      { horse: 'C', attributes: { weight: null } },
    ])
  );

  assert.deepEqual(features.names, ['horse_rating', 'jockey_rating', 'horse_starts', 'weight']);
  const [a, c] = features.entrants;
  assert.ok(Math.abs((a.values[0] ?? NaN) - 0.65) < 1e-12);
  assert.deepEqual(a.values.slice(1), [0.5, 1, 57]);
  assert.deepEqual(a.provenance, [
    { entityKey: 'horse:A', effectiveAt: at(1) },
    { entityKey: 'jockey:J1', effectiveAt: null },
  ]);
  assert.deepEqual(c.values, [0.5, 0.5, 0, null]);
  assert.deepEqual(c.provenance, [{ entityKey: 'horse:C', effectiveAt: null }]);

  assert.doesNotThrow(() => assertNoLeak(features));
});

test('the event itself never contributes to its own features', () => {
  const { engine, store } = setup();
  const event = duel('e1', at(1), 'A', 'B');
  engine.apply(store, event);

  const features = new FeatureAssembler(store, spec, 'global').featuresFor(event);
  assert.deepEqual(
    features.entrants.map((entrant) => entrant.values[0]),
    [0.5, 0.5]
  );
});

test('a strict assembler refuses a store that already holds later events', () => {
  const { engine, store } = setup();
  engine.apply(store, duel('e2', at(5), 'A', 'B'));
  const assembler = new FeatureAssembler(store, spec, 'global', { strict: true });
  assert.throws(() => assembler.featuresFor(duel('e1', at(4), 'A', 'B')), TemporalLeakError);
});

test('injected future provenance is detected', () => {
  const features: RaceFeatures = {
    eventId: 'e1',
    startsAt: at(3),
    names: ['horse_rating'],
    entrants: [
      { entrantId: 'x', competitorId: 'A', values: [0.9], provenance: [{ entityKey: 'horse:A', effectiveAt: at(3) }] },
    ],
  };
  assert.throws(
    () => assertNoLeak(features, 4),
    (err: unknown) => err instanceof TemporalLeakError && err.context.fold === 4 && err.context.entityKey === 'horse:A'
  );
});
