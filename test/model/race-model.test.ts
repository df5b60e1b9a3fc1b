import { test } from 'node:test';
import assert from 'node:assert/strict';

import { P } from '../../src/engine/params.js';
import { ConfigurationError, ModelNotFittedError } from '../../src/errors.js';
import type { RaceFeatures } from '../../src/features/assembler.js';
import { RaceProbabilityModel } from '../../src/model/race-model.js';
import type { ModelOptions, TrainingRace } from '../../src/model/race-model.js';
import { at } from '../helpers/events.js';

const options = (overrides: Partial<ModelOptions> = {}): ModelOptions => ({ ...P.model, ...overrides });

const race = (i: number, values: number[], finishOrder: number[], names: string[] = ['form']): TrainingRace => ({
  eventId: `r${i}`,
  startsAt: at(i + 1),
  names,
  entrants: values.map((value, k) => ({
    entrantId: `r${i}-${k}`,
    competitorId: `h${k}`,
    values: [value],
    provenance: [],
  })),
  finishOrder,
});

// the entrant with the higher value wins four races in five
const races: TrainingRace[] = Array.from({ length: 10 }, (_, i) =>
  race(i, [1, 0, -1], i % 5 === 4 ? [1, 0, 2] : [0, 1, 2])
);

const probe = (values: Array<number | null>): RaceFeatures => ({
  eventId: 'probe',
  startsAt: at(20),
  names: ['form'],
  entrants: values.map((value, k) => ({ entrantId: `p-${k}`, competitorId: `h${k}`, values: [value], provenance: [] })),
});

test('fitting learns that the stronger feature wins', () => {
  const model = new RaceProbabilityModel(options());
  const summary = model.fit(races);

  assert.equal(summary.variant, 'winner-softmax');
  assert.equal(summary.races, 10);
  assert.equal(summary.usableRaces, 10);
  assert.ok(summary.weights.form > 0);
  assert.ok(summary.loss < Math.log(3));

  const { entries, issues } = model.predict(probe([1, 0, -1]));
  assert.deepEqual(issues, []);
  assert.ok(entries[0].probability > entries[1].probability);
  assert.ok(entries[1].probability > entries[2].probability);
  assert.ok(Math.abs(entries.reduce((s, e) => s + e.probability, 0) - 1) < 1e-9);
});

test('fits are deterministic', () => {
  const first = new RaceProbabilityModel(options()).fit(races);
  const second = new RaceProbabilityModel(options()).fit(races);
  assert.deepEqual(second, first);
});

test('plackett-luce uses the same scorer with a different loss', () => {
  const winner = new RaceProbabilityModel(options()).fit(races);
  const pl = new RaceProbabilityModel(options({ variant: 'plackett-luce' })).fit(races);
  assert.equal(pl.variant, 'plackett-luce');
  assert.ok(pl.weights.form > 0);
  assert.notEqual(pl.loss, winner.loss);
});

test('a single-entrant event gets probability exactly 1', () => {
  const model = new RaceProbabilityModel(options());
  model.fit(races);
  const { entries } = model.predict(probe([0.2]));
  assert.equal(entries.length, 1);
  assert.equal(entries[0].probability, 1);
});

test('missing feature values score as the training mean', () => {
  const model = new RaceProbabilityModel(options());
  model.fit(races);
  // the training mean of the feature is 0
  assert.equal(model.score([null]), model.score([0]));
});

test('races without a comparison are not usable', () => {
  const model = new RaceProbabilityModel(options());
  const summary = model.fit([race(0, [1], [0]), race(1, [1, 0], [])]);
  assert.equal(summary.usableRaces, 0);
  assert.equal(summary.iterations, 0);
  assert.deepEqual(summary.weights, { form: 0 });
});

test('predicting before fitting is an error', () => {
  const model = new RaceProbabilityModel(options());
  assert.equal(model.fitted, false);
  assert.throws(() => model.predict(probe([1, 0])), ModelNotFittedError);
  assert.throws(() => model.weights(), ModelNotFittedError);
});

test('mixed feature layouts are rejected', () => {
  const model = new RaceProbabilityModel(options());
  assert.throws(() => model.fit([race(0, [1, 0], [0, 1]), race(1, [1, 0], [0, 1], ['other'])]), ConfigurationError);
});

test('event log-likelihood matches the predicted winner probability', () => {
  const model = new RaceProbabilityModel(options());
  model.fit(races);
  const target = races[4];
  const { entries } = model.predict(target);
  assert.ok(Math.abs(model.eventLogLikelihood(target) - Math.log(entries[1].probability)) < 1e-9);
});
