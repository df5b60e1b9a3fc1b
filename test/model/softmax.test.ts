import { test } from 'node:test';
import assert from 'node:assert/strict';

import { InvalidEventError } from '../../src/errors.js';
import { createLikelihood } from '../../src/model/likelihood.js';
import { logSumExp, normaliseScores, softmax } from '../../src/model/softmax.js';

const sum = (xs: readonly number[]) => xs.reduce((s, x) => s + x, 0);

test('a single entrant gets probability exactly 1', () => {
  assert.deepEqual(normaliseScores([-42]), { probabilities: [1], issues: [] });
});

test('probabilities follow score order and sum to 1', () => {
  const p = softmax([2, 1, 0, -1]);
  assert.ok(p[0] > p[1] && p[1] > p[2] && p[2] > p[3]);
  assert.ok(Math.abs(sum(p) - 1) < 1e-9);
  assert.ok(Math.abs(p[0] / p[1] - Math.E) < 1e-9);
});

test('large scores do not overflow', () => {
  const p = softmax([1000, 999, -1000]);
  assert.ok(p.every((x) => Number.isFinite(x)));
  assert.ok(Math.abs(p[0] / p[1] - Math.E) < 1e-9);
  assert.ok(Math.abs(sum(p) - 1) < 1e-9);
});

test('equal scores give a uniform distribution', () => {
  assert.deepEqual(softmax([0.3, 0.3, 0.3, 0.3]), [0.25, 0.25, 0.25, 0.25]);
});

test('non-finite scores fall back to uniform with a notice', () => {
  const { probabilities, issues } = normaliseScores([1, Number.NaN, 0]);
  assert.deepEqual(probabilities, [1 / 3, 1 / 3, 1 / 3]);
  assert.equal(issues.length, 1);
  assert.equal(issues[0].kind, 'non_finite_score');
});

test('an empty event cannot be normalised', () => {
  assert.throws(() => normaliseScores([]), InvalidEventError);
});

test('logSumExp matches the direct formula on small inputs', () => {
  const scores = [0.5, -1, 2];
  const direct = Math.log(scores.reduce((s, x) => s + Math.exp(x), 0));
  assert.ok(Math.abs(logSumExp(scores) - direct) < 1e-12);
  assert.equal(logSumExp([]), -Infinity);
});

test('winner-softmax loss is the negative log winner probability', () => {
  const scores = [1, 0, -1];
  const term = createLikelihood('winner-softmax').evaluate(scores, [1, 0, 2]);
  const p = softmax(scores);
  assert.ok(Math.abs(term.loss + Math.log(p[1])) < 1e-12);
  assert.ok(Math.abs(term.gradient[1] - (p[1] - 1)) < 1e-12);
  assert.ok(Math.abs(sum(term.gradient)) < 1e-12);
});

test('plackett-luce adds one softmax term per placed finisher', () => {
  const scores = [1, 0, -1];
  const term = createLikelihood('plackett-luce').evaluate(scores, [0, 1, 2]);
  const first = -Math.log(softmax(scores)[0]);
  const second = -Math.log(softmax([0, -1])[0]);
  assert.ok(Math.abs(term.loss - (first + second)) < 1e-12);
});

test('races without a comparison contribute nothing', () => {
  for (const variant of ['winner-softmax', 'plackett-luce'] as const) {
    const likelihood = createLikelihood(variant);
    assert.deepEqual(likelihood.evaluate([0.4], [0]), { loss: 0, gradient: [0] });
    assert.deepEqual(likelihood.evaluate([0.4, 0.1], []), { loss: 0, gradient: [0, 0] });
  }
});
