import { test } from 'node:test';
import assert from 'node:assert/strict';

import { MetricAccumulator } from '../../src/evaluation/metrics.js';

const close = (actual: number | null, expected: number) =>
  assert.ok(actual !== null && Math.abs(actual - expected) < 1e-12, `expected ${expected}, got ${actual}`);

test('log-loss, Brier and top-pick hit rate average over events', () => {
  const metrics = new MetricAccumulator();
  assert.deepEqual(metrics.add([0.5, 0.3, 0.2], 0), { clipped: false });
  metrics.add([0.1, 0.9], 0);

  const summary = metrics.summary();
  assert.equal(summary.events, 2);
  assert.equal(summary.entrants, 5);
  close(summary.logLoss, (Math.log(2) + Math.log(10)) / 2);
  close(summary.brier, (0.38 + 1.62) / 2);
  close(summary.topPickHitRate, 0.5);
});

test('calibration bins collect predictions by probability', () => {
  const metrics = new MetricAccumulator(10);
  metrics.add([0.5, 0.3, 0.2], 0);
  metrics.add([0.1, 0.9], 0);
  const bins = metrics.summary().calibration;

  assert.equal(bins.length, 10);
  assert.deepEqual(
    bins.map((bin) => bin.count),
    [0, 1, 1, 1, 0, 1, 0, 0, 0, 1]
  );
  assert.deepEqual(bins[5], { lower: 0.5, upper: 0.6, count: 1, meanPredicted: 0.5, observedRate: 1 });
  assert.equal(bins[9].observedRate, 0);
  assert.equal(bins[0].meanPredicted, null);
});

test('a certain winner lands in the top bin', () => {
  const metrics = new MetricAccumulator(4);
  metrics.add([1], 0);
  const summary = metrics.summary();
  assert.equal(summary.calibration[3].count, 1);
  assert.equal(summary.logLoss, 0);
  assert.equal(summary.brier, 0);
});

test('a zero winner probability is floored and flagged', () => {
  const metrics = new MetricAccumulator(10, 1e-15);
  assert.deepEqual(metrics.add([1, 0], 1), { clipped: true });
  close(metrics.summary().logLoss, -Math.log(1e-15));
});

test('merged accumulators equal one accumulator over everything', () => {
  const left = new MetricAccumulator();
  const right = new MetricAccumulator();
  const whole = new MetricAccumulator();
  left.add([0.6, 0.4], 1);
  right.add([0.2, 0.3, 0.5], 2);
  whole.add([0.6, 0.4], 1);
  whole.add([0.2, 0.3, 0.5], 2);

  const merged = left.merge(right).summary();
  const expected = whole.summary();
  assert.equal(merged.events, expected.events);
  assert.equal(merged.entrants, expected.entrants);
  close(merged.logLoss, expected.logLoss ?? NaN);
  close(merged.brier, expected.brier ?? NaN);
  close(merged.topPickHitRate, expected.topPickHitRate ?? NaN);
  assert.deepEqual(
    merged.calibration.map((bin) => bin.count),
    expected.calibration.map((bin) => bin.count)
  );
});

test('an empty accumulator reports no metrics', () => {
  const summary = new MetricAccumulator().summary();
  assert.equal(summary.logLoss, null);
  assert.equal(summary.brier, null);
  assert.equal(summary.topPickHitRate, null);
});

test('winner index must point at an entrant', () => {
  assert.throws(() => new MetricAccumulator().add([0.5, 0.5], 2), RangeError);
});
