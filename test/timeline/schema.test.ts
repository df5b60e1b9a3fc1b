import { test } from 'node:test';
import assert from 'node:assert/strict';

import { InvalidEventError } from '../../src/errors.js';
import { DEFAULT_STRATUM, parseTimelineFile, toEntrantResult } from '../../src/timeline/schema.js';

const file = {
  events: [
    {
      event_id: 'r1',
      starts_at: '2024-03-01T14:00:00Z',
      stratum: 'FLAT',
      entrants: [
        {
          entrant_id: 'r1-a',
          competitor_id: 'h-a',
          jockey_id: 'j-1',
          trainer_id: 't-1',
          attributes: { weight: 58, draw: 3 },
          market_price: 3.5,
          result: { position: 1 },
        },
        { entrant_id: 'r1-b', competitor_id: 'h-b', result: { non_finisher: true, code: 'PU' } },
      ],
    },
    {
      event_id: 'r2',
      starts_at: '2024-03-02T14:00:00+01:00',
      entrants: [{ entrant_id: 'r2-a', competitor_id: 'h-a' }],
    },
  ],
};

test('timeline files map onto race events', () => {
  const [settled, pending] = parseTimelineFile(file);

  assert.equal(settled.eventId, 'r1');
  assert.equal(settled.startsAt.toISOString(), '2024-03-01T14:00:00.000Z');
  assert.equal(settled.stratum, 'FLAT');
  assert.equal(settled.fieldSize, 2);
  assert.equal(settled.status, 'settled');
  assert.deepEqual(settled.entrants[0], {
    entrantId: 'r1-a',
    competitorId: 'h-a',
    agents: [
      { role: 'jockey', id: 'j-1' },
      { role: 'trainer', id: 't-1' },
    ],
    attributes: { weight: 58, draw: 3 },
    marketPrice: 3.5,
    result: { position: 1 },
  });
  assert.deepEqual(settled.entrants[1].result, { nonFinisher: true, code: 'PU' });

  assert.equal(pending.status, 'pending');
  assert.equal(pending.stratum, DEFAULT_STRATUM);
  assert.equal(pending.startsAt.toISOString(), '2024-03-02T13:00:00.000Z');
  assert.deepEqual(pending.entrants[0].agents, []);
});

test('results convert to entrant results', () => {
  assert.deepEqual(toEntrantResult({ position: 3 }), { position: 3 });
  assert.deepEqual(toEntrantResult({ non_finisher: true }), { nonFinisher: true });
});

test('malformed timeline files are rejected with paths', () => {
  assert.throws(
    () => parseTimelineFile({ events: [{ event_id: 'r1', starts_at: 'yesterday', entrants: [] }] }),
    (err: unknown) =>
      err instanceof InvalidEventError &&
      (err.context.issues ?? []).includes('events.0.starts_at: Invalid datetime') &&
      (err.context.issues ?? []).includes('events.0.entrants: event must have at least one entrant')
  );
  assert.throws(() => parseTimelineFile({ races: [] }), InvalidEventError);
  assert.throws(
    () =>
      parseTimelineFile({
        events: [{ event_id: 'r1', starts_at: '2024-03-01T14:00:00Z', entrants: [{ entrant_id: 'a', competitor_id: 'h', result: { position: 0 } }] }],
      }),
    InvalidEventError
  );
});
