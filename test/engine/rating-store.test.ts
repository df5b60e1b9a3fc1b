import { test } from 'node:test';
import assert from 'node:assert/strict';

import { RatingStore, buildEntityKey, compareIds, lastIndexBefore, resolveStratum, toSnapshotRow } from '../../src/engine/rating-store.js';
import type { SnapshotDraft } from '../../src/engine/rating-store.js';
import { OrderingViolationError } from '../../src/errors.js';
import { at } from '../helpers/events.js';

const draft = (entityId: string, rating: number, observations = 1): SnapshotDraft => ({
  entityKey: buildEntityKey({ kind: 'horse', entityId, stratum: null }),
  entityId,
  kind: 'horse',
  stratum: null,
  rating,
  raw: rating,
  observations,
});

test('entity keys include the stratum only when partitioned', () => {
  assert.equal(buildEntityKey({ kind: 'horse', entityId: 'h1', stratum: null }), 'horse:h1');
  assert.equal(buildEntityKey({ kind: 'jockey', entityId: 'j1', stratum: 'FLAT' }), 'jockey:FLAT:j1');
  assert.equal(resolveStratum('global', 'FLAT'), null);
  assert.equal(resolveStratum('stratum', 'FLAT'), 'FLAT');
});

test('lookup returns the latest snapshot strictly before the query time', () => {
  const store = new RatingStore(0.5);
  store.commit({ eventId: 'e1', startsAt: at(1) }, [draft('h1', 0.6)]);
  store.commit({ eventId: 'e2', startsAt: at(3) }, [draft('h1', 0.7, 2)]);

  assert.equal(store.ratingAsOf('horse:h1', at(1)).rating, 0.5);
  assert.equal(store.ratingAsOf('horse:h1', at(1)).effectiveAt, null);
  assert.equal(store.ratingAsOf('horse:h1', at(2)).rating, 0.6);
  assert.equal(store.ratingAsOf('horse:h1', at(3)).rating, 0.6);
  assert.equal(store.ratingAsOf('horse:h1', at(4)).rating, 0.7);
  assert.deepEqual(store.ratingAsOf('horse:h1', at(4)).effectiveAt, at(3));
});

test('unknown entities get the default with no observations', () => {
  const store = new RatingStore(0.42);
  const rating = store.ratingAsOf('horse:nobody', at(10));
  assert.deepEqual(rating, { entityKey: 'horse:nobody', rating: 0.42, raw: 0.42, observations: 0, effectiveAt: null });
});

test('binary search handles empty and boundary histories', () => {
  const store = new RatingStore(0.5);
  store.commit({ eventId: 'e1', startsAt: at(2) }, [draft('h1', 0.6)]);
  const history = store.history('horse:h1');
  assert.equal(lastIndexBefore([], at(5).getTime()), -1);
  assert.equal(lastIndexBefore(history, at(2).getTime()), -1);
  assert.equal(lastIndexBefore(history, at(2).getTime() + 1), 0);
});

test('an earlier event after a later commit is an ordering violation and leaves the store untouched', () => {
  const store = new RatingStore(0.5);
  store.commit({ eventId: 'e2', startsAt: at(5) }, [draft('h1', 0.6)]);
  assert.throws(
    () => store.commit({ eventId: 'e1', startsAt: at(4) }, [draft('h2', 0.4)]),
    (err: unknown) => err instanceof OrderingViolationError && err.context.lastEventId === 'e2'
  );
  assert.equal(store.commitCount, 1);
  assert.equal(store.snapshotCount, 1);
  assert.deepEqual(store.entityKeys(), ['horse:h1']);
});

test('an entity updated twice in one event is rejected before anything is appended', () => {
  const store = new RatingStore(0.5);
  assert.throws(() => store.commit({ eventId: 'e1', startsAt: at(1) }, [draft('h1', 0.6), draft('h2', 0.4), draft('h1', 0.7)]), OrderingViolationError);
  assert.equal(store.snapshotCount, 0);
  assert.equal(store.lastCommit, undefined);
});

test('committed snapshots are frozen and numbered in commit order', () => {
  const store = new RatingStore(0.5);
  const [a, b] = store.commit({ eventId: 'e1', startsAt: at(1) }, [draft('h1', 0.6), draft('h2', 0.4)]);
  assert.equal(a.sequence, 1);
  assert.equal(b.sequence, 2);
  assert.ok(Object.isFrozen(a));
  assert.deepEqual(toSnapshotRow(b), {
    entity_key: 'horse:h2',
    entity_id: 'h2',
    entity_kind: 'horse',
    stratum: null,
    effective_at: at(1).toISOString(),
    event_id: 'e1',
    rating: 0.4,
    raw_rating: 0.4,
    observations: 1,
    sequence: 2,
  });
  assert.deepEqual(
    store.rows().map((row) => row.sequence),
    [1, 2]
  );
});

test('the prior for an update includes an earlier snapshot at the same time', () => {
  const store = new RatingStore(0.5);
  store.commit({ eventId: 'e1', startsAt: at(1) }, [draft('h1', 0.6)]);
  assert.equal(store.ratingAsOf('horse:h1', at(1)).observations, 0);
  assert.equal(store.priorFor('horse:h1', at(1)).observations, 1);
  assert.equal(store.priorFor('horse:h1', at(1)).rating, 0.6);
  assert.equal(lastIndexBefore(store.history('horse:h1'), at(1).getTime(), true), 0);
});

test('prepared snapshots stay invisible until appended', () => {
  const store = new RatingStore(0.5);
  const prepared = store.prepare({ eventId: 'e1', startsAt: at(1) }, [draft('h1', 0.6), draft('h2', 0.4)]);
  assert.deepEqual(
    prepared.snapshots.map((snapshot) => [snapshot.entityKey, snapshot.sequence]),
    [
      ['horse:h1', 1],
      ['horse:h2', 2],
    ]
  );
  assert.equal(store.commitCount, 0);
  assert.equal(store.ratingAsOf('horse:h1', at(2)).rating, 0.5);

  store.append(prepared);
  assert.equal(store.lastCommit?.eventId, 'e1');
  assert.equal(store.ratingAsOf('horse:h1', at(2)).rating, 0.6);
});

test('a commit prepared against an older store is refused', () => {
  const store = new RatingStore(0.5);
  const stale = store.prepare({ eventId: 'e2', startsAt: at(2) }, [draft('h2', 0.4)]);
  store.commit({ eventId: 'e1', startsAt: at(1) }, [draft('h1', 0.6)]);
  assert.throws(() => store.append(stale), OrderingViolationError);
  assert.deepEqual(store.entityKeys(), ['horse:h1']);
});

test('restored snapshots regroup into commits and numbering continues', () => {
  const source = new RatingStore(0.5);
  source.commit({ eventId: 'e1', startsAt: at(1) }, [draft('h1', 0.6), draft('h2', 0.4)]);
  source.commit({ eventId: 'e2', startsAt: at(3) }, [draft('h1', 0.7, 2)]);

  const restored = new RatingStore(0.5);
  restored.restore([...source.history('horse:h1'), ...source.history('horse:h2')]);
  assert.equal(restored.commitCount, 2);
  assert.equal(restored.snapshotCount, 3);
  assert.deepEqual(restored.lastCommit, { eventId: 'e2', startsAt: at(3), snapshots: 1 });
  assert.equal(restored.ratingAsOf('horse:h1', at(4)).observations, 2);

  const [next] = restored.commit({ eventId: 'e3', startsAt: at(4) }, [draft('h2', 0.3, 2)]);
  assert.equal(next.sequence, 4);
  assert.throws(() => restored.restore([]), Error);
});

test('entity keys sort by code unit', () => {
  assert.deepEqual(['b', 'B', 'a', 'A'].sort(compareIds), ['A', 'B', 'a', 'b']);
});
