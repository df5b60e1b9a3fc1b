import { test } from 'node:test';
import assert from 'node:assert/strict';

import { ModelNotFittedError, OrderingViolationError } from '../../src/errors.js';
import type { RatingSnapshot } from '../../src/engine/types.js';
import { silentLogger } from '../../src/logger.js';
import { RaceRatingService } from '../../src/services/race-service.js';
import { MemorySnapshotRepository } from '../../src/store/memory.js';
import { testConfig } from '../helpers/app.js';
import { at, duel, makeEvent } from '../helpers/events.js';

const close = (actual: number | undefined, expected: number) =>
  assert.ok(actual !== undefined && Math.abs(actual - expected) < 1e-12, `expected ${expected}, got ${actual}`);

class FlakyRepository extends MemorySnapshotRepository {
  constructor(private failures: number) {
    super();
  }

  override async appendEventSnapshots(eventId: string, snapshots: readonly RatingSnapshot[]): Promise<void> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('connection reset');
    }
    return super.appendEventSnapshots(eventId, snapshots);
  }
}

const serviceFor = (repository: MemorySnapshotRepository) =>
  new RaceRatingService(testConfig(), repository, silentLogger);

test('a restarted service continues from the persisted ratings', async () => {
  const repository = new MemorySnapshotRepository();
  await serviceFor(repository).ingest([duel('e1', at(1), 'A', 'B')]);

  const restarted = serviceFor(repository);
  await restarted.ingest([duel('e2', at(2), 'A', 'B')]);

  const after = await repository.findAsOf('horse:A', at(3));
  close(after?.rating, 0.755);
  assert.equal(after?.observations, 2);
  assert.deepEqual(
    (await repository.listHistory('horse:A')).map((snapshot) => snapshot.sequence),
    [1, 3]
  );
});

test('a restarted service rejects settled events older than the persisted ratings', async () => {
  const repository = new MemorySnapshotRepository();
  await serviceFor(repository).ingest([duel('e2', at(2), 'A', 'B')]);

  await assert.rejects(
    serviceFor(repository).ingest([duel('e1', at(1), 'B', 'A')]),
    (err: unknown) => err instanceof OrderingViolationError && err.context.lastEventId === 'e2'
  );
});

test('a failed write leaves the event out of both store and timeline', async () => {
  const repository = new FlakyRepository(1);
  const service = serviceFor(repository);

  await assert.rejects(service.ingest([duel('e1', at(1), 'A', 'B')]), /connection reset/);
  assert.equal(service.eventCount, 0);

  const [retried] = await service.ingest([duel('e1', at(1), 'A', 'B')]);
  assert.deepEqual(retried, { eventId: 'e1', status: 'settled', snapshots: 2 });
  await service.ingest([duel('e2', at(2), 'A', 'B')]);

  assert.deepEqual(
    (await repository.listHistory('horse:A')).map((snapshot) => [snapshot.eventId, snapshot.observations]),
    [
      ['e1', 1],
      ['e2', 2],
    ]
  );
});

test('a failed settlement keeps the event pending', async () => {
  const service = serviceFor(new FlakyRepository(1));
  await service.ingest([makeEvent('e1', at(1), [{ horse: 'A' }, { horse: 'B' }])]);

  const results = { 'e1-1': { position: 1 }, 'e1-2': { position: 2 } };
  await assert.rejects(service.settle('e1', results), /connection reset/);
  assert.deepEqual(await service.settle('e1', results), { eventId: 'e1', status: 'settled', snapshots: 2 });
});

test('concurrent batches are applied one after the other', async () => {
  const repository = new MemorySnapshotRepository();
  const service = serviceFor(repository);
  await Promise.all([service.ingest([duel('e1', at(1), 'A', 'B')]), service.ingest([duel('e2', at(2), 'A', 'B')])]);

  assert.equal(service.eventCount, 2);
  assert.deepEqual(
    (await repository.listHistory('horse:A')).map((snapshot) => snapshot.observations),
    [1, 2]
  );
});

test('fitting without a usable race leaves the model unfitted', async () => {
  const service = serviceFor(new MemorySnapshotRepository());
  await service.ingest([
    makeEvent('w1', at(1), [{ horse: 'A', finish: 1 }]),
    makeEvent('p2', at(2), [{ horse: 'A' }, { horse: 'B' }]),
  ]);

  await assert.rejects(service.fit(), ModelNotFittedError);
  assert.equal(service.modelFitted, false);
  await assert.rejects(service.predict('p2'), ModelNotFittedError);
});
