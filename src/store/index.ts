import { loadDatabaseConfig } from '../config.js';
import type { SnapshotRepository } from './repository.js';
import { MemorySnapshotRepository } from './memory.js';
import { PostgresSnapshotRepository } from './postgres.js';

export * from './repository.js';

let repository: SnapshotRepository | null = null;

export const getRepository = (): SnapshotRepository => {
  if (!repository) {
    repository = loadDatabaseConfig().url ? new PostgresSnapshotRepository() : new MemorySnapshotRepository();
  }
  return repository;
};
