import { readFile } from 'node:fs/promises';

import { InvalidEventError } from '../errors.js';
import type { RaceEvent } from '../engine/types.js';
import { parseTimelineFile } from './schema.js';

export async function loadTimelineFile(path: string): Promise<RaceEvent[]> {
  const text = await readFile(path, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidEventError(`${path} is not valid JSON: ${message}`);
  }
  return parseTimelineFile(json);
}
