import fs from 'fs';
import path from 'path';
import { InvalidLocationError } from '../errors';
import { withTimeout } from './withTimeout';

async function inspectLocation(location: string): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(location);
  } catch {
    throw new InvalidLocationError(location, 'does not exist');
  }

  if (!stats.isDirectory()) {
    throw new InvalidLocationError(location, 'is not a directory');
  }

  try {
    await fs.promises.access(location, fs.constants.W_OK);
  } catch {
    throw new InvalidLocationError(location, 'is not writable');
  }
}

/**
 * Resolve and check a show folder. Network mounts can hang on stat, so the
 * whole check is bounded by `timeoutMs`.
 */
export async function checkShowLocation(location: string, timeoutMs: number): Promise<string> {
  const trimmed = location.trim();
  if (!trimmed) {
    throw new InvalidLocationError(location, 'is empty');
  }
  if (!path.isAbsolute(trimmed)) {
    throw new InvalidLocationError(location, 'must be an absolute path');
  }

  const resolved = path.resolve(trimmed);
  await withTimeout(inspectLocation(resolved), timeoutMs, `Checking location ${resolved}`);
  return resolved;
}
