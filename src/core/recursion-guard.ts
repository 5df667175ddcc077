import { ConfigurationError, RecursionLimitExceededError } from '../types/delegation-errors.js';
import type { Host, SessionHandle } from '../types/host.js';
import { logThought } from '../utils/logger.js';

/** Ancestor walks stop here so a cyclic parent chain cannot loop forever. */
export const MAX_ANCESTRY_DEPTH = 100;

/**
 * Delegation depth of `session`: 0 for a root session, 1 for its children, and so on.
 *
 * A parent that cannot be opened counts as one more level and ends the walk.
 */
export async function currentRecursionLevel(session: SessionHandle, host: Host): Promise<number> {
  let depth = 0;
  let parentId = session.parentSessionId;

  while (parentId !== undefined && parentId !== '') {
    if (depth > MAX_ANCESTRY_DEPTH) {
      return depth;
    }

    let parent: SessionHandle | undefined;
    try {
      parent = await host.openSession(parentId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      void logThought(`[RecursionGuard] Could not open parent session '${parentId}': ${message}`);
      return depth + 1;
    }

    if (!parent) {
      return depth + 1;
    }

    depth += 1;
    parentId = parent.parentSessionId;
  }

  return depth;
}

export function assertValidRecursionLimit(maxLevel: number): void {
  if (!Number.isInteger(maxLevel) || maxLevel < 0) {
    throw new ConfigurationError(
      `[RecursionGuard] maxRecursionLevel must be a non-negative integer (got ${maxLevel}).`,
    );
  }
}

export function assertRecursionAllowed(currentLevel: number, maxLevel: number): void {
  assertValidRecursionLimit(maxLevel);
  if (currentLevel >= maxLevel) {
    throw new RecursionLimitExceededError(currentLevel, maxLevel);
  }
}

/** Fails fast on a bad limit, then walks the ancestry and enforces it. */
export async function checkRecursion(
  session: SessionHandle,
  host: Host,
  maxLevel: number,
): Promise<number> {
  assertValidRecursionLimit(maxLevel);
  const level = await currentRecursionLevel(session, host);
  assertRecursionAllowed(level, maxLevel);
  return level;
}
