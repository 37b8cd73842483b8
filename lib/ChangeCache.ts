/**
 * ChangeCache - Last-seen advertisement payload per beacon
 *
 * The cache is an immutable value threaded through the poll driver. `diffHistory`
 * never mutates its input; it returns the changed records together with the
 * state to commit, so the caller decides when (and whether) to commit.
 *
 * A record counts as changed when its identifier has never been seen or its
 * payload bytes differ from the cached ones. Signal strength, timestamp and
 * age are ignored.
 *
 * The state holds its own copies of the payload bytes, so records handed to a
 * listener can be mutated without touching the cache.
 *
 * @example
 * ```typescript
 * let state = createChangeCacheState();
 * const { changed, state: next } = diffHistory(state, response);
 * state = next; // commit
 * ```
 */

import type { BeaconRecord, HistoryResponse } from './types';

/**
 * Identifier to last payload. Entries are never purged; a beacon that stops
 * reporting just keeps its stale entry.
 */
export type ChangeCacheState = ReadonlyMap<string, Uint8Array>;

export interface ChangeCacheDiff {
  /** Records that are new or whose payload changed, in response order */
  changed: BeaconRecord[];
  /** State to commit once the cycle completes */
  state: ChangeCacheState;
}

export function createChangeCacheState(): ChangeCacheState {
  return new Map<string, Uint8Array>();
}

/**
 * Byte-exact payload comparison.
 */
export function payloadsEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Compares a response against the previous state.
 *
 * @param previous - State committed by the last successful cycle
 * @param response - Freshly decoded history response
 * @returns Changed records and the updated state
 */
export function diffHistory(previous: ChangeCacheState, response: HistoryResponse): ChangeCacheDiff {
  const next = new Map(previous);
  const changed: BeaconRecord[] = [];

  for (const record of response.records) {
    const cached = previous.get(record.identifier);
    if (cached === undefined || !payloadsEqual(cached, record.payload)) {
      changed.push(record);
    }
    next.set(record.identifier, record.payload.slice());
  }

  return { changed, state: next };
}
