import type { LevelOrder, PriceLevel } from '@streamgate/schemas';

type Merge = (current: unknown, delta: unknown) => unknown;

/**
 * Last merged state per topic key for delta-style feeds
 *
 * A key only exists after a full snapshot was stored; deltas against a
 * missing key are refused. Reads hand out copies so handlers can never
 * mutate stored state.
 */
export class SnapshotStore {
  private readonly states = new Map<string, unknown>();

  /**
   * Replace the stored state wholesale and return a copy of it
   */
  replace(key: string, payload: unknown): unknown {
    this.states.set(key, structuredClone(payload));
    return structuredClone(payload);
  }

  /**
   * Merge a delta into the stored state. Returns a copy of the merged
   * state, or undefined when there is no snapshot to merge into.
   */
  merge(key: string, delta: unknown, merge: Merge): unknown {
    if (!this.states.has(key)) {
      return undefined;
    }
    const next = merge(this.states.get(key), delta);
    this.states.set(key, next);
    return structuredClone(next);
  }

  get(key: string): unknown {
    return this.states.has(key) ? structuredClone(this.states.get(key)) : undefined;
  }

  discard(key: string): boolean {
    return this.states.delete(key);
  }

  clear(): void {
    this.states.clear();
  }
}

// ============================================
// Delta merge
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPriceLevel(value: unknown): value is PriceLevel {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    value.every((part) => typeof part === 'string' || typeof part === 'number')
  );
}

function toLevels(value: unknown): PriceLevel[] {
  return Array.isArray(value) ? value.filter(isPriceLevel) : [];
}

/**
 * Patch a list of `[price, size, ...]` levels
 *
 * Levels are matched by numeric price: size 0 removes, a known price is
 * replaced, an unseen price is inserted. With `asc`/`desc` the result is
 * kept sorted by price; with `none` new levels are appended.
 */
export function mergeLevels(current: readonly PriceLevel[], delta: readonly PriceLevel[], order: LevelOrder): PriceLevel[] {
  const levels = new Map<number, PriceLevel>();
  for (const level of current) {
    levels.set(Number(level[0]), level);
  }

  for (const level of delta) {
    const price = Number(level[0]);
    if (Number(level[1]) === 0) {
      levels.delete(price);
    } else {
      levels.set(price, level);
    }
  }

  const merged = [...levels.entries()];
  if (order === 'asc') merged.sort((a, b) => a[0] - b[0]);
  if (order === 'desc') merged.sort((a, b) => b[0] - a[0]);
  return merged.map(([, level]) => level);
}

/**
 * Field-by-field delta merge
 *
 * Fields named in `levelFields` are patched as price levels; every other
 * field in the delta overwrites the stored value. Non-object inputs are
 * treated as a full replacement.
 */
export function mergeDelta(current: unknown, delta: unknown, levelFields: Record<string, LevelOrder> = {}): unknown {
  if (!isRecord(current) || !isRecord(delta)) {
    return structuredClone(delta);
  }

  const merged: Record<string, unknown> = { ...current };
  for (const [field, value] of Object.entries(delta)) {
    const order = levelFields[field];
    merged[field] = order !== undefined
      ? mergeLevels(toLevels(current[field]), toLevels(value), order)
      : structuredClone(value);
  }
  return merged;
}
