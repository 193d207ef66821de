import type { Recipe } from '../types/recipe.js';

/**
 * Durable backing for a RecordStore.
 *
 * `load` returns raw, unvalidated entries; the store validates them.
 * `save` must replace the whole content atomically: after a failed save the
 * previously saved content is still what `load` returns.
 */
export interface RecordPersistence {
  /** Human-readable location, used in logs and errors */
  readonly location: string;
  load(): Promise<unknown[]>;
  save(records: readonly Recipe[]): Promise<void>;
}
