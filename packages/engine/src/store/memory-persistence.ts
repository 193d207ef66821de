import { PersistenceError } from '../errors/mesh-error.js';
import type { Recipe } from '../types/recipe.js';
import type { RecordPersistence } from './persistence.js';

/**
 * In-memory persistence for tests and ephemeral nodes.
 */
export class MemoryPersistence implements RecordPersistence {
  readonly location = 'memory';

  private snapshot: Recipe[];
  private saveCount = 0;
  private pendingFailure: Error | null = null;

  constructor(initial: readonly Recipe[] = []) {
    this.snapshot = structuredClone([...initial]);
  }

  async load(): Promise<unknown[]> {
    return structuredClone(this.snapshot);
  }

  async save(records: readonly Recipe[]): Promise<void> {
    if (this.pendingFailure) {
      const cause = this.pendingFailure;
      this.pendingFailure = null;
      throw new PersistenceError('MESH_S300', `Failed to persist to ${this.location}`, undefined, cause);
    }
    this.snapshot = structuredClone([...records]);
    this.saveCount++;
  }

  /** Make the next save fail with the given cause */
  failNextSave(cause: Error = new Error('simulated write failure')): void {
    this.pendingFailure = cause;
  }

  /** Last successfully saved content */
  getSnapshot(): readonly Recipe[] {
    return this.snapshot;
  }

  /** Number of successful saves */
  getSaveCount(): number {
    return this.saveCount;
  }
}

/**
 * Create an in-memory persistence backend.
 */
export function createMemoryPersistence(initial?: readonly Recipe[]): MemoryPersistence {
  return new MemoryPersistence(initial);
}
