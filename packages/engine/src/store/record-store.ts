import { NotFoundError, PersistenceError, ValidationError, ensureMeshError } from '../errors/mesh-error.js';
import type { Logger } from '../observability/logger.js';
import { noopLogger } from '../observability/logger.js';
import {
  isOwnedBy,
  recipeDraftSchema,
  recipeSchema,
  recordKey,
  toFieldErrors,
  type Recipe,
  type RecipeDraft,
} from '../types/recipe.js';
import type { RecordPersistence } from './persistence.js';

/**
 * Options for opening a record store
 */
export interface RecordStoreOptions {
  /** Identity of the local node; records carrying it are owned */
  localId: string;
  /** Durable backing */
  persistence: RecordPersistence;
  logger?: Logger;
}

/**
 * The node's local copy of the shared dataset.
 *
 * Holds owned and received recipes in insertion order. Every mutation is
 * persisted before the call returns; if persisting fails the in-memory change
 * is rolled back so reads never show state the file does not have.
 *
 * Not safe for concurrent mutation: the sync engine is its only writer.
 *
 * @example
 * ```typescript
 * const store = await RecordStore.open({
 *   localId: 'peer-a',
 *   persistence: createFilePersistence('./recipes.json'),
 * });
 *
 * const soup = await store.create({ name: 'Soup', ingredients: 'water|salt' });
 * const added = await store.mergeReceived(remoteRecipes);
 * ```
 */
export class RecordStore {
  readonly localId: string;

  private readonly persistence: RecordPersistence;
  private readonly logger: Logger;
  private records: Recipe[];
  private readonly keys: Set<string>;
  private maxOwnedId: number;

  private constructor(options: RecordStoreOptions, records: Recipe[]) {
    this.localId = options.localId;
    this.persistence = options.persistence;
    this.logger = options.logger ?? noopLogger;
    this.records = records;
    this.keys = new Set(records.map(recordKey));
    this.maxOwnedId = records
      .filter((r) => isOwnedBy(r, this.localId))
      .reduce((max, r) => Math.max(max, r.id), 0);
  }

  /**
   * Load persisted records and open the store.
   *
   * @throws PersistenceError `MESH_S301` when the stored content cannot be read
   * or contains an entry that is not a valid record
   */
  static async open(options: RecordStoreOptions): Promise<RecordStore> {
    const logger = options.logger ?? noopLogger;
    let raw: unknown[];
    try {
      raw = await options.persistence.load();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(
        'MESH_S301',
        `Failed to load ${options.persistence.location}`,
        { location: options.persistence.location },
        ensureMeshError(error)
      );
    }

    const records: Recipe[] = [];
    const seen = new Set<string>();
    for (const [index, entry] of raw.entries()) {
      const parsed = recipeSchema.safeParse(entry);
      if (!parsed.success) {
        const issues = toFieldErrors(parsed.error, `[${index}]`);
        throw new PersistenceError(
          'MESH_S301',
          `Invalid record at index ${index} in ${options.persistence.location}`,
          { location: options.persistence.location, issues }
        );
      }
      const key = recordKey(parsed.data);
      if (seen.has(key)) {
        logger.warn('Dropping duplicate record from store file', { key });
        continue;
      }
      seen.add(key);
      records.push(parsed.data);
    }

    logger.info('Record store opened', {
      location: options.persistence.location,
      records: records.length,
    });
    return new RecordStore(options, records);
  }

  /** Number of records held, owned and received */
  get size(): number {
    return this.records.length;
  }

  /**
   * Create an owned record with the next id.
   *
   * @throws ValidationError when the name is empty or a field is too long
   * @throws PersistenceError when the store could not be written; the record
   * is not kept
   */
  async create(draft: RecipeDraft): Promise<Recipe> {
    const parsed = recipeDraftSchema.safeParse(draft);
    if (!parsed.success) {
      throw new ValidationError(toFieldErrors(parsed.error));
    }

    const record: Recipe = {
      id: this.maxOwnedId + 1,
      name: parsed.data.name,
      ingredients: parsed.data.ingredients,
      instructions: parsed.data.instructions,
      publisherId: this.localId,
      published: false,
    };

    const previous = this.records;
    this.records = [...previous, record];
    try {
      await this.persistence.save(this.records);
    } catch (error) {
      this.records = previous;
      throw this.toPersistenceError(error);
    }

    this.keys.add(recordKey(record));
    this.maxOwnedId = record.id;
    this.logger.debug('Record created', { id: record.id, name: record.name });
    return record;
  }

  /**
   * Iterate the records this node created.
   */
  *listLocal(): Generator<Recipe, void, undefined> {
    for (const record of this.records) {
      if (isOwnedBy(record, this.localId)) {
        yield record;
      }
    }
  }

  /**
   * Snapshot of every record, owned and received.
   */
  listAll(): readonly Recipe[] {
    return this.records;
  }

  /**
   * Look a record up by its mesh-wide identity.
   */
  get(publisherId: string, id: number): Recipe | undefined {
    if (!this.keys.has(recordKey({ publisherId, id }))) return undefined;
    return this.records.find((r) => r.publisherId === publisherId && r.id === id);
  }

  /**
   * Look an owned record up by id.
   *
   * @throws NotFoundError when no owned record has this id
   */
  getOwned(id: number): Recipe {
    const record = this.get(this.localId, id);
    if (!record) {
      throw new NotFoundError(id, this.localId);
    }
    return record;
  }

  /**
   * Append received records that are not yet known.
   *
   * Records are matched by `(publisherId, id)`; duplicates inside the batch
   * count once. Records that claim this node as publisher are skipped.
   *
   * @returns the number of records appended
   * @throws PersistenceError when the store could not be written; nothing is
   * appended
   */
  async mergeReceived(incoming: Iterable<Recipe>): Promise<number> {
    const added: Recipe[] = [];
    const batchKeys = new Set<string>();

    for (const record of incoming) {
      if (isOwnedBy(record, this.localId)) {
        this.logger.debug('Skipping received record claiming local ownership', { id: record.id });
        continue;
      }
      const key = recordKey(record);
      if (this.keys.has(key) || batchKeys.has(key)) continue;
      batchKeys.add(key);
      added.push(record);
    }

    if (added.length === 0) {
      return 0;
    }

    const previous = this.records;
    this.records = [...previous, ...added];
    try {
      await this.persistence.save(this.records);
    } catch (error) {
      this.records = previous;
      throw this.toPersistenceError(error);
    }

    for (const key of batchKeys) {
      this.keys.add(key);
    }
    this.logger.debug('Merged received records', { added: added.length });
    return added.length;
  }

  /**
   * Flag owned records as broadcast.
   *
   * @returns the records, with the flag set, in the order given
   * @throws NotFoundError when an id is not an owned record; nothing changes
   */
  async markPublished(ids: readonly number[]): Promise<Recipe[]> {
    const targets = ids.map((id) => this.getOwned(id));
    const pending = new Set(targets.filter((r) => !r.published).map(recordKey));

    if (pending.size > 0) {
      const previous = this.records;
      this.records = previous.map((r) => (pending.has(recordKey(r)) ? { ...r, published: true } : r));
      try {
        await this.persistence.save(this.records);
      } catch (error) {
        this.records = previous;
        throw this.toPersistenceError(error);
      }
    }

    return ids.map((id) => this.getOwned(id));
  }

  /**
   * Write the current content again.
   */
  async flush(): Promise<void> {
    try {
      await this.persistence.save(this.records);
    } catch (error) {
      throw this.toPersistenceError(error);
    }
  }

  private toPersistenceError(error: unknown): PersistenceError {
    if (error instanceof PersistenceError) return error;
    return new PersistenceError(
      'MESH_S300',
      `Failed to persist to ${this.persistence.location}`,
      { location: this.persistence.location },
      ensureMeshError(error)
    );
  }
}
