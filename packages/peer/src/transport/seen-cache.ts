/**
 * Insertion-ordered set with a fixed capacity; the oldest key is evicted first.
 */
export class SeenCache {
  private readonly keys = new Set<string>();

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw new Error('SeenCache capacity must be at least 1');
    }
  }

  get size(): number {
    return this.keys.size;
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  /**
   * Remember a key.
   * @returns false when the key was already known
   */
  add(key: string): boolean {
    if (this.keys.has(key)) return false;
    this.keys.add(key);
    if (this.keys.size > this.capacity) {
      const oldest = this.keys.values().next();
      if (!oldest.done) this.keys.delete(oldest.value);
    }
    return true;
  }
}
