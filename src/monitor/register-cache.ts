// src/monitor/register-cache.ts

import { valuesEqual } from '../payload/register-value.js';
import type { ChangeSet, RegisterMap, RegisterValue } from '../types/nbe-types.js';

/**
 * Last value seen for every register of one category.
 */
export class RegisterCache {
  private readonly values: RegisterMap = new Map();

  /**
   * Returns the entries of `incoming` that differ from the cache, in the
   * order they were received, and stores them.
   */
  apply(incoming: Iterable<[string, RegisterValue]>): ChangeSet {
    const changes: ChangeSet = new Map();
    for (const [key, value] of incoming) {
      if (valuesEqual(this.values.get(key), value)) continue;
      changes.set(key, value);
      this.values.set(key, value);
    }
    return changes;
  }

  get(key: string): RegisterValue | undefined {
    return this.values.get(key);
  }

  get size(): number {
    return this.values.size;
  }

  entries(): IterableIterator<[string, RegisterValue]> {
    return this.values.entries();
  }

  clear(): void {
    this.values.clear();
  }
}
