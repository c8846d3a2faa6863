/**
 * In-memory Field Store
 *
 * Attached-property storage for hosts (and tests) that keep properties in
 * process. Values are copied on the way in, as a host property store would.
 */

import type { FieldStore, StoredValue } from '../interfaces';

export class MemoryFieldStore implements FieldStore {
  private values: Map<string, StoredValue> = new Map();

  constructor(initial: Record<string, StoredValue> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.set(key, value);
    }
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  set(key: string, value: StoredValue): void {
    this.values.set(key, structuredClone(value));
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  delete(key: string): void {
    this.values.delete(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }
}
