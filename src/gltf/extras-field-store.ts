/**
 * Extras Field Store
 *
 * Uses the `extras` of a glTF scene or node as the attached-property
 * store, so injected metadata travels with the exported file.
 */

import type { Property } from '@gltf-transform/core';
import type { FieldStore, StoredValue } from '../interfaces';

export class ExtrasFieldStore implements FieldStore {
  private property: Property;

  constructor(property: Property) {
    this.property = property;
  }

  get(key: string): unknown {
    return this.property.getExtras()[key];
  }

  set(key: string, value: StoredValue): void {
    this.property.setExtras({ ...this.property.getExtras(), [key]: structuredClone(value) });
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.property.getExtras(), key);
  }

  delete(key: string): void {
    const { [key]: _removed, ...rest } = this.property.getExtras();
    this.property.setExtras(rest);
  }

  keys(): string[] {
    return Object.keys(this.property.getExtras());
  }
}
