/**
 * Immutable, ordered package collection with a name index
 */
import type { PackageIdentity } from '../types';
import { comparePackages, formatPackage } from './identity';

export class Catalog<T extends PackageIdentity> implements Iterable<T> {
  readonly entries: readonly T[];
  private readonly index: ReadonlyMap<string, readonly T[]>;

  constructor(entries: Iterable<T>) {
    const list = [...entries];
    for (const entry of list) Object.freeze(entry);
    this.entries = Object.freeze(list);

    const index = new Map<string, T[]>();
    for (const entry of this.entries) {
      const bucket = index.get(entry.name);
      if (bucket) {
        bucket.push(entry);
      } else {
        index.set(entry.name, [entry]);
      }
    }
    this.index = index;
  }

  get size(): number {
    return this.entries.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.entries[Symbol.iterator]();
  }

  /**
   * Entries carrying this exact name, in catalog order
   */
  byName(name: string): T[] {
    return [...(this.index.get(name) ?? [])];
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  /**
   * Distinct names, in the order they were first seen
   */
  names(): string[] {
    return [...this.index.keys()];
  }

  sorted(): T[] {
    return [...this.entries].sort(comparePackages);
  }

  toString(): string {
    return this.entries.map(formatPackage).join('\n');
  }
}
