import type { ViewIndex } from './types.js';

/**
 * Read-only copy of collected views
 *
 * Holds its own private map, so the collecting map and callers cannot change
 * what is stored. There is no `set`, `delete` or `clear` at run time either.
 */
export class ViewIndexSnapshot implements ViewIndex {
  readonly #views: Map<string, string>;

  constructor(views: Iterable<readonly [string, string]> = []) {
    this.#views = new Map(views);
    Object.freeze(this);
  }

  get size(): number {
    return this.#views.size;
  }

  get(key: string): string | undefined {
    return this.#views.get(key);
  }

  has(key: string): boolean {
    return this.#views.has(key);
  }

  forEach(callback: (value: string, key: string, map: ViewIndex) => void, thisArg?: unknown): void {
    this.#views.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  keys() {
    return this.#views.keys();
  }

  values() {
    return this.#views.values();
  }

  entries() {
    return this.#views.entries();
  }

  [Symbol.iterator]() {
    return this.#views[Symbol.iterator]();
  }
}
