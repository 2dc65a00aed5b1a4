/**
 * Typed key/value bag passed between build steps
 */

export interface StateBag<S extends object> {
  get<K extends keyof S>(key: K): S[K] | undefined;
  put<K extends keyof S>(key: K, value: S[K]): void;
  has(key: keyof S): boolean;
  remove(key: keyof S): void;
}

/**
 * Create a state bag, optionally seeded with entries
 */
export function createStateBag<S extends object>(initial: Partial<S> = {}): StateBag<S> {
  const entries: Partial<S> = { ...initial };

  return {
    get: (key) => entries[key],
    put: (key, value) => {
      entries[key] = value;
    },
    has: (key) => entries[key] !== undefined,
    remove: (key) => {
      delete entries[key];
    },
  };
}
