/**
 * Minimal key-value mapping the ledger keeps its per-account state in.
 * A missing key means the default (zero) value for that mapping.
 */
export interface KeyValueStore<V> {
  get(key: string): V | undefined;
  set(key: string, value: V): void;
  delete(key: string): void;
  entries(): Iterable<[string, V]>;
}

export class MemoryStore<V> implements KeyValueStore<V> {
  private readonly data = new Map<string, V>();

  get(key: string): V | undefined {
    return this.data.get(key);
  }

  set(key: string, value: V): void {
    this.data.set(key, value);
  }

  delete(key: string): void {
    this.data.delete(key);
  }

  entries(): Iterable<[string, V]> {
    return this.data.entries();
  }
}
