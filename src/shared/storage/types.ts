/**
 * Key/value storage contract used by the state manager
 */
export interface KeyValueStore {
  /** Read a raw value, or null when the key does not exist */
  get(key: string): Promise<string | null>;

  put(key: string, value: string): Promise<void>;

  delete(key: string): Promise<void>;

  /** List keys starting with the given prefix, sorted */
  list(prefix?: string): Promise<string[]>;

  close(): void;
}
