export interface CacheStore {
  get(key: string): Promise<string | undefined>;
  /** Last write wins. */
  put(key: string, value: string): Promise<void>;
  delete(key: string): Promise<boolean>;
}
