/**
 * Short-lived key/value storage for in-flight login attempts
 */
export interface IStateStore<T> {
  /**
   * Store a value until `ttlSeconds` elapse
   */
  put(key: string, value: T, ttlSeconds: number): Promise<void>;

  /**
   * Get a value, or null when absent or expired
   */
  get(key: string): Promise<T | null>;

  /**
   * Read and remove a value in one step; of concurrent callers at most one
   * receives it
   */
  take(key: string): Promise<T | null>;
}
