/**
 * Small key-value store for key-wrapping parameters. `set` must replace the
 * previous value atomically: a reader sees either the old or the new value,
 * never a partial write.
 */
export interface SecureParamStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  remove(key: string): Promise<void>;
}
