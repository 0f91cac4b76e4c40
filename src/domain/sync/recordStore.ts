import type { StorageError } from "../errors";
import type { Result } from "../result";

/**
 * - "applied": incoming version written
 * - "kept-local": local is newer and stays dirty
 * - "unchanged": same version already stored
 * - "conflict": equal timestamps, different content; incoming saved as a copy
 * - "skipped": import only, incoming not newer
 */
export type MergeOutcome =
  | "applied"
  | "kept-local"
  | "unchanged"
  | "conflict"
  | "skipped";

/** "remote" writes arrive acknowledged; "import" writes still need a push. */
export type MergeSource = "remote" | "import";

export interface LocalRecordStore<R extends { id: string; updatedAt: string }> {
  get(id: string): Promise<Result<R | null, StorageError>>;
  /** Non-deleted records, newest first. */
  listActive(): Promise<Result<R[], StorageError>>;
  /** Local write. The record becomes dirty. */
  put(record: R): Promise<Result<void, StorageError>>;
  /** LWW merge of a version that did not originate here. */
  merge(record: R, source: MergeSource): Promise<Result<MergeOutcome, StorageError>>;
  /** False when the row changed after it was read for pushing. */
  markSynced(id: string, updatedAt: string): Promise<Result<boolean, StorageError>>;
  markDirty(id: string): Promise<Result<void, StorageError>>;
  /** Oldest first. */
  listDirty(): Promise<Result<R[], StorageError>>;
  countDirty(): Promise<Result<number, StorageError>>;
}
