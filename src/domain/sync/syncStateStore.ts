import type { Result } from "../result";
import type { StorageError } from "../errors";
import type { SyncCollection } from "../../types";

export interface SyncStateRecord {
  collection: SyncCollection;
  /** updatedAt of the last record in the last unbroken run of acknowledged pushes. */
  pushCursor: string | null;
  /** Remote server timestamp of the last pulled change. */
  pullCursor: string | null;
}

export interface SyncStateStore {
  getState(
    collection: SyncCollection,
  ): Promise<Result<SyncStateRecord, StorageError>>;
  setState(state: SyncStateRecord): Promise<Result<void, StorageError>>;
}
