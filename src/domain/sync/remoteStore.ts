import type { SyncError } from "../errors";
import type { Result } from "../result";
import type { SyncCollection, SyncRecordMap } from "../../types";

export type RemoteChange = {
  [C in SyncCollection]: {
    collection: C;
    record: SyncRecordMap[C];
    serverUpdatedAt: string;
  };
}[SyncCollection];

export interface RemotePage {
  changes: RemoteChange[];
  /** Pass back to the next pullSince; unchanged when nothing new arrived. */
  cursor: string | null;
}

/**
 * Receives only what is already safe to store off-device: vault items in
 * their field-encrypted form and plain notes.
 */
export interface RemoteStore {
  push<C extends SyncCollection>(
    userId: string,
    collection: C,
    record: SyncRecordMap[C],
  ): Promise<Result<void, SyncError>>;
  pullSince(
    userId: string,
    collection: SyncCollection,
    cursor: string | null,
  ): Promise<Result<RemotePage, SyncError>>;
  subscribe(userId: string, onChange: (change: RemoteChange) => void): () => void;
}
