import type {
  SyncStateRecord,
  SyncStateStore,
} from "../domain/sync/syncStateStore";
import type { SyncCollection } from "../types";
import { safeDbSync } from "./dbSafe";
import { SYNC_STATE_TABLE, type LocalDb } from "./localDb";

interface SyncStateRow {
  pushCursor: string | null;
  pullCursor: string | null;
}

export function createSyncStateStore(db: LocalDb): SyncStateStore {
  const select = db.prepare<[string], SyncStateRow>(
    `SELECT pushCursor, pullCursor FROM ${SYNC_STATE_TABLE} WHERE collection = ?`,
  );
  const upsert = db.prepare<[string, string | null, string | null]>(
    `INSERT INTO ${SYNC_STATE_TABLE} (collection, pushCursor, pullCursor)
     VALUES (?, ?, ?)
     ON CONFLICT(collection) DO UPDATE SET
       pushCursor = excluded.pushCursor,
       pullCursor = excluded.pullCursor`,
  );

  return {
    async getState(collection: SyncCollection) {
      return safeDbSync((): SyncStateRecord => {
        const row = select.get(collection);
        return {
          collection,
          pushCursor: row?.pushCursor ?? null,
          pullCursor: row?.pullCursor ?? null,
        };
      });
    },
    async setState(state) {
      return safeDbSync(() => {
        upsert.run(state.collection, state.pushCursor, state.pullCursor);
      });
    },
  };
}
