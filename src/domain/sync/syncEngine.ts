import { toSyncError, type StorageError, type SyncError } from "../errors";
import { err, ok, type Result } from "../result";
import {
  SyncCollection,
  SyncStatus,
  type SyncRecordMap,
} from "../../types";
import { compareTimestamps } from "./lww";
import type { PendingOpsSource, PendingOpsSummary } from "./pendingOpsSource";
import type { LocalRecordStore, MergeOutcome } from "./recordStore";
import type { RemoteChange, RemoteStore } from "./remoteStore";
import type { SyncStateStore } from "./syncStateStore";

export type RecordStores = {
  [C in SyncCollection]: LocalRecordStore<SyncRecordMap[C]>;
};

export type SyncStatusListener = (status: SyncStatus) => void;

export type PushError = SyncError & {
  /** Records the remote acknowledged before the pass reported failure. */
  pushed: number;
};

export interface SyncEngine extends PendingOpsSource {
  /**
   * Pushes every dirty record, oldest first. A record that fails is logged
   * and skipped; the pass still returns an error afterwards so the caller
   * knows work is left, carrying the count that did go through.
   */
  pushLocal(userId: string): Promise<Result<number, PushError>>;
  applyRemote<C extends SyncCollection>(
    collection: C,
    record: SyncRecordMap[C],
  ): Promise<Result<MergeOutcome, StorageError>>;
  pullRemote(userId: string): Promise<Result<number, SyncError>>;
  startRealtime(userId: string): void;
  stopRealtime(): void;
  getStatus(): SyncStatus;
  onStatusChange(listener: SyncStatusListener): () => void;
}

export interface SyncEngineDeps {
  stores: RecordStores;
  syncState: SyncStateStore;
  remote: RemoteStore;
}

const COLLECTIONS: readonly SyncCollection[] = [
  SyncCollection.Notes,
  SyncCollection.VaultItems,
];

function fromStorageError(error: StorageError): SyncError {
  return { type: "Unknown", message: `Local store: ${error.message}` };
}

function statusForError(error: SyncError): SyncStatus {
  return error.type === "Offline" || error.type === "Network"
    ? SyncStatus.Offline
    : SyncStatus.Error;
}

function laterOf(a: string | null, b: string): string {
  if (a === null) return b;
  return compareTimestamps(b, a) > 0 ? b : a;
}

interface PushTally {
  pushed: number;
  failed: number;
  firstError: SyncError | null;
}

export function createSyncEngine({
  stores,
  syncState,
  remote,
}: SyncEngineDeps): SyncEngine {
  let status: SyncStatus = SyncStatus.Idle;
  const listeners = new Set<SyncStatusListener>();
  const inFlight = new Map<string, Promise<Result<number, PushError>>>();
  let unsubscribeRealtime: (() => void) | null = null;

  const setStatus = (next: SyncStatus) => {
    if (status === next) return;
    status = next;
    listeners.forEach((listener) => listener(next));
  };

  const pushRecord = async <C extends SyncCollection>(
    userId: string,
    collection: C,
    record: SyncRecordMap[C],
  ): Promise<Result<void, SyncError>> => {
    try {
      return await remote.push(userId, collection, record);
    } catch (error) {
      return err(toSyncError(error, "Unknown"));
    }
  };

  const pushCollection = async <C extends SyncCollection>(
    userId: string,
    collection: C,
    tally: PushTally,
  ): Promise<Result<void, SyncError>> => {
    const store: LocalRecordStore<SyncRecordMap[C]> = stores[collection];
    const dirty = await store.listDirty();
    if (!dirty.ok) return err(fromStorageError(dirty.error));
    const state = await syncState.getState(collection);
    if (!state.ok) return err(fromStorageError(state.error));

    let pushed = 0;
    let cursor = state.value.pushCursor;
    let prefixIntact = true;

    for (const record of dirty.value) {
      const result = await pushRecord(userId, collection, record);
      if (!result.ok) {
        console.error(
          `Sync: failed to push ${collection}/${record.id}:`,
          result.error,
        );
        tally.failed += 1;
        if (!tally.firstError) tally.firstError = result.error;
        prefixIntact = false;
        continue;
      }
      pushed += 1;
      tally.pushed += 1;
      const marked = await store.markSynced(record.id, record.updatedAt);
      if (!marked.ok) {
        console.error(
          `Sync: pushed ${collection}/${record.id} but could not record it:`,
          marked.error,
        );
      }
      if (prefixIntact) {
        cursor = laterOf(cursor, record.updatedAt);
      }
    }

    if (cursor !== state.value.pushCursor) {
      const saved = await syncState.setState({ ...state.value, pushCursor: cursor });
      if (!saved.ok) return err(fromStorageError(saved.error));
    }
    if (pushed > 0) {
      console.info(`Sync: pushed ${pushed} ${collection}`);
    }
    return ok(undefined);
  };

  const fail = (error: SyncError, pushed: number): Result<number, PushError> => {
    setStatus(statusForError(error));
    return err({ ...error, pushed });
  };

  const runPush = async (userId: string): Promise<Result<number, PushError>> => {
    setStatus(SyncStatus.Syncing);
    const tally: PushTally = { pushed: 0, failed: 0, firstError: null };
    try {
      for (const collection of COLLECTIONS) {
        const result = await pushCollection(userId, collection, tally);
        if (!result.ok) return fail(result.error, tally.pushed);
      }
    } catch (error) {
      console.error("Sync: push pass aborted:", error);
      return fail(toSyncError(error, "Unknown"), tally.pushed);
    }

    if (tally.firstError) {
      return fail(
        {
          ...tally.firstError,
          message: `${tally.failed} record(s) failed to push: ${tally.firstError.message}`,
        },
        tally.pushed,
      );
    }
    setStatus(SyncStatus.Synced);
    return ok(tally.pushed);
  };

  const applyRemote = async <C extends SyncCollection>(
    collection: C,
    record: SyncRecordMap[C],
  ): Promise<Result<MergeOutcome, StorageError>> => {
    const store: LocalRecordStore<SyncRecordMap[C]> = stores[collection];
    const merged = await store.merge(record, "remote");
    if (merged.ok && merged.value === "conflict") {
      console.warn(
        `Sync: ${collection}/${record.id} changed on two devices at the same instant; kept both`,
      );
    }
    return merged;
  };

  const applyChange = (change: RemoteChange) =>
    change.collection === SyncCollection.Notes
      ? applyRemote(SyncCollection.Notes, change.record)
      : applyRemote(SyncCollection.VaultItems, change.record);

  const pullCollection = async (
    userId: string,
    collection: SyncCollection,
  ): Promise<Result<number, SyncError>> => {
    const state = await syncState.getState(collection);
    if (!state.ok) return err(fromStorageError(state.error));
    const page = await remote.pullSince(
      userId,
      collection,
      state.value.pullCursor,
    );
    if (!page.ok) return page;

    let applied = 0;
    for (const change of page.value.changes) {
      const merged = await applyChange(change);
      if (!merged.ok) return err(fromStorageError(merged.error));
      if (merged.value === "applied" || merged.value === "conflict") {
        applied += 1;
      }
    }
    if (page.value.cursor !== state.value.pullCursor) {
      const saved = await syncState.setState({
        ...state.value,
        pullCursor: page.value.cursor,
      });
      if (!saved.ok) return err(fromStorageError(saved.error));
    }
    return ok(applied);
  };

  const getSummary = async (): Promise<PendingOpsSummary> => {
    const [notes, vaultItems] = await Promise.all([
      stores.notes.countDirty(),
      stores.vault_items.countDirty(),
    ]);
    const summary = {
      notes: notes.ok ? notes.value : 0,
      vaultItems: vaultItems.ok ? vaultItems.value : 0,
    };
    if (!notes.ok || !vaultItems.ok) {
      console.error("Sync: could not count pending records");
    }
    return { ...summary, total: summary.notes + summary.vaultItems };
  };

  const stopRealtime = () => {
    unsubscribeRealtime?.();
    unsubscribeRealtime = null;
  };

  return {
    pushLocal(userId) {
      const existing = inFlight.get(userId);
      if (existing) return existing;
      const pass = runPush(userId).finally(() => {
        inFlight.delete(userId);
      });
      inFlight.set(userId, pass);
      return pass;
    },

    applyRemote,

    async pullRemote(userId) {
      let applied = 0;
      for (const collection of COLLECTIONS) {
        const result = await pullCollection(userId, collection);
        if (!result.ok) {
          console.error(`Sync: pull of ${collection} failed:`, result.error);
          return result;
        }
        applied += result.value;
      }
      if (applied > 0) {
        console.info(`Sync: applied ${applied} remote change(s)`);
      }
      return ok(applied);
    },

    startRealtime(userId) {
      stopRealtime();
      unsubscribeRealtime = remote.subscribe(userId, (change) => {
        applyChange(change)
          .then((result) => {
            if (!result.ok) {
              console.error("Sync: failed to apply realtime change:", result.error);
            }
          })
          .catch((error: unknown) => {
            console.error("Sync: failed to apply realtime change:", error);
          });
      });
    },

    stopRealtime,

    getStatus: () => status,

    onStatusChange(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    getSummary,

    async hasPending() {
      const summary = await getSummary();
      return summary.total > 0;
    },
  };
}
