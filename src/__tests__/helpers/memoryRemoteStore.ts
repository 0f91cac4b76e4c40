import type { SyncError } from "../../domain/errors";
import { err, ok } from "../../domain/result";
import type { RemoteChange, RemoteStore } from "../../domain/sync/remoteStore";
import type { SyncCollection, SyncRecord, SyncRecordMap } from "../../types";

interface StoredRow {
  userId: string;
  change: RemoteChange;
}

export interface PushLogEntry {
  userId: string;
  collection: SyncCollection;
  id: string;
  updatedAt: string;
}

/**
 * In-process stand-in for the remote table. Pushes do not echo back to
 * subscribers; `seed` plays the part of a write from another device.
 */
export interface MemoryRemoteStore extends RemoteStore {
  pushes: PushLogEntry[];
  failWith: SyncError | null;
  failIds: Set<string>;
  seed<C extends SyncCollection>(
    userId: string,
    collection: C,
    record: SyncRecordMap[C],
  ): void;
  rowsFor(userId: string): RemoteChange[];
  subscriberCount(): number;
}

function toChange(record: SyncRecord, serverUpdatedAt: string): RemoteChange {
  return "titleEnc" in record
    ? { collection: "vault_items", record: structuredClone(record), serverUpdatedAt }
    : { collection: "notes", record: structuredClone(record), serverUpdatedAt };
}

export function createMemoryRemoteStore(): MemoryRemoteStore {
  const rows = new Map<string, StoredRow>();
  const subscribers = new Map<number, { userId: string; onChange: (change: RemoteChange) => void }>();
  let serverSeq = 0;
  let subscriberSeq = 0;

  const nextServerTime = () => {
    serverSeq += 1;
    return new Date(Date.UTC(2030, 0, 1) + serverSeq * 1000).toISOString();
  };

  const write = (userId: string, change: RemoteChange) => {
    rows.set(`${userId}/${change.collection}/${change.record.id}`, {
      userId,
      change,
    });
  };

  const store: MemoryRemoteStore = {
    pushes: [],
    failWith: null,
    failIds: new Set(),

    async push(userId, collection, record) {
      if (store.failWith) return err(store.failWith);
      if (store.failIds.has(record.id)) {
        return err({ type: "RemoteRejected", message: `rejected ${record.id}` });
      }
      write(userId, toChange(record, nextServerTime()));
      store.pushes.push({
        userId,
        collection,
        id: record.id,
        updatedAt: record.updatedAt,
      });
      return ok(undefined);
    },

    async pullSince(userId, collection, cursor) {
      if (store.failWith) return err(store.failWith);
      const changes = Array.from(rows.values())
        .filter(
          (row) =>
            row.userId === userId &&
            row.change.collection === collection &&
            (cursor === null || row.change.serverUpdatedAt > cursor),
        )
        .map((row) => row.change)
        .sort((a, b) => (a.serverUpdatedAt < b.serverUpdatedAt ? -1 : 1));
      const last = changes[changes.length - 1];
      return ok({ changes, cursor: last ? last.serverUpdatedAt : cursor });
    },

    subscribe(userId, onChange) {
      subscriberSeq += 1;
      const id = subscriberSeq;
      subscribers.set(id, { userId, onChange });
      return () => {
        subscribers.delete(id);
      };
    },

    seed(userId, _collection, record) {
      const change = toChange(record, nextServerTime());
      write(userId, change);
      subscribers.forEach((subscriber) => {
        if (subscriber.userId === userId) subscriber.onChange(change);
      });
    },

    rowsFor(userId) {
      return Array.from(rows.values())
        .filter((row) => row.userId === userId)
        .map((row) => row.change);
    },

    subscriberCount: () => subscribers.size,
  };
  return store;
}
