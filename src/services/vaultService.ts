import { err, ok, type Result } from "../domain/result";
import type { StorageError } from "../domain/errors";
import { vaultLocked } from "../domain/errors";
import type { Clock } from "../domain/runtime/clock";
import type { LocalRecordStore } from "../domain/sync/recordStore";
import type {
  VaultItemList,
  VaultItemPatch,
  VaultService,
  VaultServiceError,
} from "../domain/vault/vaultService";
import {
  VaultState,
  type EncryptedVaultRecord,
  type VaultRecord,
} from "../types";
import { randomId } from "../storage/cryptoUtils";
import { decryptVaultRecord, encryptVaultRecord } from "../storage/fieldCipher";
import { createMonotonicClock } from "../storage/runtimeAdapters";
import type { VaultSession } from "./vaultSession";

export interface VaultServiceDeps {
  session: VaultSession;
  store: LocalRecordStore<EncryptedVaultRecord>;
  clock?: Clock;
  /** Called after every successful local write, e.g. to request a sync. */
  onLocalWrite?: () => void;
}

const notFound = (id: string): StorageError => ({
  type: "NotFound",
  message: `Vault item ${id} not found.`,
});

function pick<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

function applyPatch(record: VaultRecord, patch: VaultItemPatch): VaultRecord {
  return {
    ...record,
    title: pick(patch.title, record.title),
    username: pick(patch.username, record.username),
    secret: pick(patch.secret, record.secret),
    url: pick(patch.url, record.url),
    note: pick(patch.note, record.note),
  };
}

export function createVaultService({
  session,
  store,
  clock = createMonotonicClock(),
  onLocalWrite,
}: VaultServiceDeps): VaultService {
  const now = () => clock.now().toISOString();

  const save = async (
    record: VaultRecord,
    key: Uint8Array,
  ): Promise<Result<VaultRecord, VaultServiceError>> => {
    const encrypted = await encryptVaultRecord(record, key);
    if (!encrypted.ok) return encrypted;
    const stored = await store.put(encrypted.value);
    if (!stored.ok) return stored;
    onLocalWrite?.();
    return ok(record);
  };

  const loadActive = async (
    id: string,
  ): Promise<Result<EncryptedVaultRecord, StorageError>> => {
    const existing = await store.get(id);
    if (!existing.ok) return existing;
    if (!existing.value || existing.value.deletedAt !== null) {
      return err(notFound(id));
    }
    return ok(existing.value);
  };

  const listDecrypted = async (
    key: Uint8Array,
  ): Promise<Result<VaultItemList, VaultServiceError>> => {
    const rows = await store.listActive();
    if (!rows.ok) return rows;
    const list: VaultItemList = { items: [], undecryptable: [] };
    for (const row of rows.value) {
      const decrypted = await decryptVaultRecord(row, key);
      if (decrypted.ok) {
        list.items.push(decrypted.value);
      } else {
        list.undecryptable.push(row.id);
      }
    }
    if (list.undecryptable.length > 0) {
      console.warn(
        `VaultService: ${list.undecryptable.length} item(s) could not be decrypted`,
      );
    }
    return ok(list);
  };

  return {
    createItem(input) {
      return session.withKey((key) =>
        save(
          {
            id: randomId(),
            title: input.title,
            username: input.username ?? null,
            secret: input.secret ?? null,
            url: input.url ?? null,
            note: input.note ?? null,
            updatedAt: now(),
            deletedAt: null,
          },
          key,
        ),
      );
    },

    updateItem(id, patch) {
      return session.withKey(
        async (key): Promise<Result<VaultRecord, VaultServiceError>> => {
          const existing = await loadActive(id);
          if (!existing.ok) return existing;
          const current = await decryptVaultRecord(existing.value, key);
          if (!current.ok) return current;
          return save(
            { ...applyPatch(current.value, patch), updatedAt: now() },
            key,
          );
        },
      );
    },

    async deleteItem(id) {
      if (session.getState() !== VaultState.Unlocked) {
        return err(vaultLocked());
      }
      const existing = await loadActive(id);
      if (!existing.ok) return existing;
      const timestamp = now();
      const stored = await store.put({
        ...existing.value,
        updatedAt: timestamp,
        deletedAt: timestamp,
      });
      if (!stored.ok) return stored;
      onLocalWrite?.();
      return ok(undefined);
    },

    getItem(id) {
      return session.withKey(
        async (key): Promise<Result<VaultRecord | null, VaultServiceError>> => {
          const existing = await store.get(id);
          if (!existing.ok) return existing;
          if (!existing.value || existing.value.deletedAt !== null) {
            return ok(null);
          }
          return decryptVaultRecord(existing.value, key);
        },
      );
    },

    listItems() {
      return session.withKey(listDecrypted);
    },

    searchItems(keyword) {
      const needle = keyword.trim().toLowerCase();
      return session.withKey(
        async (key): Promise<Result<VaultRecord[], VaultServiceError>> => {
          const listed = await listDecrypted(key);
          if (!listed.ok) return listed;
          if (!needle) return ok(listed.value.items);
          return ok(
            listed.value.items.filter((item) =>
              item.title.toLowerCase().includes(needle),
            ),
          );
        },
      );
    },
  };
}
