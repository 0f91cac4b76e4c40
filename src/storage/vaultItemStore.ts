import type { LocalRecordStore } from "../domain/sync/recordStore";
import type { EncryptedVaultRecord } from "../types";
import { VAULT_ITEMS_TABLE, type LocalDb } from "./localDb";
import { createSqliteRecordStore, type TableCodec } from "./recordStore";

type VaultItemRow = EncryptedVaultRecord & { syncedAt: string | null };

// Rows hold ciphertext only. The title is encrypted too, so a conflict copy
// cannot be renamed without the key and keeps the original blob.
export const vaultItemCodec: TableCodec<EncryptedVaultRecord, VaultItemRow> = {
  table: VAULT_ITEMS_TABLE,
  columns: [
    "id",
    "titleEnc",
    "usernameEnc",
    "secretEnc",
    "urlEnc",
    "noteEnc",
    "updatedAt",
    "deletedAt",
  ],
  toRow: (item) => ({
    id: item.id,
    titleEnc: item.titleEnc,
    usernameEnc: item.usernameEnc,
    secretEnc: item.secretEnc,
    urlEnc: item.urlEnc,
    noteEnc: item.noteEnc,
    updatedAt: item.updatedAt,
    deletedAt: item.deletedAt,
  }),
  fromRow: (row) => ({
    id: row.id,
    titleEnc: row.titleEnc,
    usernameEnc: row.usernameEnc,
    secretEnc: row.secretEnc,
    urlEnc: row.urlEnc,
    noteEnc: row.noteEnc,
    updatedAt: row.updatedAt,
    deletedAt: row.deletedAt,
  }),
  conflictCopy: (item, id) => ({ ...item, id }),
};

export function createVaultItemStore(
  db: LocalDb,
): LocalRecordStore<EncryptedVaultRecord> {
  return createSqliteRecordStore(db, vaultItemCodec);
}
