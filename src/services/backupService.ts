import { z } from "zod";
import type {
  BackupError,
  CryptoError,
  StorageError,
  VaultError,
} from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import type { Clock } from "../domain/runtime/clock";
import type { LocalRecordStore, MergeOutcome } from "../domain/sync/recordStore";
import type { EncryptedVaultRecord, Note } from "../types";
import { decryptString, encryptString } from "../storage/aeadCipher";
import {
  encryptedVaultRecordSchema,
  noteSchema,
  timestampSchema,
} from "../storage/recordSchemas";
import { runtimeClock } from "../storage/runtimeAdapters";
import type { VaultSession } from "./vaultSession";

export const BACKUP_VERSION = 1 as const;

export type BackupKind = "notes" | "vault" | "all";

const backupHeaderSchema = z.object({
  type: z.string(),
  version: z.number(),
});

const backupSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("notes"),
    version: z.literal(BACKUP_VERSION),
    exportedAt: timestampSchema,
    data: z.array(noteSchema),
  }),
  z.object({
    type: z.literal("vault"),
    version: z.literal(BACKUP_VERSION),
    exportedAt: timestampSchema,
    data: z.array(encryptedVaultRecordSchema),
  }),
  z.object({
    type: z.literal("all"),
    version: z.literal(BACKUP_VERSION),
    exportedAt: timestampSchema,
    notes: z.array(noteSchema),
    vault: z.array(encryptedVaultRecordSchema),
  }),
]);

type BackupPayload = z.infer<typeof backupSchema>;

export interface ImportSummary {
  notesImported: number;
  notesSkipped: number;
  vaultItemsImported: number;
  vaultItemsSkipped: number;
}

export type BackupServiceError =
  | BackupError
  | VaultError
  | StorageError
  | CryptoError;

export interface BackupService {
  /**
   * The whole document is sealed with the data key. Vault items inside it
   * keep their per-field encryption. Deleted records are left out.
   */
  exportBackup(kind: BackupKind): Promise<Result<string, BackupServiceError>>;
  /** Newer-wins per record; imported rows are pushed on the next pass. */
  importBackup(blob: string): Promise<Result<ImportSummary, BackupServiceError>>;
}

export interface BackupServiceDeps {
  session: VaultSession;
  notes: LocalRecordStore<Note>;
  vaultItems: LocalRecordStore<EncryptedVaultRecord>;
  clock?: Clock;
  onLocalWrite?: () => void;
}

const KNOWN_KINDS: readonly string[] = ["notes", "vault", "all"];

function parseBackup(json: string): Result<BackupPayload, BackupError> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return err({ type: "Corrupt", message: "Backup is not valid JSON." });
  }
  const header = backupHeaderSchema.safeParse(raw);
  if (!header.success) {
    return err({ type: "Corrupt", message: "Backup header is missing." });
  }
  if (
    header.data.version !== BACKUP_VERSION ||
    !KNOWN_KINDS.includes(header.data.type)
  ) {
    return err({
      type: "Unsupported",
      message: `Unsupported backup ${header.data.type} v${header.data.version}.`,
    });
  }
  const parsed = backupSchema.safeParse(raw);
  if (!parsed.success) {
    return err({ type: "Corrupt", message: "Backup contents are malformed." });
  }
  return ok(parsed.data);
}

async function mergeAll<R extends { id: string; updatedAt: string }>(
  store: LocalRecordStore<R>,
  records: R[],
): Promise<Result<{ imported: number; skipped: number }, StorageError>> {
  const counts = { imported: 0, skipped: 0 };
  for (const record of records) {
    const merged: Result<MergeOutcome, StorageError> = await store.merge(
      record,
      "import",
    );
    if (!merged.ok) return merged;
    if (merged.value === "applied") {
      counts.imported += 1;
    } else {
      counts.skipped += 1;
    }
  }
  return ok(counts);
}

export function createBackupService({
  session,
  notes,
  vaultItems,
  clock = runtimeClock,
  onLocalWrite,
}: BackupServiceDeps): BackupService {
  const collect = async (
    kind: BackupKind,
  ): Promise<Result<BackupPayload, StorageError>> => {
    const exportedAt = clock.now().toISOString();
    if (kind === "notes") {
      const data = await notes.listActive();
      if (!data.ok) return data;
      return ok({ type: kind, version: BACKUP_VERSION, exportedAt, data: data.value });
    }
    if (kind === "vault") {
      const data = await vaultItems.listActive();
      if (!data.ok) return data;
      return ok({ type: kind, version: BACKUP_VERSION, exportedAt, data: data.value });
    }
    const [noteRows, vaultRows] = await Promise.all([
      notes.listActive(),
      vaultItems.listActive(),
    ]);
    if (!noteRows.ok) return noteRows;
    if (!vaultRows.ok) return vaultRows;
    return ok({
      type: kind,
      version: BACKUP_VERSION,
      exportedAt,
      notes: noteRows.value,
      vault: vaultRows.value,
    });
  };

  return {
    exportBackup(kind) {
      return session.withKey(
        async (key): Promise<Result<string, BackupServiceError>> => {
          const payload = await collect(kind);
          if (!payload.ok) return payload;
          return encryptString(key, JSON.stringify(payload.value));
        },
      );
    },

    importBackup(blob) {
      return session.withKey(
        async (key): Promise<Result<ImportSummary, BackupServiceError>> => {
          const decrypted = await decryptString(key, blob.trim());
          if (!decrypted.ok) {
            return err({
              type: "DecryptFailed",
              message: "Backup could not be decrypted with this vault's key.",
            });
          }
          const payload = parseBackup(decrypted.value);
          if (!payload.ok) return payload;

          const noteRecords =
            payload.value.type === "notes"
              ? payload.value.data
              : payload.value.type === "all"
                ? payload.value.notes
                : [];
          const vaultRecords =
            payload.value.type === "vault"
              ? payload.value.data
              : payload.value.type === "all"
                ? payload.value.vault
                : [];

          const noteCounts = await mergeAll(notes, noteRecords);
          if (!noteCounts.ok) return noteCounts;
          const vaultCounts = await mergeAll(vaultItems, vaultRecords);
          if (!vaultCounts.ok) return vaultCounts;

          const summary: ImportSummary = {
            notesImported: noteCounts.value.imported,
            notesSkipped: noteCounts.value.skipped,
            vaultItemsImported: vaultCounts.value.imported,
            vaultItemsSkipped: vaultCounts.value.skipped,
          };
          if (summary.notesImported + summary.vaultItemsImported > 0) {
            onLocalWrite?.();
          }
          console.info(
            `Backup: imported ${summary.notesImported} note(s), ${summary.vaultItemsImported} vault item(s)`,
          );
          return ok(summary);
        },
      );
    },
  };
}
