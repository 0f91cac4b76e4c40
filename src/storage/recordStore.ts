import type { StorageError } from "../domain/errors";
import type { Result } from "../domain/result";
import { resolveLww } from "../domain/sync/lww";
import type {
  LocalRecordStore,
  MergeOutcome,
  MergeSource,
} from "../domain/sync/recordStore";
import { safeDbSync } from "./dbSafe";
import type { LocalDb } from "./localDb";
import { randomId } from "./cryptoUtils";

export type RowValues = Record<string, string | null>;

export interface TableCodec<R, Row> {
  table: string;
  /** Every persisted column except syncedAt; "id" first. */
  columns: readonly string[];
  toRow(record: R): RowValues;
  fromRow(row: Row): R;
  /** Copy kept when an equal-timestamp remote version loses to local. */
  conflictCopy(record: R, id: string): R;
}

export function createSqliteRecordStore<
  R extends { id: string; updatedAt: string },
  Row extends { syncedAt: string | null },
>(db: LocalDb, codec: TableCodec<R, Row>): LocalRecordStore<R> {
  const { table, columns } = codec;
  const names = columns.join(", ");
  const params = columns.map((column) => `@${column}`).join(", ");
  const updates = columns
    .filter((column) => column !== "id")
    .map((column) => `${column} = excluded.${column}`)
    .join(", ");

  const selectById = db.prepare<[string], Row>(
    `SELECT * FROM ${table} WHERE id = ?`,
  );
  const selectActive = db.prepare<[], Row>(
    `SELECT * FROM ${table} WHERE deletedAt IS NULL ORDER BY updatedAt DESC, id ASC`,
  );
  const selectDirty = db.prepare<[], Row>(
    `SELECT * FROM ${table}
     WHERE syncedAt IS NULL OR syncedAt <> updatedAt
     ORDER BY updatedAt ASC, id ASC`,
  );
  const countDirtyRows = db.prepare<[], { count: number }>(
    `SELECT COUNT(*) AS count FROM ${table}
     WHERE syncedAt IS NULL OR syncedAt <> updatedAt`,
  );
  // syncedAt is left as it was: NULL for a new row, the old ack otherwise.
  const upsertDirty = db.prepare<RowValues>(
    `INSERT INTO ${table} (${names}) VALUES (${params})
     ON CONFLICT(id) DO UPDATE SET ${updates}`,
  );
  const upsertClean = db.prepare<RowValues>(
    `INSERT INTO ${table} (${names}, syncedAt) VALUES (${params}, @updatedAt)
     ON CONFLICT(id) DO UPDATE SET ${updates}, syncedAt = excluded.syncedAt`,
  );
  const setSynced = db.prepare<[string, string]>(
    `UPDATE ${table} SET syncedAt = updatedAt WHERE id = ? AND updatedAt = ?`,
  );
  const setDirty = db.prepare<[string]>(
    `UPDATE ${table} SET syncedAt = NULL WHERE id = ?`,
  );

  const sameContent = (a: R, b: R) =>
    JSON.stringify(codec.toRow(a)) === JSON.stringify(codec.toRow(b));

  // Read, decide and write in one transaction so a local edit cannot land
  // between the comparison and the overwrite.
  const mergeTx = db.transaction(
    (incoming: R, source: MergeSource): MergeOutcome => {
      const row = selectById.get(incoming.id);
      const local = row ? codec.fromRow(row) : null;
      const decision = resolveLww(
        local?.updatedAt ?? null,
        incoming.updatedAt,
        local !== null && sameContent(local, incoming),
      );

      if (source === "import") {
        if (decision !== "take-remote") return "skipped";
        upsertDirty.run(codec.toRow(incoming));
        return "applied";
      }

      switch (decision) {
        case "take-remote":
          upsertClean.run(codec.toRow(incoming));
          return "applied";
        case "keep-local":
          setDirty.run(incoming.id);
          return "kept-local";
        case "identical":
          // Remote already holds this exact version.
          setSynced.run(incoming.id, incoming.updatedAt);
          return "unchanged";
        case "conflict":
          upsertDirty.run(codec.toRow(codec.conflictCopy(incoming, randomId())));
          setDirty.run(incoming.id);
          return "conflict";
      }
    },
  );

  const run = async <T>(fn: () => T): Promise<Result<T, StorageError>> =>
    safeDbSync(fn);

  return {
    get: (id) =>
      run(() => {
        const row = selectById.get(id);
        return row ? codec.fromRow(row) : null;
      }),
    listActive: () => run(() => selectActive.all().map(codec.fromRow)),
    put: (record) =>
      run(() => {
        upsertDirty.run(codec.toRow(record));
      }),
    merge: (record, source) => run(() => mergeTx(record, source)),
    markSynced: (id, updatedAt) =>
      run(() => setSynced.run(id, updatedAt).changes > 0),
    markDirty: (id) =>
      run(() => {
        setDirty.run(id);
      }),
    listDirty: () => run(() => selectDirty.all().map(codec.fromRow)),
    countDirty: () => run(() => countDirtyRows.get()?.count ?? 0),
  };
}
