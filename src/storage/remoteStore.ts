import type { RealtimeChannel, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { toSyncError, type SyncError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import type {
  RemoteChange,
  RemotePage,
  RemoteStore,
} from "../domain/sync/remoteStore";
import { SyncCollection, type SyncRecordMap } from "../types";
import { encryptedVaultRecordSchema, noteSchema } from "./recordSchemas";

export const SYNC_RECORDS_TABLE = "sync_records";

const remoteRowSchema = z.object({
  user_id: z.string(),
  collection: z.enum([SyncCollection.Notes, SyncCollection.VaultItems]),
  id: z.string(),
  payload: z.unknown(),
  updated_at: z.string(),
  deleted_at: z.string().nullable(),
  server_updated_at: z.string(),
});

type RemoteRow = z.infer<typeof remoteRowSchema>;

function mapRemoteRow(row: RemoteRow): RemoteChange | null {
  if (row.collection === SyncCollection.Notes) {
    const parsed = noteSchema.safeParse(row.payload);
    if (!parsed.success) return null;
    return {
      collection: SyncCollection.Notes,
      record: parsed.data,
      serverUpdatedAt: row.server_updated_at,
    };
  }
  const parsed = encryptedVaultRecordSchema.safeParse(row.payload);
  if (!parsed.success) return null;
  return {
    collection: SyncCollection.VaultItems,
    record: parsed.data,
    serverUpdatedAt: row.server_updated_at,
  };
}

function parseRow(raw: unknown): RemoteRow | null {
  const row = remoteRowSchema.safeParse(raw);
  if (!row.success) {
    console.warn("RemoteStore: ignoring malformed sync row");
    return null;
  }
  return row.data;
}

function toChange(row: RemoteRow): RemoteChange | null {
  const change = mapRemoteRow(row);
  if (!change) {
    console.warn(`RemoteStore: ignoring invalid ${row.collection} payload ${row.id}`);
  }
  return change;
}

export function createSupabaseRemoteStore(
  supabase: SupabaseClient,
): RemoteStore {
  return {
    async push<C extends SyncCollection>(
      userId: string,
      collection: C,
      record: SyncRecordMap[C],
    ): Promise<Result<void, SyncError>> {
      try {
        const { error } = await supabase.from(SYNC_RECORDS_TABLE).upsert(
          {
            user_id: userId,
            collection,
            id: record.id,
            payload: record,
            updated_at: record.updatedAt,
            deleted_at: record.deletedAt,
          },
          { onConflict: "user_id,collection,id" },
        );
        if (error) {
          return err(toSyncError(error, "RemoteRejected"));
        }
        return ok(undefined);
      } catch (error) {
        return err(toSyncError(error));
      }
    },

    async pullSince(userId, collection, cursor) {
      try {
        let query = supabase
          .from(SYNC_RECORDS_TABLE)
          .select("*")
          .eq("user_id", userId)
          .eq("collection", collection)
          .order("server_updated_at", { ascending: true });
        if (cursor) {
          query = query.gt("server_updated_at", cursor);
        }
        const { data, error } = await query;
        if (error) {
          return err(toSyncError(error, "RemoteRejected"));
        }
        const page: RemotePage = { changes: [], cursor };
        const rows: unknown[] = data ?? [];
        for (const raw of rows) {
          const row = parseRow(raw);
          if (!row) continue;
          // Past a bad payload too; it will not become valid on retry.
          page.cursor = row.server_updated_at;
          const change = toChange(row);
          if (change) page.changes.push(change);
        }
        return ok(page);
      } catch (error) {
        return err(toSyncError(error));
      }
    },

    subscribe(userId, onChange) {
      const channel: RealtimeChannel = supabase
        .channel(`${SYNC_RECORDS_TABLE}:${userId}`)
        .on(
          "postgres_changes",
          {
            event: "*",
            schema: "public",
            table: SYNC_RECORDS_TABLE,
            filter: `user_id=eq.${userId}`,
          },
          (payload) => {
            if (payload.eventType === "DELETE") return;
            const row = parseRow(payload.new);
            const change = row ? toChange(row) : null;
            if (change) onChange(change);
          },
        )
        .subscribe((status) => {
          if (status === "CHANNEL_ERROR" || status === "TIMED_OUT") {
            console.warn(`RemoteStore: realtime channel ${status}`);
          }
        });

      return () => {
        channel.unsubscribe().catch((error: unknown) => {
          console.error("RemoteStore: failed to close realtime channel", error);
        });
      };
    },
  };
}
