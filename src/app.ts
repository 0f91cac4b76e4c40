import { createClient } from "@supabase/supabase-js";
import { getConfig, type AppConfig } from "./config";
import type { NotesService } from "./domain/notes/notesService";
import type { RemoteStore } from "./domain/sync/remoteStore";
import { createSyncEngine, type SyncEngine } from "./domain/sync/syncEngine";
import type { KeyManager } from "./domain/vault/keyManager";
import type { SecureParamStore } from "./domain/vault/paramStore";
import type { VaultService } from "./domain/vault/vaultService";
import { createBackupService, type BackupService } from "./services/backupService";
import { ConnectivityService } from "./services/connectivity";
import { createNotesService } from "./services/notesService";
import {
  createOfflineCoordinator,
  type OfflineCoordinator,
} from "./services/offlineCoordinator";
import { createVaultService } from "./services/vaultService";
import { openVaultSession, type VaultSession } from "./services/vaultSession";
import { openLocalDb, type LocalDb } from "./storage/localDb";
import { createNoteStore } from "./storage/noteStore";
import { createFileParamStore } from "./storage/paramStore";
import { createSupabaseRemoteStore } from "./storage/remoteStore";
import { createMonotonicClock } from "./storage/runtimeAdapters";
import { createSyncStateStore } from "./storage/syncStateStore";
import { createVaultItemStore } from "./storage/vaultItemStore";
import { createKeyManager } from "./storage/vault";

export interface SyncServices {
  engine: SyncEngine;
  coordinator: OfflineCoordinator;
}

export interface VaultSyncApp {
  config: AppConfig;
  db: LocalDb;
  keyManager: KeyManager;
  session: VaultSession;
  notes: NotesService;
  vault: VaultService;
  backup: BackupService;
  connectivity: ConnectivityService;
  /** null when no remote is configured; everything else works offline. */
  sync: SyncServices | null;
  close(): Promise<void>;
}

export interface VaultSyncAppOverrides {
  /** Replaces the Supabase adapter, e.g. with an in-process store. */
  remote?: RemoteStore;
  paramStore?: SecureParamStore;
  connectivity?: ConnectivityService;
}

function createRemote(config: AppConfig): RemoteStore | null {
  if (!config.remote) return null;
  const supabase = createClient(config.remote.url, config.remote.anonKey, {
    auth: { persistSession: false },
  });
  return createSupabaseRemoteStore(supabase);
}

export async function createVaultSyncApp(
  config: AppConfig = getConfig(),
  overrides: VaultSyncAppOverrides = {},
): Promise<VaultSyncApp> {
  const db = openLocalDb(config.dbPath);
  const paramStore = overrides.paramStore ?? createFileParamStore(config.paramsDir);
  const keyManager = createKeyManager(paramStore, {
    kdfIterations: config.kdfIterations,
  });
  const session = await openVaultSession(keyManager, {
    autoLockMs: config.autoLockMs,
  });
  const connectivity = overrides.connectivity ?? new ConnectivityService();
  const clock = createMonotonicClock();

  const stores = {
    notes: createNoteStore(db),
    vault_items: createVaultItemStore(db),
  };

  const remote = overrides.remote ?? createRemote(config);
  let sync: SyncServices | null = null;
  if (remote) {
    const engine = createSyncEngine({
      stores,
      syncState: createSyncStateStore(db),
      remote,
    });
    const coordinator = createOfflineCoordinator({
      engine,
      connectivity,
      retry: config.retry,
    });
    sync = { engine, coordinator };
  }
  const onLocalWrite = () => {
    session.touch();
    sync?.coordinator.requestSync();
  };

  return {
    config,
    db,
    keyManager,
    session,
    notes: createNotesService({ store: stores.notes, clock, onLocalWrite }),
    vault: createVaultService({
      session,
      store: stores.vault_items,
      clock,
      onLocalWrite,
    }),
    backup: createBackupService({
      session,
      notes: stores.notes,
      vaultItems: stores.vault_items,
      onLocalWrite,
    }),
    connectivity,
    sync,
    async close() {
      if (sync) {
        sync.engine.stopRealtime();
        await sync.coordinator.stopSync();
      }
      session.dispose();
      db.close();
    },
  };
}
