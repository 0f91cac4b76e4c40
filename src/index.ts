export { createVaultSyncApp } from "./app";
export type { SyncServices, VaultSyncApp, VaultSyncAppOverrides } from "./app";
export { getConfig } from "./config";
export type { AppConfig, RemoteConfig } from "./config";

export * from "./types";
export * from "./domain/errors";
export { ok, err } from "./domain/result";
export type { Result } from "./domain/result";

export {
  seal,
  open,
  encryptString,
  decryptString,
} from "./storage/aeadCipher";
export type { SealedBox } from "./storage/aeadCipher";
export { deriveKey } from "./storage/keyDerivation";
export { createKeyManager } from "./storage/vault";
export type { KeyManagerOptions } from "./storage/vault";
export type {
  KeyManager,
  KeyManagerError,
  VaultKeyParams,
} from "./domain/vault/keyManager";
export type { SecureParamStore } from "./domain/vault/paramStore";
export {
  createFileParamStore,
  createMemoryParamStore,
} from "./storage/paramStore";
export { encryptVaultRecord, decryptVaultRecord } from "./storage/fieldCipher";

export { openVaultSession } from "./services/vaultSession";
export type { VaultSession, VaultSessionOptions } from "./services/vaultSession";
export { createVaultService } from "./services/vaultService";
export type {
  VaultItemInput,
  VaultItemList,
  VaultItemPatch,
  VaultService,
  VaultServiceError,
} from "./domain/vault/vaultService";
export { createNotesService } from "./services/notesService";
export type {
  NoteInput,
  NotePatch,
  NotesService,
} from "./domain/notes/notesService";
export { createBackupService } from "./services/backupService";
export type {
  BackupKind,
  BackupService,
  ImportSummary,
} from "./services/backupService";

export { openLocalDb, migrate } from "./storage/localDb";
export type { LocalDb } from "./storage/localDb";
export { createNoteStore } from "./storage/noteStore";
export { createVaultItemStore } from "./storage/vaultItemStore";
export { createSyncStateStore } from "./storage/syncStateStore";
export type {
  LocalRecordStore,
  MergeOutcome,
  MergeSource,
} from "./domain/sync/recordStore";

export { resolveLww, compareTimestamps } from "./domain/sync/lww";
export type { LwwDecision } from "./domain/sync/lww";
export type {
  RemoteChange,
  RemotePage,
  RemoteStore,
} from "./domain/sync/remoteStore";
export { createSupabaseRemoteStore } from "./storage/remoteStore";
export { createSyncEngine } from "./domain/sync/syncEngine";
export type { PushError, RecordStores, SyncEngine } from "./domain/sync/syncEngine";
export { retryDelayMs } from "./domain/sync/coordinatorMachine";
export type { RetryPolicy } from "./domain/sync/coordinatorMachine";
export { createOfflineCoordinator } from "./services/offlineCoordinator";
export type {
  CoordinatorState,
  OfflineCoordinator,
} from "./services/offlineCoordinator";
export { ConnectivityService } from "./services/connectivity";
export type { Connectivity } from "./domain/runtime/connectivity";
export { formatSyncError } from "./utils/syncError";
