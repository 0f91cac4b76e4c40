export interface VaultRecord {
  id: string;
  title: string;
  username: string | null;
  secret: string | null;
  url: string | null;
  note: string | null;
  updatedAt: string; // ISO timestamp
  deletedAt: string | null; // ISO timestamp
}

// Every sensitive field is an opaque base64(nonce || ciphertext || tag) blob.
export interface EncryptedVaultRecord {
  id: string;
  titleEnc: string;
  usernameEnc: string | null;
  secretEnc: string | null;
  urlEnc: string | null;
  noteEnc: string | null;
  updatedAt: string;
  deletedAt: string | null;
}

export interface Note {
  id: string;
  title: string;
  content: string;
  tags: string[];
  updatedAt: string;
  deletedAt: string | null;
}

export const SyncCollection = {
  Notes: "notes",
  VaultItems: "vault_items",
} as const;

export type SyncCollection =
  (typeof SyncCollection)[keyof typeof SyncCollection];

export interface SyncRecordMap {
  notes: Note;
  vault_items: EncryptedVaultRecord;
}

export type SyncRecord = SyncRecordMap[SyncCollection];

export const SyncStatus = {
  Idle: "idle",
  Syncing: "syncing",
  Synced: "synced",
  Offline: "offline",
  Error: "error",
} as const;

export type SyncStatus = (typeof SyncStatus)[keyof typeof SyncStatus];

export const VaultState = {
  Uninitialized: "uninitialized",
  Locked: "locked",
  Unlocked: "unlocked",
} as const;

export type VaultState = (typeof VaultState)[keyof typeof VaultState];
