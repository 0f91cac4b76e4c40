export type StorageError =
  | { type: "NotFound"; message: string }
  | { type: "Corrupt"; message: string }
  | { type: "IO"; message: string }
  | { type: "Unknown"; message: string };

export type DecryptError = { type: "DecryptFailed"; message: string };

export type CryptoError =
  | { type: "KeyMissing"; message: string }
  | { type: "EncryptFailed"; message: string }
  | DecryptError;

export type AuthError =
  | { type: "InvalidPassword"; message: string }
  | { type: "NotInitialized"; message: string }
  | { type: "AlreadyInitialized"; message: string }
  | { type: "Corrupt"; message: string };

export type NetworkError = { type: "Network"; message: string };

export type SyncError =
  | { type: "Offline"; message: string }
  | NetworkError
  | { type: "Conflict"; message: string }
  | { type: "RemoteRejected"; message: string }
  | { type: "Unknown"; message: string };

export type VaultError =
  | { type: "VaultLocked"; message: string }
  | { type: "Unknown"; message: string };

export type BackupError =
  | { type: "DecryptFailed"; message: string }
  | { type: "Corrupt"; message: string }
  | { type: "Unsupported"; message: string };

// Shown to users as-is. Never interpolate key, password or plaintext detail.
export const DECRYPT_FAILED_MESSAGE = "Unable to decrypt data.";
export const INVALID_PASSWORD_MESSAGE = "Incorrect password.";

export const decryptFailed = (): DecryptError => ({
  type: "DecryptFailed",
  message: DECRYPT_FAILED_MESSAGE,
});

export const vaultLocked = (): VaultError => ({
  type: "VaultLocked",
  message: "Vault is locked.",
});

function isNetworkFailure(message: string): boolean {
  return /fetch failed|failed to fetch|network|ECONNREFUSED|ENOTFOUND|ETIMEDOUT/i.test(
    message,
  );
}

export function toSyncError(
  error: unknown,
  fallback: SyncError["type"] = "Network",
): SyncError {
  if (error && typeof error === "object" && "code" in error) {
    if (error.code === "23505") {
      return { type: "Conflict", message: "Remote revision conflict." };
    }
  }
  const message =
    error instanceof Error
      ? error.message
      : error && typeof error === "object" && "message" in error
        ? String(error.message)
        : "Remote request failed.";
  if (isNetworkFailure(message)) {
    return { type: "Network", message };
  }
  return { type: fallback, message };
}
