import type { AuthError, CryptoError, StorageError } from "../errors";
import type { Result } from "../result";

/** Persisted form; every binary field is base64. */
export interface VaultKeyParams {
  version: 1;
  salt: string;
  iterations: number;
  wrapNonce: string;
  wrappedDataKey: string;
}

export type KeyManagerError = AuthError | StorageError | CryptoError;

export interface KeyManager {
  isInitialized(): Promise<boolean>;
  initialize(password: string): Promise<Result<void, KeyManagerError>>;
  /** Resolves to a fresh copy of the 32-byte data key; the caller owns it. */
  unlock(password: string): Promise<Result<Uint8Array, AuthError | StorageError>>;
  changePassword(
    oldPassword: string,
    newPassword: string,
  ): Promise<Result<void, KeyManagerError>>;
  exportKeyParams(): Promise<Result<VaultKeyParams, AuthError | StorageError>>;
  restoreKeyParams(
    params: unknown,
  ): Promise<Result<void, AuthError | StorageError>>;
  reset(): Promise<Result<void, StorageError>>;
}
