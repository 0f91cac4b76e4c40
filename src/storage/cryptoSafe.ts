import {
  decryptFailed,
  type CryptoError,
  type DecryptError,
} from "../domain/errors";
import { err, ok, type Result } from "../domain/result";

function toEncryptError(error: unknown): CryptoError {
  if (error instanceof Error) {
    return { type: "EncryptFailed", message: error.message };
  }
  return { type: "EncryptFailed", message: "Crypto operation failed." };
}

export async function safeEncrypt<T>(
  fn: () => Promise<T>,
): Promise<Result<T, CryptoError>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(toEncryptError(error));
  }
}

// The underlying reason is dropped: wrong key, tampering and malformed input
// all look the same to the caller.
export async function safeDecrypt<T>(
  fn: () => Promise<T>,
): Promise<Result<T, DecryptError>> {
  try {
    return ok(await fn());
  } catch {
    return err(decryptFailed());
  }
}
