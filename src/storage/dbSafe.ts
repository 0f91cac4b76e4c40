import type { StorageError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";

function toStorageError(error: unknown): StorageError {
  if (error instanceof Error) {
    const code = "code" in error ? String(error.code) : "";
    if (code === "SQLITE_CORRUPT" || code === "SQLITE_NOTADB") {
      return { type: "Corrupt", message: error.message };
    }
    return { type: "IO", message: error.message };
  }
  return { type: "Unknown", message: "Storage operation failed." };
}

export async function safeDb<T>(
  fn: () => Promise<T>,
): Promise<Result<T, StorageError>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(toStorageError(error));
  }
}

/** better-sqlite3 statements run synchronously. */
export function safeDbSync<T>(fn: () => T): Result<T, StorageError> {
  try {
    return ok(fn());
  } catch (error) {
    return err(toStorageError(error));
  }
}
