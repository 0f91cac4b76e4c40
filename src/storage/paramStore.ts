import { promises as fs } from "node:fs";
import path from "node:path";
import type { SecureParamStore } from "../domain/vault/paramStore";
import { randomId } from "./cryptoUtils";

const KEY_PATTERN = /^[a-z0-9_-]+$/i;

function assertKey(key: string): void {
  if (!KEY_PATTERN.test(key)) {
    throw new Error(`Invalid parameter key: ${key}`);
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * One JSON file per key. Writes go to a temp file that is fsynced and then
 * renamed over the target, so the old file stays valid until the swap.
 */
export function createFileParamStore(dir: string): SecureParamStore {
  const fileFor = (key: string) => {
    assertKey(key);
    return path.join(dir, `${key}.json`);
  };

  return {
    async get(key) {
      try {
        return await fs.readFile(fileFor(key), "utf8");
      } catch (error) {
        if (isMissingFile(error)) return null;
        throw error;
      }
    },
    async set(key, value) {
      const target = fileFor(key);
      await fs.mkdir(dir, { recursive: true, mode: 0o700 });
      const tmp = `${target}.${randomId()}.tmp`;
      try {
        const handle = await fs.open(tmp, "w", 0o600);
        try {
          await handle.writeFile(value, "utf8");
          await handle.sync();
        } finally {
          await handle.close();
        }
        await fs.rename(tmp, target);
      } catch (error) {
        await fs.rm(tmp, { force: true });
        throw error;
      }
    },
    async remove(key) {
      await fs.rm(fileFor(key), { force: true });
    },
  };
}

export function createMemoryParamStore(
  initial?: Record<string, string>,
): SecureParamStore {
  const entries = new Map<string, string>(Object.entries(initial ?? {}));
  return {
    async get(key) {
      return entries.get(key) ?? null;
    },
    async set(key, value) {
      entries.set(key, value);
    },
    async remove(key) {
      entries.delete(key);
    },
  };
}
