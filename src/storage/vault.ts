import { z } from "zod";
import type { AuthError, StorageError } from "../domain/errors";
import { INVALID_PASSWORD_MESSAGE } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import type {
  KeyManager,
  KeyManagerError,
  VaultKeyParams,
} from "../domain/vault/keyManager";
import type { SecureParamStore } from "../domain/vault/paramStore";
import {
  DATA_KEY_BYTES,
  DEFAULT_KDF_ITERATIONS,
  NONCE_BYTES,
  SALT_BYTES,
  TAG_BYTES,
  VAULT_KEY_PARAMS_KEY,
  VAULT_KEY_PARAMS_VERSION,
} from "../utils/constants";
import { open, seal } from "./aeadCipher";
import { safeEncrypt } from "./cryptoSafe";
import {
  base64ToBytes,
  bytesEqual,
  bytesToBase64,
  randomBytes,
  wipe,
} from "./cryptoUtils";
import { safeDb } from "./dbSafe";
import { deriveKey } from "./keyDerivation";

const vaultKeyParamsSchema = z.object({
  version: z.literal(VAULT_KEY_PARAMS_VERSION),
  salt: z.string().min(1),
  iterations: z.number().int().positive(),
  wrapNonce: z.string().min(1),
  wrappedDataKey: z.string().min(1),
});

interface DecodedParams {
  salt: Uint8Array;
  iterations: number;
  wrapNonce: Uint8Array;
  wrappedDataKey: Uint8Array;
}

const notInitialized = (): AuthError => ({
  type: "NotInitialized",
  message: "Vault is not initialized.",
});

const corrupt = (message: string): AuthError => ({ type: "Corrupt", message });

function parseParams(raw: unknown): Result<DecodedParams, AuthError> {
  const parsed = vaultKeyParamsSchema.safeParse(raw);
  if (!parsed.success) {
    return err(corrupt("Key parameters do not match the expected schema."));
  }
  let decoded: DecodedParams;
  try {
    decoded = {
      salt: base64ToBytes(parsed.data.salt),
      iterations: parsed.data.iterations,
      wrapNonce: base64ToBytes(parsed.data.wrapNonce),
      wrappedDataKey: base64ToBytes(parsed.data.wrappedDataKey),
    };
  } catch {
    return err(corrupt("Key parameters are not valid base64."));
  }
  if (
    decoded.salt.length < SALT_BYTES ||
    decoded.wrapNonce.length !== NONCE_BYTES ||
    decoded.wrappedDataKey.length !== DATA_KEY_BYTES + TAG_BYTES
  ) {
    return err(corrupt("Key parameters have unexpected sizes."));
  }
  return ok(decoded);
}

function encodeParams(params: DecodedParams): VaultKeyParams {
  return {
    version: VAULT_KEY_PARAMS_VERSION,
    salt: bytesToBase64(params.salt),
    iterations: params.iterations,
    wrapNonce: bytesToBase64(params.wrapNonce),
    wrappedDataKey: bytesToBase64(params.wrappedDataKey),
  };
}

async function wrapDataKey(
  dataKey: Uint8Array,
  password: string,
  iterations: number,
): Promise<DecodedParams> {
  const salt = randomBytes(SALT_BYTES);
  const passwordKey = await deriveKey(password, salt, iterations);
  try {
    const box = await seal(passwordKey, dataKey);
    return {
      salt,
      iterations,
      wrapNonce: box.nonce,
      wrappedDataKey: box.ciphertext,
    };
  } finally {
    wipe(passwordKey);
  }
}

async function unwrapDataKey(
  params: DecodedParams,
  password: string,
): Promise<Result<Uint8Array, AuthError>> {
  let passwordKey: Uint8Array;
  try {
    passwordKey = await deriveKey(password, params.salt, params.iterations);
  } catch {
    return err(corrupt("Key parameters cannot be used for derivation."));
  }
  try {
    const opened = await open(
      passwordKey,
      params.wrapNonce,
      params.wrappedDataKey,
    );
    if (!opened.ok) {
      return err({ type: "InvalidPassword", message: INVALID_PASSWORD_MESSAGE });
    }
    if (opened.value.length !== DATA_KEY_BYTES) {
      wipe(opened.value);
      return err(corrupt("Unwrapped data key has an unexpected size."));
    }
    return ok(opened.value);
  } finally {
    wipe(passwordKey);
  }
}

export interface KeyManagerOptions {
  kdfIterations?: number;
}

/**
 * Owns the "vault_key_params" entry. The data key is generated once and only
 * its password wrapping changes; the entry is replaced with a single atomic
 * `set` after the new wrapping has been verified.
 */
export function createKeyManager(
  store: SecureParamStore,
  options?: KeyManagerOptions,
): KeyManager {
  const iterations = options?.kdfIterations ?? DEFAULT_KDF_ITERATIONS;
  let queue: Promise<void> = Promise.resolve();

  // One key-params operation at a time; a second changePassword must see
  // the result of the first.
  const withLock = async <T>(fn: () => Promise<T>): Promise<T> => {
    const prior = queue;
    let release = () => {};
    queue = new Promise<void>((resolve) => {
      release = resolve;
    });
    await prior;
    try {
      return await fn();
    } finally {
      release();
    }
  };

  const readRaw = () => safeDb(() => store.get(VAULT_KEY_PARAMS_KEY));

  const loadParams = async (): Promise<
    Result<DecodedParams, AuthError | StorageError>
  > => {
    const raw = await readRaw();
    if (!raw.ok) return raw;
    if (raw.value === null) return err(notInitialized());
    let json: unknown;
    try {
      json = JSON.parse(raw.value);
    } catch {
      return err(corrupt("Key parameters are not valid JSON."));
    }
    return parseParams(json);
  };

  const persist = (params: DecodedParams) =>
    safeDb(() =>
      store.set(VAULT_KEY_PARAMS_KEY, JSON.stringify(encodeParams(params))),
    );

  const unlockUnlocked = async (
    password: string,
  ): Promise<Result<Uint8Array, AuthError | StorageError>> => {
    const params = await loadParams();
    if (!params.ok) return params;
    return unwrapDataKey(params.value, password);
  };

  return {
    async isInitialized() {
      const raw = await readRaw();
      if (!raw.ok) {
        console.error("KeyManager: failed to read key parameters:", raw.error);
        return false;
      }
      return raw.value !== null;
    },

    initialize(password) {
      return withLock(async (): Promise<Result<void, KeyManagerError>> => {
        const existing = await readRaw();
        if (!existing.ok) return existing;
        if (existing.value !== null) {
          return err({
            type: "AlreadyInitialized",
            message: "Vault is already initialized.",
          });
        }
        const dataKey = randomBytes(DATA_KEY_BYTES);
        try {
          const wrapped = await safeEncrypt(() =>
            wrapDataKey(dataKey, password, iterations),
          );
          if (!wrapped.ok) return wrapped;
          const stored = await persist(wrapped.value);
          if (!stored.ok) return stored;
          return ok(undefined);
        } finally {
          wipe(dataKey);
        }
      });
    },

    unlock(password) {
      return withLock(() => unlockUnlocked(password));
    },

    changePassword(oldPassword, newPassword) {
      return withLock(async (): Promise<Result<void, KeyManagerError>> => {
        const unlocked = await unlockUnlocked(oldPassword);
        if (!unlocked.ok) return unlocked;
        const dataKey = unlocked.value;
        try {
          const wrapped = await safeEncrypt(() =>
            wrapDataKey(dataKey, newPassword, iterations),
          );
          if (!wrapped.ok) return wrapped;

          const check = await unwrapDataKey(wrapped.value, newPassword);
          if (!check.ok) {
            return err({
              type: "EncryptFailed",
              message: "New key wrapping failed verification.",
            });
          }
          const matches = bytesEqual(check.value, dataKey);
          wipe(check.value);
          if (!matches) {
            return err({
              type: "EncryptFailed",
              message: "New key wrapping failed verification.",
            });
          }

          const stored = await persist(wrapped.value);
          if (!stored.ok) return stored;
          return ok(undefined);
        } finally {
          wipe(dataKey);
        }
      });
    },

    exportKeyParams() {
      return withLock(async () => {
        const params = await loadParams();
        if (!params.ok) return params;
        return ok(encodeParams(params.value));
      });
    },

    restoreKeyParams(params) {
      return withLock(
        async (): Promise<Result<void, AuthError | StorageError>> => {
          const parsed = parseParams(params);
          if (!parsed.ok) return parsed;
          const stored = await persist(parsed.value);
          if (!stored.ok) return stored;
          return ok(undefined);
        },
      );
    },

    reset() {
      return withLock(() => safeDb(() => store.remove(VAULT_KEY_PARAMS_KEY)));
    },
  };
}
