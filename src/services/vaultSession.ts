import type { AuthError, StorageError, VaultError } from "../domain/errors";
import { vaultLocked } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import type { KeyManager, KeyManagerError } from "../domain/vault/keyManager";
import { VaultState } from "../types";
import { wipe } from "../storage/cryptoUtils";

export type VaultStateListener = (state: VaultState) => void;

export interface VaultSession {
  getState(): VaultState;
  setup(password: string): Promise<Result<void, KeyManagerError | VaultError>>;
  /** Fails with `VaultLocked` when the session is locked while the key is derived. */
  unlock(
    password: string,
  ): Promise<Result<void, AuthError | StorageError | VaultError>>;
  lock(): void;
  changePassword(
    oldPassword: string,
    newPassword: string,
  ): Promise<Result<void, KeyManagerError>>;
  /**
   * Runs `fn` with a private copy of the data key. The copy is zero-filled
   * once `fn` settles, so a concurrent `lock()` never pulls the key out from
   * under a running operation.
   */
  withKey<T, E>(
    fn: (key: Uint8Array) => Promise<Result<T, E>>,
  ): Promise<Result<T, E | VaultError>>;
  /** Restarts the idle timer. */
  touch(): void;
  /** Host is going to background: lock now. */
  suspend(): void;
  onStateChange(listener: VaultStateListener): () => void;
  dispose(): void;
}

export interface VaultSessionOptions {
  /** 0 or undefined disables auto-lock. */
  autoLockMs?: number;
}

export async function openVaultSession(
  keyManager: KeyManager,
  options: VaultSessionOptions = {},
): Promise<VaultSession> {
  const autoLockMs = options.autoLockMs ?? 0;
  const listeners = new Set<VaultStateListener>();
  let state: VaultState = (await keyManager.isInitialized())
    ? VaultState.Locked
    : VaultState.Uninitialized;
  let dataKey: Uint8Array | null = null;
  let idleTimer: ReturnType<typeof setTimeout> | null = null;
  // Bumped on every lock so an unlock that resolves afterwards is discarded.
  let lockGeneration = 0;

  const setState = (next: VaultState) => {
    if (state === next) return;
    state = next;
    listeners.forEach((listener) => listener(next));
  };

  const clearIdleTimer = () => {
    if (idleTimer !== null) {
      clearTimeout(idleTimer);
      idleTimer = null;
    }
  };

  const armIdleTimer = () => {
    clearIdleTimer();
    if (autoLockMs <= 0 || dataKey === null) return;
    idleTimer = setTimeout(() => {
      idleTimer = null;
      console.info("VaultSession: auto-locked after inactivity");
      lock();
    }, autoLockMs);
    idleTimer.unref?.();
  };

  const lock = () => {
    lockGeneration += 1;
    clearIdleTimer();
    if (dataKey) {
      wipe(dataKey);
      dataKey = null;
    }
    if (state === VaultState.Unlocked) {
      setState(VaultState.Locked);
    }
  };

  const unlock = async (
    password: string,
  ): Promise<Result<void, AuthError | StorageError | VaultError>> => {
    const generation = lockGeneration;
    const result = await keyManager.unlock(password);
    if (!result.ok) return result;
    if (generation !== lockGeneration) {
      wipe(result.value);
      return err(vaultLocked());
    }
    if (dataKey) wipe(dataKey);
    dataKey = result.value;
    setState(VaultState.Unlocked);
    armIdleTimer();
    return ok(undefined);
  };

  return {
    getState: () => state,

    async setup(password) {
      const initialized = await keyManager.initialize(password);
      if (!initialized.ok) return initialized;
      setState(VaultState.Locked);
      return unlock(password);
    },

    unlock,
    lock,

    async changePassword(oldPassword, newPassword) {
      const result = await keyManager.changePassword(oldPassword, newPassword);
      if (result.ok) armIdleTimer();
      return result;
    },

    async withKey<T, E>(
      fn: (key: Uint8Array) => Promise<Result<T, E>>,
    ): Promise<Result<T, E | VaultError>> {
      if (!dataKey) return err(vaultLocked());
      const copy = Uint8Array.from(dataKey);
      armIdleTimer();
      try {
        return await fn(copy);
      } finally {
        wipe(copy);
      }
    },

    touch: armIdleTimer,

    suspend: lock,

    onStateChange(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    dispose() {
      lock();
      listeners.clear();
    },
  };
}
