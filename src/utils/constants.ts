export const VAULT_KEY_PARAMS_KEY = "vault_key_params";
export const VAULT_KEY_PARAMS_VERSION = 1;

export const DATA_KEY_BYTES = 32;
export const NONCE_BYTES = 12;
export const TAG_BYTES = 16;
export const SALT_BYTES = 16;

export const DEFAULT_KDF_ITERATIONS = 210_000;
export const MIN_KDF_ITERATIONS = 100_000;

export const DEFAULT_AUTO_LOCK_MS = 5 * 60 * 1000;

export const DEFAULT_RETRY_BASE_MS = 2000;
export const DEFAULT_RETRY_MAX_MS = 60_000;
export const DEFAULT_RETRY_MAX_ATTEMPTS = 6;

export const DB_FILE_NAME = "vaultsync.db";
export const PARAMS_DIR_NAME = "params";

export const CONFLICT_TITLE_SUFFIX = " (Conflict)";
