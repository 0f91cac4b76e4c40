import type { webcrypto } from "node:crypto";
import type { CryptoError, DecryptError } from "../domain/errors";
import { decryptFailed } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import { DATA_KEY_BYTES, NONCE_BYTES, TAG_BYTES } from "../utils/constants";
import { safeDecrypt, safeEncrypt } from "./cryptoSafe";
import {
  base64ToBytes,
  bytesToBase64,
  concatBytes,
  decodeUtf8,
  encodeUtf8,
  randomBytes,
  subtle,
} from "./cryptoUtils";

export interface SealedBox {
  nonce: Uint8Array;
  /** Ciphertext with the 16-byte GCM tag appended. */
  ciphertext: Uint8Array;
}

async function importAesKey(
  key: Uint8Array,
  usage: "encrypt" | "decrypt",
): Promise<webcrypto.CryptoKey> {
  if (key.length !== DATA_KEY_BYTES) {
    throw new Error(`Key must be ${DATA_KEY_BYTES} bytes`);
  }
  return subtle.importKey("raw", key, { name: "AES-GCM" }, false, [usage]);
}

/**
 * AES-256-GCM with a fresh random 96-bit nonce per call.
 * Throws if the key is not 32 bytes.
 */
export async function seal(
  key: Uint8Array,
  plaintext: Uint8Array,
): Promise<SealedBox> {
  const cryptoKey = await importAesKey(key, "encrypt");
  const nonce = randomBytes(NONCE_BYTES);
  const encrypted = await subtle.encrypt(
    { name: "AES-GCM", iv: nonce, tagLength: TAG_BYTES * 8 },
    cryptoKey,
    plaintext,
  );
  return { nonce, ciphertext: new Uint8Array(encrypted) };
}

export async function open(
  key: Uint8Array,
  nonce: Uint8Array,
  ciphertext: Uint8Array,
): Promise<Result<Uint8Array, DecryptError>> {
  if (
    key.length !== DATA_KEY_BYTES ||
    nonce.length !== NONCE_BYTES ||
    ciphertext.length < TAG_BYTES
  ) {
    return err(decryptFailed());
  }
  return safeDecrypt(async () => {
    const cryptoKey = await importAesKey(key, "decrypt");
    const decrypted = await subtle.decrypt(
      { name: "AES-GCM", iv: nonce, tagLength: TAG_BYTES * 8 },
      cryptoKey,
      ciphertext,
    );
    return new Uint8Array(decrypted);
  });
}

/** Encodes the result as base64(nonce || ciphertext || tag). */
export async function encryptString(
  key: Uint8Array,
  plaintext: string,
): Promise<Result<string, CryptoError>> {
  return safeEncrypt(async () => {
    const box = await seal(key, encodeUtf8(plaintext));
    return bytesToBase64(concatBytes(box.nonce, box.ciphertext));
  });
}

export async function decryptString(
  key: Uint8Array,
  blob: string,
): Promise<Result<string, DecryptError>> {
  let raw: Uint8Array;
  try {
    raw = base64ToBytes(blob);
  } catch {
    return err(decryptFailed());
  }
  if (raw.length < NONCE_BYTES + TAG_BYTES) {
    return err(decryptFailed());
  }
  const opened = await open(
    key,
    raw.subarray(0, NONCE_BYTES),
    raw.subarray(NONCE_BYTES),
  );
  if (!opened.ok) {
    return opened;
  }
  try {
    return ok(decodeUtf8(opened.value));
  } catch {
    return err(decryptFailed());
  }
}
