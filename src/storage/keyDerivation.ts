import { DATA_KEY_BYTES, SALT_BYTES } from "../utils/constants";
import { encodeUtf8, subtle, wipe } from "./cryptoUtils";

/**
 * PBKDF2-HMAC-SHA256 password stretching. Deterministic for a given
 * password, salt and iteration count. The result is only ever used to
 * wrap or unwrap the data key.
 */
export async function deriveKey(
  password: string,
  salt: Uint8Array,
  iterations: number,
): Promise<Uint8Array> {
  if (salt.length < SALT_BYTES) {
    throw new Error(`Salt must be at least ${SALT_BYTES} bytes`);
  }
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new Error("Iterations must be a positive integer");
  }
  const passwordBytes = encodeUtf8(password);
  try {
    const baseKey = await subtle.importKey(
      "raw",
      passwordBytes,
      "PBKDF2",
      false,
      ["deriveBits"],
    );
    const bits = await subtle.deriveBits(
      { name: "PBKDF2", hash: "SHA-256", salt, iterations },
      baseKey,
      DATA_KEY_BYTES * 8,
    );
    return new Uint8Array(bits);
  } finally {
    wipe(passwordBytes);
  }
}
