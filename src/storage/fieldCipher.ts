import type { CryptoError, DecryptError } from "../domain/errors";
import { ok, type Result } from "../domain/result";
import type { EncryptedVaultRecord, VaultRecord } from "../types";
import { decryptString, encryptString } from "./aeadCipher";

async function encryptOptional(
  key: Uint8Array,
  value: string | null,
): Promise<Result<string | null, CryptoError>> {
  if (value === null) return ok(null);
  return encryptString(key, value);
}

async function decryptOptional(
  key: Uint8Array,
  blob: string | null,
): Promise<Result<string | null, DecryptError>> {
  if (blob === null) return ok(null);
  return decryptString(key, blob);
}

/**
 * Each sensitive field gets its own nonce. `null` stays `null` so an absent
 * field is distinguishable from an empty one; `""` is still encrypted.
 */
export async function encryptVaultRecord(
  record: VaultRecord,
  key: Uint8Array,
): Promise<Result<EncryptedVaultRecord, CryptoError>> {
  const title = await encryptString(key, record.title);
  if (!title.ok) return title;
  const username = await encryptOptional(key, record.username);
  if (!username.ok) return username;
  const secret = await encryptOptional(key, record.secret);
  if (!secret.ok) return secret;
  const url = await encryptOptional(key, record.url);
  if (!url.ok) return url;
  const note = await encryptOptional(key, record.note);
  if (!note.ok) return note;

  return ok({
    id: record.id,
    titleEnc: title.value,
    usernameEnc: username.value,
    secretEnc: secret.value,
    urlEnc: url.value,
    noteEnc: note.value,
    updatedAt: record.updatedAt,
    deletedAt: record.deletedAt,
  });
}

export async function decryptVaultRecord(
  encrypted: EncryptedVaultRecord,
  key: Uint8Array,
): Promise<Result<VaultRecord, DecryptError>> {
  const fields = await Promise.all([
    decryptString(key, encrypted.titleEnc),
    decryptOptional(key, encrypted.usernameEnc),
    decryptOptional(key, encrypted.secretEnc),
    decryptOptional(key, encrypted.urlEnc),
    decryptOptional(key, encrypted.noteEnc),
  ]);
  const [title, username, secret, url, note] = fields;
  if (!title.ok) return title;
  if (!username.ok) return username;
  if (!secret.ok) return secret;
  if (!url.ok) return url;
  if (!note.ok) return note;

  return ok({
    id: encrypted.id,
    title: title.value,
    username: username.value,
    secret: secret.value,
    url: url.value,
    note: note.value,
    updatedAt: encrypted.updatedAt,
    deletedAt: encrypted.deletedAt,
  });
}
