import { DECRYPT_FAILED_MESSAGE } from "../domain/errors";
import { encryptString } from "../storage/aeadCipher";
import { randomBytes } from "../storage/cryptoUtils";
import { decryptVaultRecord, encryptVaultRecord } from "../storage/fieldCipher";
import type { VaultRecord } from "../types";
import { unwrap, unwrapErr } from "./helpers/testUtils";

const record: VaultRecord = {
  id: "item-1",
  title: "Bank",
  username: "alice",
  secret: "p@ss",
  url: "",
  note: null,
  updatedAt: "2024-01-01T00:00:00.000Z",
  deletedAt: null,
};

describe("field cipher", () => {
  const key = randomBytes(32);

  it.each<[string, VaultRecord]>([
    ["plain text", record],
    [
      "non-ASCII text",
      {
        ...record,
        title: "Bänk 銀行 🏦",
        username: "ünïcødé",
        secret: "𝔭𝔞𝔰𝔰 🔑",
        note: "línea 1\nlínea 2",
      },
    ],
    ["a very long field", { ...record, note: "x".repeat(200_000) }],
    [
      "only required fields",
      { ...record, username: null, secret: null, url: null, note: null },
    ],
    [
      "empty strings",
      { ...record, title: "", username: "", secret: "", url: "", note: "" },
    ],
  ])("round-trips %s", async (_label, input) => {
    const encrypted = unwrap(await encryptVaultRecord(input, key));
    expect(unwrap(await decryptVaultRecord(encrypted, key))).toEqual(input);
  });

  it("keeps ids and timestamps in the clear and nulls as nulls", async () => {
    const encrypted = unwrap(await encryptVaultRecord(record, key));

    expect(encrypted.id).toBe("item-1");
    expect(encrypted.updatedAt).toBe("2024-01-01T00:00:00.000Z");
    expect(encrypted.deletedAt).toBeNull();
    expect(encrypted.noteEnc).toBeNull();
    // An empty string is still a value and gets encrypted.
    expect(encrypted.urlEnc).not.toBeNull();
    expect(encrypted.urlEnc).not.toBe("");
  });

  it("uses a distinct nonce per field", async () => {
    const encrypted = unwrap(
      await encryptVaultRecord({ ...record, username: "same", secret: "same" }, key),
    );
    expect(encrypted.usernameEnc).not.toBe(encrypted.secretEnc);
  });

  it("never repeats a ciphertext when the same record is encrypted twice", async () => {
    const full: VaultRecord = { ...record, url: "https://bank.test", note: "pin" };
    const first = unwrap(await encryptVaultRecord(full, key));
    const second = unwrap(await encryptVaultRecord(full, key));

    const fields = ["titleEnc", "usernameEnc", "secretEnc", "urlEnc", "noteEnc"] as const;
    for (const field of fields) {
      expect(first[field]).not.toBeNull();
      expect(first[field]).not.toBe(second[field]);
    }
  });

  it("fails the whole record when one field does not authenticate", async () => {
    const encrypted = unwrap(await encryptVaultRecord(record, key));
    const foreign = unwrap(await encryptString(randomBytes(32), "p@ss"));

    const result = await decryptVaultRecord(
      { ...encrypted, secretEnc: foreign },
      key,
    );

    expect(unwrapErr(result)).toEqual({
      type: "DecryptFailed",
      message: DECRYPT_FAILED_MESSAGE,
    });
  });

  it("fails with another key", async () => {
    const encrypted = unwrap(await encryptVaultRecord(record, key));
    const result = await decryptVaultRecord(encrypted, randomBytes(32));
    expect(unwrapErr(result).type).toBe("DecryptFailed");
  });
});
