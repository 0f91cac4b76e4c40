import type {
  CryptoError,
  StorageError,
  VaultError,
} from "../errors";
import type { Result } from "../result";
import type { VaultRecord } from "../../types";

export interface VaultItemInput {
  title: string;
  username?: string | null;
  secret?: string | null;
  url?: string | null;
  note?: string | null;
}

export type VaultItemPatch = Partial<VaultItemInput>;

export interface VaultItemList {
  items: VaultRecord[];
  /** Ids of stored items that failed authentication under the current key. */
  undecryptable: string[];
}

export type VaultServiceError = VaultError | CryptoError | StorageError;

export interface VaultService {
  createItem(input: VaultItemInput): Promise<Result<VaultRecord, VaultServiceError>>;
  updateItem(
    id: string,
    patch: VaultItemPatch,
  ): Promise<Result<VaultRecord, VaultServiceError>>;
  /** Soft delete; the tombstone syncs like any other change. */
  deleteItem(id: string): Promise<Result<void, VaultServiceError>>;
  getItem(id: string): Promise<Result<VaultRecord | null, VaultServiceError>>;
  listItems(): Promise<Result<VaultItemList, VaultServiceError>>;
  /** Case-insensitive substring match on the title. */
  searchItems(keyword: string): Promise<Result<VaultRecord[], VaultServiceError>>;
}
