import type { StorageError } from "../errors";
import type { Result } from "../result";
import type { Note } from "../../types";

export interface NoteInput {
  title: string;
  content: string;
  tags?: string[];
}

export type NotePatch = Partial<NoteInput>;

export interface NotesService {
  createNote(input: NoteInput): Promise<Result<Note, StorageError>>;
  updateNote(id: string, patch: NotePatch): Promise<Result<Note, StorageError>>;
  deleteNote(id: string): Promise<Result<void, StorageError>>;
  getNote(id: string): Promise<Result<Note | null, StorageError>>;
  listNotes(): Promise<Result<Note[], StorageError>>;
}
