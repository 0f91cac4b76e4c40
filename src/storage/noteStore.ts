import { z } from "zod";
import type { LocalRecordStore } from "../domain/sync/recordStore";
import type { Note } from "../types";
import { CONFLICT_TITLE_SUFFIX } from "../utils/constants";
import { NOTES_TABLE, type LocalDb } from "./localDb";
import { createSqliteRecordStore, type TableCodec } from "./recordStore";

interface NoteRow {
  id: string;
  title: string;
  content: string;
  tags: string;
  updatedAt: string;
  deletedAt: string | null;
  syncedAt: string | null;
}

const tagsSchema = z.array(z.string());

function parseTags(raw: string): string[] {
  let value: unknown = null;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    console.warn("NoteStore: tags column is not JSON", error);
  }
  const parsed = tagsSchema.safeParse(value);
  if (parsed.success) return parsed.data;
  console.warn("NoteStore: ignoring malformed tags column");
  return [];
}

export const noteCodec: TableCodec<Note, NoteRow> = {
  table: NOTES_TABLE,
  columns: ["id", "title", "content", "tags", "updatedAt", "deletedAt"],
  toRow: (note) => ({
    id: note.id,
    title: note.title,
    content: note.content,
    tags: JSON.stringify(note.tags),
    updatedAt: note.updatedAt,
    deletedAt: note.deletedAt,
  }),
  fromRow: (row) => ({
    id: row.id,
    title: row.title,
    content: row.content,
    tags: parseTags(row.tags),
    updatedAt: row.updatedAt,
    deletedAt: row.deletedAt,
  }),
  conflictCopy: (note, id) => ({
    ...note,
    id,
    title: `${note.title}${CONFLICT_TITLE_SUFFIX}`,
  }),
};

export function createNoteStore(db: LocalDb): LocalRecordStore<Note> {
  return createSqliteRecordStore(db, noteCodec);
}
