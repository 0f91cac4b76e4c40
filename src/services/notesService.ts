import type { StorageError } from "../domain/errors";
import type { NotesService } from "../domain/notes/notesService";
import { err, ok, type Result } from "../domain/result";
import type { Clock } from "../domain/runtime/clock";
import type { LocalRecordStore } from "../domain/sync/recordStore";
import type { Note } from "../types";
import { randomId } from "../storage/cryptoUtils";
import { createMonotonicClock } from "../storage/runtimeAdapters";

export interface NotesServiceDeps {
  store: LocalRecordStore<Note>;
  clock?: Clock;
  onLocalWrite?: () => void;
}

// Tags are compared case-sensitively but stored once each.
function normalizeTags(tags: string[]): string[] {
  return Array.from(new Set(tags.map((tag) => tag.trim()).filter(Boolean)));
}

export function createNotesService({
  store,
  clock = createMonotonicClock(),
  onLocalWrite,
}: NotesServiceDeps): NotesService {
  const now = () => clock.now().toISOString();

  const save = async (note: Note): Promise<Result<Note, StorageError>> => {
    const stored = await store.put(note);
    if (!stored.ok) return stored;
    onLocalWrite?.();
    return ok(note);
  };

  const loadActive = async (id: string): Promise<Result<Note, StorageError>> => {
    const existing = await store.get(id);
    if (!existing.ok) return existing;
    if (!existing.value || existing.value.deletedAt !== null) {
      return err({ type: "NotFound", message: `Note ${id} not found.` });
    }
    return ok(existing.value);
  };

  return {
    createNote(input) {
      return save({
        id: randomId(),
        title: input.title,
        content: input.content,
        tags: normalizeTags(input.tags ?? []),
        updatedAt: now(),
        deletedAt: null,
      });
    },

    async updateNote(id, patch) {
      const existing = await loadActive(id);
      if (!existing.ok) return existing;
      const note = existing.value;
      return save({
        ...note,
        title: patch.title ?? note.title,
        content: patch.content ?? note.content,
        tags: patch.tags ? normalizeTags(patch.tags) : note.tags,
        updatedAt: now(),
      });
    },

    async deleteNote(id) {
      const existing = await loadActive(id);
      if (!existing.ok) return existing;
      const timestamp = now();
      const saved = await save({
        ...existing.value,
        updatedAt: timestamp,
        deletedAt: timestamp,
      });
      if (!saved.ok) return saved;
      return ok(undefined);
    },

    async getNote(id) {
      const existing = await store.get(id);
      if (!existing.ok) return existing;
      if (!existing.value || existing.value.deletedAt !== null) return ok(null);
      return ok(existing.value);
    },

    listNotes: () => store.listActive(),
  };
}
