import { createNotesService } from "../services/notesService";
import { openLocalDb, type LocalDb } from "../storage/localDb";
import { createNoteStore } from "../storage/noteStore";
import { createStepClock, ts, unwrap, unwrapErr } from "./helpers/testUtils";

describe("notes service", () => {
  let db: LocalDb;

  beforeEach(() => {
    db = openLocalDb(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  function setup() {
    const store = createNoteStore(db);
    const onLocalWrite = jest.fn();
    const service = createNotesService({
      store,
      clock: createStepClock(),
      onLocalWrite,
    });
    return { store, service, onLocalWrite };
  }

  it("creates notes with normalized tags", async () => {
    const { service, onLocalWrite } = setup();

    const note = unwrap(
      await service.createNote({
        title: "Groceries",
        content: "milk",
        tags: [" food ", "food", "", "home"],
      }),
    );

    expect(note).toEqual({
      id: expect.any(String),
      title: "Groceries",
      content: "milk",
      tags: ["food", "home"],
      updatedAt: ts(101),
      deletedAt: null,
    });
    expect(unwrap(await service.listNotes())).toEqual([note]);
    expect(onLocalWrite).toHaveBeenCalledTimes(1);
  });

  it("updates only the given fields", async () => {
    const { service } = setup();
    const note = unwrap(
      await service.createNote({ title: "Groceries", content: "milk", tags: ["food"] }),
    );

    const updated = unwrap(await service.updateNote(note.id, { content: "eggs" }));

    expect(updated).toEqual({ ...note, content: "eggs", updatedAt: ts(102) });
    expect(unwrap(await service.getNote(note.id))).toEqual(updated);
  });

  it("soft-deletes notes", async () => {
    const { service, store } = setup();
    const note = unwrap(await service.createNote({ title: "Old", content: "" }));

    unwrap(await service.deleteNote(note.id));

    expect(unwrap(await service.getNote(note.id))).toBeNull();
    expect(unwrap(await service.listNotes())).toEqual([]);
    expect(unwrap(await store.get(note.id))?.deletedAt).toBe(ts(102));
  });

  it("reports missing notes", async () => {
    const { service } = setup();

    expect(unwrapErr(await service.updateNote("nope", { title: "x" }))).toEqual({
      type: "NotFound",
      message: "Note nope not found.",
    });
    expect(unwrapErr(await service.deleteNote("nope")).type).toBe("NotFound");
  });
});
