import type { RemoteStore } from "../domain/sync/remoteStore";
import { createSyncEngine } from "../domain/sync/syncEngine";
import { openLocalDb, type LocalDb } from "../storage/localDb";
import { createNoteStore } from "../storage/noteStore";
import { createSyncStateStore } from "../storage/syncStateStore";
import { createVaultItemStore } from "../storage/vaultItemStore";
import { SyncStatus, type EncryptedVaultRecord, type Note } from "../types";
import { createMemoryRemoteStore } from "./helpers/memoryRemoteStore";
import { ts, unwrap, unwrapErr } from "./helpers/testUtils";

function note(id: string, seconds: number, overrides: Partial<Note> = {}): Note {
  return {
    id,
    title: `Note ${id}`,
    content: "body",
    tags: [],
    updatedAt: ts(seconds),
    deletedAt: null,
    ...overrides,
  };
}

function item(
  id: string,
  seconds: number,
  overrides: Partial<EncryptedVaultRecord> = {},
): EncryptedVaultRecord {
  return {
    id,
    titleEnc: "dGl0bGU=",
    usernameEnc: null,
    secretEnc: "c2VjcmV0",
    urlEnc: null,
    noteEnc: null,
    updatedAt: ts(seconds),
    deletedAt: null,
    ...overrides,
  };
}

const flushImmediate = () =>
  new Promise<void>((resolve) => {
    setImmediate(resolve);
  });

function setup() {
  const db = openLocalDb(":memory:");
  const stores = {
    notes: createNoteStore(db),
    vault_items: createVaultItemStore(db),
  };
  const syncState = createSyncStateStore(db);
  const remote = createMemoryRemoteStore();
  const engine = createSyncEngine({ stores, syncState, remote });
  return { db, stores, syncState, remote, engine };
}

describe("sync engine", () => {
  let env: ReturnType<typeof setup>;
  let db: LocalDb;

  beforeEach(() => {
    jest.spyOn(console, "info").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
    env = setup();
    db = env.db;
  });

  afterEach(() => {
    env.engine.stopRealtime();
    if (db.open) db.close();
    jest.restoreAllMocks();
  });

  const pushedIds = () =>
    env.remote.pushes.map((entry) => `${entry.collection}/${entry.id}`);

  describe("pushLocal", () => {
    it("pushes dirty records of both collections and acknowledges them", async () => {
      const { stores, engine, syncState } = env;
      unwrap(await stores.notes.put(note("a", 1)));
      unwrap(await stores.vault_items.put(item("v1", 2)));
      unwrap(await stores.notes.put(note("b", 3)));

      expect(unwrap(await engine.pushLocal("u1"))).toBe(3);

      expect(pushedIds()).toEqual(["notes/a", "notes/b", "vault_items/v1"]);
      expect(await engine.getSummary()).toEqual({
        notes: 0,
        vaultItems: 0,
        total: 0,
      });
      expect(unwrap(await syncState.getState("notes")).pushCursor).toBe(ts(3));
      expect(unwrap(await syncState.getState("vault_items")).pushCursor).toBe(
        ts(2),
      );

      expect(unwrap(await engine.pushLocal("u1"))).toBe(0);
      expect(env.remote.pushes).toHaveLength(3);
    });

    it("continues past a rejected record and holds the cursor before it", async () => {
      const { stores, engine, syncState, remote } = env;
      unwrap(await stores.notes.put(note("a", 1)));
      unwrap(await stores.notes.put(note("b", 2)));
      unwrap(await stores.notes.put(note("c", 3)));
      remote.failIds.add("b");

      const result = await engine.pushLocal("u1");

      expect(unwrapErr(result)).toEqual({
        type: "RemoteRejected",
        message: "1 record(s) failed to push: rejected b",
        pushed: 2,
      });
      expect(pushedIds()).toEqual(["notes/a", "notes/c"]);
      expect(unwrap(await syncState.getState("notes")).pushCursor).toBe(ts(1));
      expect(unwrap(await stores.notes.listDirty()).map((n) => n.id)).toEqual([
        "b",
      ]);

      remote.failIds.clear();
      expect(unwrap(await engine.pushLocal("u1"))).toBe(1);
      expect(pushedIds()).toEqual(["notes/a", "notes/c", "notes/b"]);
      expect(unwrap(await syncState.getState("notes")).pushCursor).toBe(ts(2));
    });

    it("counts a push that throws as a failed record and keeps going", async () => {
      const { stores, syncState, remote } = env;
      const flaky: RemoteStore = {
        ...remote,
        push: async (userId, collection, record) => {
          if (record.id === "a") throw new Error("socket hang up");
          return remote.push(userId, collection, record);
        },
      };
      const engine = createSyncEngine({ stores, syncState, remote: flaky });
      unwrap(await stores.notes.put(note("a", 1)));
      unwrap(await stores.notes.put(note("b", 2)));

      const result = await engine.pushLocal("u1");

      expect(unwrapErr(result)).toEqual({
        type: "Unknown",
        message: "1 record(s) failed to push: socket hang up",
        pushed: 1,
      });
      expect(pushedIds()).toEqual(["notes/b"]);
      expect(engine.getStatus()).toBe(SyncStatus.Error);
      expect(unwrap(await syncState.getState("notes")).pushCursor).toBeNull();
      expect(unwrap(await stores.notes.listDirty()).map((n) => n.id)).toEqual([
        "a",
      ]);
    });

    it("settles the status when a store throws mid-pass", async () => {
      const { stores, engine } = env;
      jest
        .spyOn(stores.notes, "listDirty")
        .mockRejectedValue(new Error("disk I/O error"));

      const result = await engine.pushLocal("u1");

      expect(unwrapErr(result)).toEqual({
        type: "Unknown",
        message: "disk I/O error",
        pushed: 0,
      });
      expect(engine.getStatus()).toBe(SyncStatus.Error);
    });

    it("keeps offline writes and delivers each exactly once on reconnect", async () => {
      const { stores, engine, remote } = env;
      remote.failWith = { type: "Network", message: "fetch failed" };
      unwrap(await stores.notes.put(note("a", 1)));
      unwrap(await stores.vault_items.put(item("v1", 2)));
      unwrap(await stores.vault_items.put(item("v2", 3)));
      unwrap(
        await stores.vault_items.put(item("v2", 4, { deletedAt: ts(4) })),
      );

      const offline = await engine.pushLocal("u1");

      expect(unwrapErr(offline)).toEqual({
        type: "Network",
        message: "3 record(s) failed to push: fetch failed",
        pushed: 0,
      });
      expect(engine.getStatus()).toBe(SyncStatus.Offline);
      expect(remote.pushes).toEqual([]);
      expect(
        unwrap(await stores.vault_items.listActive()).map((v) => v.id),
      ).toEqual(["v1"]);

      remote.failWith = null;
      expect(unwrap(await engine.pushLocal("u1"))).toBe(3);
      expect(remote.pushes).toEqual([
        { userId: "u1", collection: "notes", id: "a", updatedAt: ts(1) },
        { userId: "u1", collection: "vault_items", id: "v1", updatedAt: ts(2) },
        { userId: "u1", collection: "vault_items", id: "v2", updatedAt: ts(4) },
      ]);
      expect(unwrap(await engine.pushLocal("u1"))).toBe(0);
      expect(remote.pushes).toHaveLength(3);
    });

    it("coalesces concurrent calls for the same user", async () => {
      const { stores, engine } = env;
      unwrap(await stores.notes.put(note("a", 1)));

      const first = engine.pushLocal("u1");
      const second = engine.pushLocal("u1");

      expect(second).toBe(first);
      expect(unwrap(await first)).toBe(1);
      expect(env.remote.pushes).toHaveLength(1);

      const third = engine.pushLocal("u1");
      expect(third).not.toBe(first);
      expect(unwrap(await third)).toBe(0);
    });

    it("reports status changes", async () => {
      const { stores, engine, remote } = env;
      const statuses: string[] = [];
      engine.onStatusChange((status) => statuses.push(status));

      unwrap(await engine.pushLocal("u1"));
      unwrap(await stores.notes.put(note("a", 1)));
      remote.failWith = { type: "Network", message: "fetch failed" };
      await engine.pushLocal("u1");
      remote.failWith = { type: "RemoteRejected", message: "denied" };
      await engine.pushLocal("u1");

      expect(statuses).toEqual([
        SyncStatus.Syncing,
        SyncStatus.Synced,
        SyncStatus.Syncing,
        SyncStatus.Offline,
        SyncStatus.Syncing,
        SyncStatus.Error,
      ]);
    });

    it("surfaces a local store failure", async () => {
      const { engine } = env;
      db.close();

      const result = await engine.pushLocal("u1");

      expect(unwrapErr(result)).toEqual({
        type: "Unknown",
        message: expect.stringMatching(/^Local store: /),
        pushed: 0,
      });
      expect(engine.getStatus()).toBe(SyncStatus.Error);
    });
  });

  describe("applyRemote", () => {
    it("keeps a newer local edit and pushes it again", async () => {
      const { stores, engine } = env;
      unwrap(await stores.notes.put(note("a", 2)));
      unwrap(await engine.pushLocal("u1"));

      const outcome = await engine.applyRemote("notes", note("a", 1, { title: "Old" }));

      expect(unwrap(outcome)).toBe("kept-local");
      expect(unwrap(await stores.notes.get("a"))?.title).toBe("Note a");
      expect(unwrap(await engine.pushLocal("u1"))).toBe(1);
    });

    it("takes a newer remote version without pushing it back", async () => {
      const { stores, engine } = env;
      unwrap(await stores.notes.put(note("a", 1)));
      unwrap(await engine.pushLocal("u1"));

      const outcome = await engine.applyRemote("notes", note("a", 3, { title: "New" }));

      expect(unwrap(outcome)).toBe("applied");
      expect(unwrap(await stores.notes.get("a"))?.title).toBe("New");
      expect(unwrap(await engine.pushLocal("u1"))).toBe(0);
    });

    it("warns when both sides changed at the same instant", async () => {
      const { stores, engine } = env;
      unwrap(await stores.vault_items.put(item("v1", 1)));

      const outcome = await engine.applyRemote(
        "vault_items",
        item("v1", 1, { secretEnc: "b3RoZXI=" }),
      );

      expect(unwrap(outcome)).toBe("conflict");
      expect(console.warn).toHaveBeenCalledWith(
        "Sync: vault_items/v1 changed on two devices at the same instant; kept both",
      );
    });
  });

  describe("pullRemote", () => {
    it("applies changes since the stored cursor", async () => {
      const { stores, engine, remote, syncState } = env;
      remote.seed("u1", "notes", note("r", 5));
      remote.seed("u1", "vault_items", item("rv", 6));
      remote.seed("u2", "notes", note("other", 7));

      expect(unwrap(await engine.pullRemote("u1"))).toBe(2);

      expect(unwrap(await stores.notes.get("r"))).toEqual(note("r", 5));
      expect(unwrap(await stores.vault_items.get("rv"))).toEqual(item("rv", 6));
      expect(unwrap(await stores.notes.get("other"))).toBeNull();
      expect(unwrap(await syncState.getState("notes")).pullCursor).toBe(
        "2030-01-01T00:00:01.000Z",
      );
      expect(unwrap(await syncState.getState("vault_items")).pullCursor).toBe(
        "2030-01-01T00:00:02.000Z",
      );
      expect(await engine.hasPending()).toBe(false);

      expect(unwrap(await engine.pullRemote("u1"))).toBe(0);
    });

    it("returns the remote error", async () => {
      const { engine, remote } = env;
      remote.failWith = { type: "Network", message: "fetch failed" };

      expect(unwrapErr(await engine.pullRemote("u1"))).toEqual({
        type: "Network",
        message: "fetch failed",
      });
    });
  });

  describe("realtime", () => {
    it("applies pushed changes until stopped", async () => {
      const { stores, engine, remote } = env;
      engine.startRealtime("u1");
      engine.startRealtime("u1");
      expect(remote.subscriberCount()).toBe(1);

      remote.seed("u1", "notes", note("live", 1));
      await flushImmediate();
      expect(unwrap(await stores.notes.get("live"))).toEqual(note("live", 1));

      engine.stopRealtime();
      expect(remote.subscriberCount()).toBe(0);
      remote.seed("u1", "notes", note("late", 2));
      await flushImmediate();
      expect(unwrap(await stores.notes.get("late"))).toBeNull();
    });
  });

  it("summarizes pending work", async () => {
    const { stores, engine } = env;
    unwrap(await stores.notes.put(note("a", 1)));
    unwrap(await stores.vault_items.put(item("v1", 2)));
    unwrap(await stores.vault_items.put(item("v2", 3)));

    expect(await engine.getSummary()).toEqual({
      notes: 1,
      vaultItems: 2,
      total: 3,
    });
    expect(await engine.hasPending()).toBe(true);
  });
});
