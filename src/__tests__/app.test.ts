import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { createVaultSyncApp } from "../app";
import type { AppConfig } from "../config";
import { ConnectivityService } from "../services/connectivity";
import { VaultState } from "../types";
import { createMemoryRemoteStore } from "./helpers/memoryRemoteStore";
import { unwrap, unwrapErr } from "./helpers/testUtils";

function configFor(dataDir: string): AppConfig {
  return {
    dataDir,
    dbPath: path.join(dataDir, "vaultsync.db"),
    paramsDir: path.join(dataDir, "params"),
    kdfIterations: 1000,
    autoLockMs: 0,
    retry: { baseMs: 1000, maxMs: 5000, maxAttempts: 3 },
    remote: null,
  };
}

async function readAllFiles(dir: string): Promise<string> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const contents = await Promise.all(
    entries.map((entry) => {
      const full = path.join(dir, entry.name);
      return entry.isDirectory() ? readAllFiles(full) : fs.readFile(full, "latin1");
    }),
  );
  return contents.join("\n");
}

describe("vault sync app", () => {
  jest.setTimeout(20000);
  let dataDir: string;

  beforeEach(async () => {
    jest.spyOn(console, "info").mockImplementation(() => {});
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "vaultsync-app-"));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("keeps vault items across a restart without storing plaintext", async () => {
    const first = await createVaultSyncApp(configFor(dataDir));
    expect(first.session.getState()).toBe(VaultState.Uninitialized);
    expect(first.sync).toBeNull();
    unwrap(await first.session.setup("Sup3rSecret!"));
    unwrap(await first.vault.createItem({ title: "Bank", secret: "p@ss" }));
    await first.close();

    const onDisk = await readAllFiles(dataDir);
    expect(onDisk).not.toContain("p@ss");
    expect(onDisk).not.toContain("Sup3rSecret!");

    const second = await createVaultSyncApp(configFor(dataDir));
    expect(second.session.getState()).toBe(VaultState.Locked);
    expect(unwrapErr(await second.session.unlock("wrong")).type).toBe(
      "InvalidPassword",
    );
    unwrap(await second.session.unlock("Sup3rSecret!"));

    const listed = unwrap(await second.vault.listItems());
    expect(listed.items.map((item) => [item.title, item.secret])).toEqual([
      ["Bank", "p@ss"],
    ]);
    await second.close();
  });

  it("pushes local writes through the coordinator", async () => {
    const remote = createMemoryRemoteStore();
    const app = await createVaultSyncApp(configFor(dataDir), {
      remote,
      connectivity: new ConnectivityService(true),
    });
    unwrap(await app.session.setup("Sup3rSecret!"));
    const created = unwrap(
      await app.vault.createItem({ title: "Bank", secret: "p@ss" }),
    );
    const sync = app.sync;
    if (!sync) throw new Error("sync services missing");

    const settled = new Promise<void>((resolve) => {
      const unsubscribe = sync.coordinator.onStateChange((state) => {
        if (state.phase === "idle") {
          unsubscribe();
          resolve();
        }
      });
    });
    sync.coordinator.startSync("u1");
    await settled;

    expect(remote.pushes.map((entry) => `${entry.collection}/${entry.id}`)).toEqual([
      `vault_items/${created.id}`,
    ]);
    expect(JSON.stringify(remote.rowsFor("u1"))).not.toContain("p@ss");
    expect(await sync.engine.hasPending()).toBe(false);
    await app.close();
  });
});
