import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { createPidfileStore, pidfilePath } from "../src/cache/pidfiles";

let root = "";

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "cdp-pilot-pids-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("createPidfileStore", () => {
  it("writes one pidfile per port", async () => {
    const store = createPidfileStore(root);

    await store.write(9222, 4242);

    expect(pidfilePath(9222, root)).toBe(join(root, "cdp-pilot-9222.pid"));
    expect(await readFile(join(root, "cdp-pilot-9222.pid"), "utf-8")).toBe("4242\n");
    expect(await store.read(9222)).toBe(4242);
  });

  it("reads missing or malformed pidfiles as null", async () => {
    const store = createPidfileStore(root);
    await writeFile(join(root, "cdp-pilot-9223.pid"), "not-a-pid");
    await writeFile(join(root, "cdp-pilot-9224.pid"), "0\n");

    expect(await store.read(9222)).toBeNull();
    expect(await store.read(9223)).toBeNull();
    expect(await store.read(9224)).toBeNull();
  });

  it("lists recorded ports in numeric order and ignores other files", async () => {
    const store = createPidfileStore(root);
    await store.write(9400, 3);
    await store.write(9222, 1);
    await store.write(10000, 2);
    await writeFile(join(root, "cdp-pilot-profile-9222-abc"), "");
    await writeFile(join(root, "notes.pid"), "");

    expect(await store.list()).toEqual([9222, 9400, 10000]);
  });

  it("treats a missing directory as empty", async () => {
    const store = createPidfileStore(join(root, "absent"));

    expect(await store.list()).toEqual([]);
    expect(await store.read(9222)).toBeNull();
  });

  it("removes a pidfile idempotently", async () => {
    const store = createPidfileStore(root);
    await store.write(9222, 4242);

    await store.remove(9222);
    await store.remove(9222);

    expect(await readdir(root)).toEqual([]);
  });
});
