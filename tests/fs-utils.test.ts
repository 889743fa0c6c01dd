import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { writeFileAtomic } from "../src/utils/fs";

describe("writeFileAtomic", () => {
  let testDir = "";

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "cdp-pilot-fs-"));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it("creates the directory if it does not exist", async () => {
    const target = path.join(testDir, "nested", "shots", "page.jpg");
    await writeFileAtomic(target, "content");

    expect(fs.readFileSync(target, "utf-8")).toBe("content");
  });

  it("writes binary content unchanged", async () => {
    const target = path.join(testDir, "page.png");
    const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0xff]);

    await writeFileAtomic(target, bytes);

    expect(fs.readFileSync(target).equals(bytes)).toBe(true);
  });

  it("overwrites an existing file and leaves no temp files behind", async () => {
    const target = path.join(testDir, "state.json");
    fs.writeFileSync(target, '{"old": true}');

    await writeFileAtomic(target, '{"new": true}');

    expect(fs.readFileSync(target, "utf-8")).toBe('{"new": true}');
    expect(fs.readdirSync(testDir)).toEqual(["state.json"]);
  });

  it("applies the requested mode", async () => {
    const target = path.join(testDir, "private.txt");
    await writeFileAtomic(target, "x", { mode: 0o600 });

    expect(fs.statSync(target).mode & 0o777).toBe(0o600);
  });

  it("cleans up when the rename fails", async () => {
    const target = path.join(testDir, "occupied");
    fs.mkdirSync(path.join(target, "child"), { recursive: true });

    await expect(writeFileAtomic(target, "data")).rejects.toThrow();
    expect(fs.readdirSync(testDir)).toEqual(["occupied"]);
  });

  it("does not block the event loop while writing", async () => {
    const target = path.join(testDir, "shot.jpg");
    let ticked = false;
    setImmediate(() => {
      ticked = true;
    });

    await writeFileAtomic(target, Buffer.alloc(1024));

    expect(ticked).toBe(true);
    expect(fs.statSync(target).size).toBe(1024);
  });
});
