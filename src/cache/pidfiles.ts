import { readdir, readFile, rm } from "fs/promises";
import { join } from "path";
import { writeFileAtomic } from "../utils/fs";
import { profileRoot } from "./paths";

const PIDFILE_PATTERN = /^cdp-pilot-(\d+)\.pid$/;

/** Per-port pid records, so another process can find and stop a browser it did not start. */
export type PidfileStore = {
  write(port: number, pid: number): Promise<void>;
  read(port: number): Promise<number | null>;
  remove(port: number): Promise<void>;
  list(): Promise<number[]>;
};

const isMissing = (error: unknown): boolean => {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
};

export function pidfilePath(port: number, root: string = profileRoot()): string {
  return join(root, `cdp-pilot-${port}.pid`);
}

export function createPidfileStore(root: string = profileRoot()): PidfileStore {
  return {
    async write(port, pid) {
      await writeFileAtomic(pidfilePath(port, root), `${pid}\n`);
    },
    async read(port) {
      let content: string;
      try {
        content = await readFile(pidfilePath(port, root), "utf-8");
      } catch (error) {
        if (isMissing(error)) return null;
        throw error;
      }
      const trimmed = content.trim();
      if (!/^\d+$/.test(trimmed)) return null;
      const pid = Number.parseInt(trimmed, 10);
      return pid > 0 ? pid : null;
    },
    async remove(port) {
      await rm(pidfilePath(port, root), { force: true });
    },
    async list() {
      let names: string[];
      try {
        names = await readdir(root);
      } catch (error) {
        if (isMissing(error)) return [];
        throw error;
      }
      const ports: number[] = [];
      for (const name of names) {
        const match = PIDFILE_PATTERN.exec(name);
        if (match?.[1]) ports.push(Number.parseInt(match[1], 10));
      }
      return ports.sort((a, b) => a - b);
    }
  };
}
