import type { BrowserProcess } from "./process-manager";

type KillFn = (pid: number, signal: NodeJS.Signals | number) => boolean;

export type SignalOptions = {
  platform?: NodeJS.Platform;
  kill?: KillFn;
};

const defaultKill: KillFn = (pid, signal) => process.kill(pid, signal);

export function isNoSuchProcess(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ESRCH";
}

/**
 * Browsers are spawned as group leaders on POSIX, so the whole tree
 * (renderers, GPU and zygote helpers) is signalled through the negative pid.
 */
export function signalProcessTree(child: BrowserProcess, signal: NodeJS.Signals, options: SignalOptions = {}): void {
  const platform = options.platform ?? process.platform;
  const kill = options.kill ?? defaultKill;
  const pid = child.pid;
  if (platform !== "win32" && typeof pid === "number") {
    try {
      kill(-pid, signal);
      return;
    } catch (error) {
      if (!isNoSuchProcess(error)) throw error;
    }
  }
  child.kill(signal);
}

/**
 * Signals a browser known only by pid: its process group first, then the
 * pid itself. Signal 0 checks for existence. Returns false when neither exists.
 */
export function signalPid(pid: number, signal: NodeJS.Signals | 0, options: SignalOptions = {}): boolean {
  const platform = options.platform ?? process.platform;
  const kill = options.kill ?? defaultKill;
  const targets = platform === "win32" ? [pid] : [-pid, pid];
  for (const target of targets) {
    try {
      kill(target, signal);
      return true;
    } catch (error) {
      if (!isNoSuchProcess(error)) throw error;
    }
  }
  return false;
}
