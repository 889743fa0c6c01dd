import { spawn } from "child_process";
import { findChromeExecutable, type ChromeLocatorOptions } from "../cache/chrome-locator";
import { createProfileDir, removeProfileDir } from "../cache/paths";
import { createPidfileStore, type PidfileStore } from "../cache/pidfiles";
import { fetchVersion } from "../cdp/targets";
import type { BrowserVersion } from "../cdp/protocol";
import { loadConfig, type PilotConfig, type PortRange } from "../config";
import { AutomationError, describeCause } from "../core/errors";
import { createLogger, type Logger } from "../core/logging";
import { findFreePort, isPortFree, type PortProbe } from "./ports";
import { signalPid, signalProcessTree } from "./signals";

export type InstanceState = "starting" | "running" | "stopped";

export type BrowserInstance = {
  port: number;
  pid: number | null;
  headless: boolean;
  profileDir: string | null;
  executablePath: string;
  state: InstanceState;
  startedAt: string;
};

/** The part of a child process the manager relies on. */
export interface BrowserProcess {
  readonly pid?: number;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
}

export type StartOptions = {
  /** Preferred port; `null` ignores the configured preference. */
  port?: number | null;
  headless?: boolean;
  rangeStart?: number;
  rangeEnd?: number;
  flags?: string[];
  chromePath?: string;
};

export type StartResult = {
  port: number;
  endpoint: string;
  wsEndpoint: string;
  instance: BrowserInstance;
};

/** A browser recorded in a pidfile, whether or not this process started it. */
export type ExternalBrowser = {
  port: number;
  pid: number | null;
  alive: boolean;
};

export type ProcessManagerConfig = Partial<Pick<
  PilotConfig,
  "headless" | "port" | "portRange" | "instanceCount" | "flags" | "chromePath" | "startupTimeoutMs" | "killGraceMs"
>>;

export type ProcessManagerDeps = {
  loadConfig?: (overrides: ProcessManagerConfig) => PilotConfig;
  spawnProcess?: (command: string, args: string[]) => BrowserProcess;
  signalProcess?: (child: BrowserProcess, signal: NodeJS.Signals) => void;
  signalPid?: (pid: number, signal: NodeJS.Signals | 0) => boolean;
  pidfiles?: PidfileStore;
  isPortFree?: PortProbe;
  probeEndpoint?: (port: number, timeoutMs: number) => Promise<BrowserVersion>;
  findChrome?: (options: ChromeLocatorOptions) => Promise<string | null>;
  createProfileDir?: (port: number) => Promise<string>;
  removeProfileDir?: (path: string) => Promise<void>;
  logger?: Logger;
  pollIntervalMs?: number;
};

type ManagedInstance = {
  info: BrowserInstance;
  child: BrowserProcess | null;
  exited: Promise<void> | null;
  hasExited: boolean;
  exitDetail: string | null;
  spawnFailure: Error | null;
  stopping: Promise<void> | null;
  pidfileWritten: boolean;
};

const PROBE_TIMEOUT_MS = 1000;

/** Spawns the browser as its own process group leader on POSIX, so stop() can reach its helpers. */
export function spawnBrowser(command: string, args: string[], platform: NodeJS.Platform = process.platform): BrowserProcess {
  return spawn(command, args, { stdio: "ignore", detached: platform !== "win32" });
}

const defaultDeps = (): Required<ProcessManagerDeps> => ({
  loadConfig: (overrides) => loadConfig(overrides),
  spawnProcess: (command, args) => spawnBrowser(command, args),
  signalProcess: (child, signal) => signalProcessTree(child, signal),
  signalPid: (pid, signal) => signalPid(pid, signal),
  pidfiles: createPidfileStore(),
  isPortFree: (port) => isPortFree(port),
  probeEndpoint: (port, timeoutMs) => fetchVersion(port, timeoutMs),
  findChrome: (options) => findChromeExecutable(options),
  createProfileDir: (port) => createProfileDir(port),
  removeProfileDir,
  logger: createLogger("browser.process"),
  pollIntervalMs: 200
});

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function buildChromeArgs(port: number, profileDir: string, headless: boolean, flags: string[] = []): string[] {
  return [
    `--remote-debugging-port=${port}`,
    `--user-data-dir=${profileDir}`,
    "--no-first-run",
    "--no-default-browser-check",
    ...(headless ? ["--headless=new"] : []),
    ...flags,
    "about:blank"
  ];
}

/**
 * Spawns and tracks debuggable browser processes, one per port.
 * Port selection runs under a single allocator lock and reserves the port
 * before the lock is released, so concurrent starts never share a port.
 */
export class ProcessManager {
  private instances = new Map<number, ManagedInstance>();
  private allocation: Promise<void> = Promise.resolve();
  private deps: Required<ProcessManagerDeps>;
  private headless: boolean;
  private defaultPort: number | undefined;
  private portRange: PortRange;
  private flags: string[];
  private chromePath: string | undefined;
  private startupTimeoutMs: number;
  private killGraceMs: number;
  private instanceCount: number;

  /** `config` wins over the environment and the config file, which `deps.loadConfig` resolves. */
  constructor(config: ProcessManagerConfig = {}, deps: ProcessManagerDeps = {}) {
    this.deps = { ...defaultDeps(), ...deps };
    const resolved = this.deps.loadConfig(config);
    this.headless = resolved.headless;
    this.defaultPort = resolved.port;
    this.portRange = resolved.portRange;
    this.instanceCount = resolved.instanceCount;
    this.flags = resolved.flags;
    this.chromePath = resolved.chromePath;
    this.startupTimeoutMs = resolved.startupTimeoutMs;
    this.killGraceMs = resolved.killGraceMs;
  }

  async start(options: StartOptions = {}): Promise<StartResult> {
    const headless = options.headless ?? this.headless;
    const range: PortRange = {
      start: options.rangeStart ?? this.portRange.start,
      end: options.rangeEnd ?? this.portRange.end
    };
    const executablePath = await this.deps.findChrome({ overridePath: options.chromePath ?? this.chromePath });
    if (!executablePath) {
      throw new AutomationError("spawn_error", "Chrome/Chromium executable not found; set chromePath or CDP_CHROME_PATH", {
        details: { chromePath: options.chromePath ?? this.chromePath ?? null }
      });
    }

    const preferred = options.port === null ? undefined : options.port ?? this.defaultPort;
    const entry = await this.reserve(range, preferred, headless, executablePath);
    const port = entry.info.port;
    try {
      const profileDir = await this.deps.createProfileDir(port);
      entry.info.profileDir = profileDir;
      this.ensureNotStopping(entry);

      const args = buildChromeArgs(port, profileDir, headless, [...this.flags, ...(options.flags ?? [])]);
      this.launch(entry, args);
      this.deps.logger.info("browser.spawn", {
        port,
        data: { executablePath, pid: entry.info.pid, headless, profileDir }
      });
      await this.recordPid(entry);

      const version = await this.waitUntilReady(entry);
      this.ensureNotStopping(entry);
      entry.info.state = "running";
      this.deps.logger.info("browser.ready", { port, data: { browser: version.browser, pid: entry.info.pid } });
      return {
        port,
        endpoint: `127.0.0.1:${port}`,
        wsEndpoint: version.webSocketDebuggerUrl ?? `ws://127.0.0.1:${port}/devtools/browser`,
        instance: { ...entry.info }
      };
    } catch (error) {
      // Release this attempt's own entry; a later start may already hold the port.
      entry.stopping ??= this.terminate(entry);
      await entry.stopping;
      if (error instanceof AutomationError) throw error;
      throw new AutomationError("spawn_error", `Failed to start browser on port ${port}: ${describeCause(error)}`, {
        details: { port, cause: describeCause(error) },
        cause: error
      });
    }
  }

  /** Starts `count` instances one after another; on failure the ones already started are stopped. */
  async startMany(count: number = this.instanceCount, options: StartOptions = {}): Promise<StartResult[]> {
    const started: StartResult[] = [];
    // Only the first instance asks for the preferred port.
    const followers: StartOptions = { ...options, port: null };
    try {
      for (let index = 0; index < count; index += 1) {
        started.push(await this.start(index === 0 ? options : followers));
      }
    } catch (error) {
      await Promise.all(started.map((result) => this.stop(result.port)));
      throw error;
    }
    return started;
  }

  /** Terminates the instance on `port`. Unknown or already stopped ports are a no-op. */
  async stop(port: number): Promise<void> {
    const entry = this.instances.get(port);
    if (!entry) return;
    entry.stopping ??= this.terminate(entry);
    await entry.stopping;
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.instances.keys()].map((port) => this.stop(port)));
  }

  /**
   * Stops the browser recorded in the pidfile for `port`, typically one
   * started by another process. Returns false when no pid is recorded.
   */
  async stopExternal(port: number): Promise<boolean> {
    if (this.instances.has(port)) {
      await this.stop(port);
      return true;
    }
    const pid = await this.deps.pidfiles.read(port);
    if (pid === null) return false;
    try {
      if (this.deps.signalPid(pid, "SIGTERM") && !(await this.pidExitsWithin(pid, this.killGraceMs))) {
        this.deps.logger.warn("browser.stop.escalate", { port, data: { pid, external: true } });
        this.deps.signalPid(pid, "SIGKILL");
      }
    } finally {
      await this.deps.pidfiles.remove(port);
    }
    this.deps.logger.info("browser.stop.external", { port, data: { pid } });
    return true;
  }

  /** Every browser with a pidfile, sorted by port. Stale records report `alive: false`. */
  async listExternal(): Promise<ExternalBrowser[]> {
    const ports = await this.deps.pidfiles.list();
    return await Promise.all(ports.map(async (port) => {
      const pid = await this.deps.pidfiles.read(port);
      return { port, pid, alive: pid !== null && this.deps.signalPid(pid, 0) };
    }));
  }

  /** Ports of running instances; each iteration reads the current table. */
  listRunning(): Iterable<number> {
    const instances = this.instances;
    return {
      *[Symbol.iterator]() {
        for (const [port, entry] of instances) {
          if (entry.info.state === "running") yield port;
        }
      }
    };
  }

  isRunning(port: number): boolean {
    return this.instances.get(port)?.info.state === "running";
  }

  get(port: number): BrowserInstance | undefined {
    const entry = this.instances.get(port);
    return entry ? { ...entry.info } : undefined;
  }

  /**
   * Health check for one instance. A process that has exited or stopped
   * answering its metadata endpoint is marked stopped; it is not restarted.
   */
  async probe(port: number): Promise<boolean> {
    const entry = this.instances.get(port);
    if (!entry || entry.info.state !== "running") return false;
    if (entry.hasExited) {
      this.markStopped(entry, entry.exitDetail ?? "process exited");
      return false;
    }
    try {
      await this.deps.probeEndpoint(port, PROBE_TIMEOUT_MS);
      return entry.info.state === "running";
    } catch (error) {
      this.markStopped(entry, `metadata endpoint unreachable: ${describeCause(error)}`);
      return false;
    }
  }

  async probeAll(): Promise<Map<number, boolean>> {
    const ports = [...this.instances.keys()];
    const outcomes = await Promise.all(ports.map(async (port) => [port, await this.probe(port)] as const));
    return new Map(outcomes);
  }

  private async withAllocatorLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.allocation.then(fn);
    this.allocation = run.then(() => undefined, () => undefined);
    return await run;
  }

  private async reserve(
    range: PortRange,
    preferred: number | undefined,
    headless: boolean,
    executablePath: string
  ): Promise<ManagedInstance> {
    return await this.withAllocatorLock(async () => {
      const port = await findFreePort(range, {
        preferred,
        isTaken: (candidate) => this.instances.has(candidate),
        probe: this.deps.isPortFree
      });
      if (port === null) {
        throw new AutomationError("no_port_available", `No free port available in range ${range.start}-${range.end}`, {
          details: { rangeStart: range.start, rangeEnd: range.end }
        });
      }
      const entry: ManagedInstance = {
        info: {
          port,
          pid: null,
          headless,
          profileDir: null,
          executablePath,
          state: "starting",
          startedAt: new Date().toISOString()
        },
        child: null,
        exited: null,
        hasExited: false,
        exitDetail: null,
        spawnFailure: null,
        stopping: null,
        pidfileWritten: false
      };
      this.instances.set(port, entry);
      return entry;
    });
  }

  private launch(entry: ManagedInstance, args: string[]): void {
    const child = this.deps.spawnProcess(entry.info.executablePath, args);
    entry.child = child;
    entry.info.pid = typeof child.pid === "number" ? child.pid : null;
    entry.exited = new Promise<void>((resolve) => {
      child.once("exit", (code, signal) => {
        entry.hasExited = true;
        entry.exitDetail = signal ? `signal ${signal}` : `exit code ${code ?? "unknown"}`;
        if (entry.info.state === "running" && !entry.stopping) {
          this.markStopped(entry, entry.exitDetail);
        }
        resolve();
      });
      child.once("error", (error) => {
        entry.spawnFailure = error;
        entry.hasExited = true;
        entry.exitDetail = error.message;
        this.deps.logger.error("browser.spawn.failed", {
          port: entry.info.port,
          data: { executablePath: entry.info.executablePath, cause: error.message }
        });
        resolve();
      });
    });
  }

  private async waitUntilReady(entry: ManagedInstance): Promise<BrowserVersion> {
    const port = entry.info.port;
    const deadline = Date.now() + this.startupTimeoutMs;
    let lastError: unknown = null;
    while (Date.now() < deadline) {
      this.ensureNotStopping(entry);
      if (entry.spawnFailure) {
        throw new AutomationError("spawn_error", `Failed to spawn ${entry.info.executablePath}: ${entry.spawnFailure.message}`, {
          details: { port, executablePath: entry.info.executablePath },
          cause: entry.spawnFailure
        });
      }
      if (entry.hasExited) {
        throw new AutomationError("spawn_error", `Browser on port ${port} exited prematurely (${entry.exitDetail ?? "unknown"})`, {
          details: { port, exit: entry.exitDetail }
        });
      }
      try {
        return await this.deps.probeEndpoint(port, Math.min(PROBE_TIMEOUT_MS, Math.max(1, deadline - Date.now())));
      } catch (error) {
        lastError = error;
      }
      await delay(this.deps.pollIntervalMs);
    }
    throw new AutomationError("spawn_error", `Browser on port ${port} did not become ready within ${this.startupTimeoutMs}ms`, {
      details: {
        port,
        startupTimeoutMs: this.startupTimeoutMs,
        lastError: lastError === null ? null : describeCause(lastError)
      }
    });
  }

  private ensureNotStopping(entry: ManagedInstance): void {
    if (entry.stopping || this.instances.get(entry.info.port) !== entry) {
      throw new AutomationError("cancelled", `Start on port ${entry.info.port} was cancelled by stop()`, {
        details: { port: entry.info.port }
      });
    }
  }

  private async recordPid(entry: ManagedInstance): Promise<void> {
    const pid = entry.info.pid;
    if (pid === null) return;
    try {
      await this.deps.pidfiles.write(entry.info.port, pid);
      entry.pidfileWritten = true;
    } catch (error) {
      this.deps.logger.warn("browser.pidfile.write_failed", {
        port: entry.info.port,
        data: { pid, cause: describeCause(error) }
      });
    }
  }

  private async forgetPid(entry: ManagedInstance): Promise<void> {
    if (!entry.pidfileWritten) return;
    entry.pidfileWritten = false;
    try {
      await this.deps.pidfiles.remove(entry.info.port);
    } catch (error) {
      this.deps.logger.warn("browser.pidfile.cleanup_failed", {
        port: entry.info.port,
        data: { pid: entry.info.pid, cause: describeCause(error) }
      });
    }
  }

  private markStopped(entry: ManagedInstance, reason: string): void {
    if (entry.info.state === "stopped") return;
    entry.info.state = "stopped";
    this.deps.logger.warn("browser.exited", { port: entry.info.port, data: { pid: entry.info.pid, reason } });
  }

  private async terminate(entry: ManagedInstance): Promise<void> {
    const port = entry.info.port;
    const wasRunning = entry.info.state === "running";
    entry.info.state = "stopped";
    try {
      await this.killAndReap(entry);
    } finally {
      // The pidfile goes before the port is released, so it never removes a successor's record.
      await this.forgetPid(entry);
      if (this.instances.get(port) === entry) {
        this.instances.delete(port);
      }
      if (entry.info.profileDir) {
        try {
          await this.deps.removeProfileDir(entry.info.profileDir);
        } catch (error) {
          this.deps.logger.warn("browser.profile.cleanup_failed", {
            port,
            data: { profileDir: entry.info.profileDir, cause: describeCause(error) }
          });
        }
      }
    }
    this.deps.logger.info("browser.stop", { port, data: { pid: entry.info.pid, wasRunning } });
  }

  private async killAndReap(entry: ManagedInstance): Promise<void> {
    const child = entry.child;
    const exited = entry.exited;
    if (!child || !exited || entry.hasExited) return;

    this.deps.signalProcess(child, "SIGTERM");
    if (await this.exitsWithin(exited, this.killGraceMs)) return;

    this.deps.logger.warn("browser.stop.escalate", { port: entry.info.port, data: { pid: entry.info.pid } });
    this.deps.signalProcess(child, "SIGKILL");
    if (!(await this.exitsWithin(exited, this.killGraceMs))) {
      this.deps.logger.error("browser.stop.unreaped", { port: entry.info.port, data: { pid: entry.info.pid } });
    }
  }

  private async pidExitsWithin(pid: number, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (this.deps.signalPid(pid, 0)) {
      if (Date.now() >= deadline) return false;
      await delay(this.deps.pollIntervalMs);
    }
    return true;
  }

  private async exitsWithin(exited: Promise<void>, timeoutMs: number): Promise<boolean> {
    let timeoutId: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timeoutId = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([exited.then(() => true), timedOut]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
