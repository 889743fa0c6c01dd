import { randomUUID } from "crypto";
import { WebSocket } from "ws";
import { AutomationError, describeCause } from "../core/errors";
import { createLogger, type Logger } from "../core/logging";
import { ensureLocalEndpoint } from "../utils/endpoint-validation";
import {
  decodeFrame,
  encodeCommand,
  type CdpEvent,
  type CdpParams,
  type CdpResult
} from "./protocol";
import { resolvePageTarget } from "./targets";

export type ConnectionState = "disconnected" | "connecting" | "attached" | "closed";

export type CdpTransportOptions = {
  handshakeTimeoutMs?: number;
  commandTimeoutMs?: number;
  closeTimeoutMs?: number;
  allowNonLocal?: boolean;
  targetId?: string;
  logger?: Logger;
};

export type SendOptions = {
  timeoutMs?: number;
  sessionId?: string;
};

export type EventHandler = (params: CdpParams, event: CdpEvent) => void;

export type DisconnectDetail = {
  code: number;
  reason: string;
};

export type DisconnectHandler = (detail: DisconnectDetail) => void;

/** The slice of a transport that actions need; lets tests drive the executor without a socket. */
export interface CommandChannel {
  send(method: string, params?: CdpParams, options?: SendOptions): Promise<CdpParams>;
  subscribe(eventName: string, handler: EventHandler): () => void;
  waitForEvent(
    eventName: string,
    timeoutMs: number,
    predicate?: (params: CdpParams) => boolean,
    signal?: AbortSignal
  ): Promise<CdpParams>;
}

type PendingCommand = {
  id: number;
  method: string;
  resolve: (value: CdpParams) => void;
  reject: (error: AutomationError) => void;
  timeoutId: NodeJS.Timeout;
};

type EventWaiter = (error: AutomationError) => void;

export const ALL_EVENTS = "*";

const rawToText = (data: WebSocket.RawData): string => {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
};

const abandonedWait = (eventName: string): AutomationError => {
  return new AutomationError("cancelled", `Stopped waiting for ${eventName}`, { details: { event: eventName } });
};

/**
 * One persistent DevTools connection. Commands are correlated by id, so any
 * number may be outstanding at once; frames without an id are events.
 */
export class CdpTransport implements CommandChannel {
  readonly connectionId = randomUUID();
  private socket: WebSocket | null = null;
  private currentState: ConnectionState = "disconnected";
  private connectPromise: Promise<void> | null = null;
  private nextId = 1;
  private pending = new Map<number, PendingCommand>();
  private handlers = new Map<string, Set<EventHandler>>();
  private disconnectHandlers = new Set<DisconnectHandler>();
  private eventWaiters = new Set<EventWaiter>();
  private handshakeTimeoutMs: number;
  private commandTimeoutMs: number;
  private closeTimeoutMs: number;
  private allowNonLocal: boolean;
  private logger: Logger;
  private endpoint: string | null = null;
  private attachedTargetId: string | null;

  constructor(options: CdpTransportOptions = {}) {
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 5000;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 30000;
    this.closeTimeoutMs = options.closeTimeoutMs ?? 1000;
    this.allowNonLocal = options.allowNonLocal ?? false;
    this.attachedTargetId = options.targetId ?? null;
    this.logger = options.logger ?? createLogger("cdp.transport");
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get targetId(): string | null {
    return this.attachedTargetId;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  async connect(endpoint: string): Promise<void> {
    if (this.currentState === "attached") {
      return;
    }
    if (this.currentState === "closed") {
      throw new AutomationError("connection_error", "Connection was closed; create a new transport to reconnect", {
        details: { endpoint }
      });
    }
    if (this.connectPromise) {
      return await this.connectPromise;
    }

    const run = this.open(endpoint);
    this.connectPromise = run;
    try {
      await run;
    } finally {
      if (this.connectPromise === run) {
        this.connectPromise = null;
      }
    }
  }

  send(method: string, params: CdpParams = {}, options: SendOptions = {}): Promise<CdpParams> {
    const socket = this.socket;
    if (this.currentState !== "attached" || !socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new AutomationError("not_connected", `Cannot send ${method}: connection is ${this.currentState}`, {
        details: { method, state: this.currentState }
      }));
    }

    const id = this.nextId;
    this.nextId += 1;
    const timeoutMs = options.timeoutMs ?? this.commandTimeoutMs;
    const payload = encodeCommand({ id, method, params, sessionId: options.sessionId });

    return new Promise<CdpParams>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        if (!this.pending.delete(id)) return;
        this.logger.warn("cdp.command.timeout", {
          connectionId: this.connectionId,
          data: { id, method, timeoutMs }
        });
        reject(new AutomationError("command_timeout", `${method} (id ${id}) timed out after ${timeoutMs}ms`, {
          details: { method, id, timeoutMs }
        }));
      }, timeoutMs);

      this.pending.set(id, { id, method, resolve, reject, timeoutId });
      try {
        socket.send(payload, (error) => {
          if (error) {
            this.settleWithError(id, new AutomationError("connection_lost", `Failed to write ${method}: ${error.message}`, {
              details: { method, id },
              cause: error
            }));
          }
        });
      } catch (error) {
        this.settleWithError(id, new AutomationError("connection_lost", `Failed to write ${method}: ${describeCause(error)}`, {
          details: { method, id },
          cause: error
        }));
      }
    });
  }

  subscribe(eventName: string, handler: EventHandler): () => void {
    const set = this.handlers.get(eventName) ?? new Set<EventHandler>();
    set.add(handler);
    this.handlers.set(eventName, set);
    return () => {
      const current = this.handlers.get(eventName);
      if (!current) return;
      current.delete(handler);
      if (current.size === 0) {
        this.handlers.delete(eventName);
      }
    };
  }

  onDisconnect(handler: DisconnectHandler): () => void {
    this.disconnectHandlers.add(handler);
    return () => {
      this.disconnectHandlers.delete(handler);
    };
  }

  /** Resolves on the next matching event. Aborting `signal` rejects with `cancelled` and drops the subscription. */
  waitForEvent(
    eventName: string,
    timeoutMs: number,
    predicate: (params: CdpParams) => boolean = () => true,
    signal?: AbortSignal
  ): Promise<CdpParams> {
    if (this.currentState !== "attached") {
      return Promise.reject(new AutomationError("not_connected", `Cannot wait for ${eventName}: connection is ${this.currentState}`, {
        details: { event: eventName, state: this.currentState }
      }));
    }
    if (signal?.aborted) {
      return Promise.reject(abandonedWait(eventName));
    }

    return new Promise<CdpParams>((resolve, reject) => {
      const finish = (): void => {
        clearTimeout(timeoutId);
        unsubscribe();
        signal?.removeEventListener("abort", onAbort);
        this.eventWaiters.delete(fail);
      };
      const fail: EventWaiter = (error) => {
        finish();
        reject(error);
      };
      const onAbort = (): void => {
        fail(abandonedWait(eventName));
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      const timeoutId = setTimeout(() => {
        fail(new AutomationError("wait_timeout", `Timed out after ${timeoutMs}ms waiting for ${eventName}`, {
          details: { event: eventName, timeoutMs }
        }));
      }, timeoutMs);
      const unsubscribe = this.subscribe(eventName, (params) => {
        if (!predicate(params)) return;
        finish();
        resolve(params);
      });
      this.eventWaiters.add(fail);
    });
  }

  /** Releases the connection. Safe to call any number of times, from any state. */
  async close(): Promise<void> {
    if (this.currentState === "closed" && !this.socket) {
      return;
    }
    const wasAttached = this.currentState === "attached";
    this.currentState = "closed";
    this.failAll(() => new AutomationError("cancelled", "Connection closed by caller", {
      details: { connectionId: this.connectionId }
    }));
    this.handlers.clear();
    this.disconnectHandlers.clear();

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      await this.shutdownSocket(socket);
    }
    if (wasAttached) {
      this.logger.info("cdp.closed", { connectionId: this.connectionId, data: { endpoint: this.endpoint } });
    }
  }

  private async open(endpoint: string): Promise<void> {
    ensureLocalEndpoint(endpoint, this.allowNonLocal);
    this.endpoint = endpoint;
    this.currentState = "connecting";
    const socket = new WebSocket(endpoint, {
      perMessageDeflate: false,
      handshakeTimeout: this.handshakeTimeoutMs
    });
    this.socket = socket;

    try {
      await new Promise<void>((resolve, reject) => {
        const timeoutId = setTimeout(() => {
          cleanup();
          reject(new Error(`handshake did not complete within ${this.handshakeTimeoutMs}ms`));
        }, this.handshakeTimeoutMs);
        const onOpen = (): void => {
          cleanup();
          resolve();
        };
        const onError = (error: Error): void => {
          cleanup();
          reject(error);
        };
        const onClose = (): void => {
          cleanup();
          reject(new Error("socket closed before handshake"));
        };
        const cleanup = (): void => {
          clearTimeout(timeoutId);
          socket.removeListener("open", onOpen);
          socket.removeListener("error", onError);
          socket.removeListener("close", onClose);
        };
        socket.once("open", onOpen);
        socket.once("error", onError);
        socket.once("close", onClose);
      });
    } catch (error) {
      if (this.socket === socket) {
        this.socket = null;
      }
      socket.removeAllListeners();
      socket.on("error", () => undefined);
      socket.terminate();
      if (this.state === "closed") {
        throw new AutomationError("cancelled", "Connection closed while connecting", {
          details: { endpoint },
          cause: error
        });
      }
      this.currentState = "disconnected";
      this.logger.warn("cdp.connect.failed", {
        connectionId: this.connectionId,
        data: { endpoint, cause: describeCause(error) }
      });
      throw new AutomationError("connection_error", `Unable to attach to ${endpoint}: ${describeCause(error)}`, {
        details: { endpoint, cause: describeCause(error) },
        cause: error
      });
    }

    if (this.state === "closed") {
      socket.terminate();
      throw new AutomationError("cancelled", "Connection closed while connecting", { details: { endpoint } });
    }

    socket.on("message", (data) => {
      this.handleMessage(data);
    });
    socket.on("close", (code, reason) => {
      this.handleClose({ code, reason: reason.toString() });
    });
    socket.on("error", (error) => {
      // A close always follows; pending commands are failed there.
      this.logger.warn("cdp.socket.error", {
        connectionId: this.connectionId,
        data: { message: error.message }
      });
    });

    this.currentState = "attached";
    this.logger.info("cdp.attached", {
      connectionId: this.connectionId,
      data: { endpoint, targetId: this.attachedTargetId }
    });
  }

  private handleMessage(data: WebSocket.RawData): void {
    const frame = decodeFrame(rawToText(data));
    if (frame.kind === "invalid") {
      this.logger.warn("cdp.frame.invalid", {
        connectionId: this.connectionId,
        data: { reason: frame.reason }
      });
      return;
    }
    if (frame.kind === "result") {
      this.resolveResult(frame.message);
      return;
    }
    this.dispatchEvent(frame.message);
  }

  private resolveResult(message: CdpResult): void {
    const pending = this.pending.get(message.id);
    if (!pending) {
      this.logger.warn("cdp.result.unmatched", {
        connectionId: this.connectionId,
        data: { id: message.id }
      });
      return;
    }
    clearTimeout(pending.timeoutId);
    this.pending.delete(message.id);

    if ("error" in message) {
      pending.reject(new AutomationError("protocol_error", `${pending.method} failed: ${message.error.message}`, {
        details: {
          method: pending.method,
          id: pending.id,
          remoteCode: message.error.code,
          remoteMessage: message.error.message,
          ...(message.error.data ? { remoteData: message.error.data } : {})
        }
      }));
      return;
    }
    pending.resolve(message.result);
  }

  private dispatchEvent(event: CdpEvent): void {
    const targeted = this.handlers.get(event.method);
    const wildcard = this.handlers.get(ALL_EVENTS);
    const listeners = [...(targeted ?? []), ...(wildcard ?? [])];
    for (const handler of listeners) {
      try {
        handler(event.params, event);
      } catch (error) {
        this.logger.error("cdp.event.handler_failed", {
          connectionId: this.connectionId,
          data: { event: event.method, cause: describeCause(error) }
        });
      }
    }
  }

  private handleClose(detail: DisconnectDetail): void {
    if (this.currentState === "closed") {
      return;
    }
    this.currentState = "closed";
    this.socket = null;
    this.logger.warn("cdp.connection.lost", {
      connectionId: this.connectionId,
      data: { endpoint: this.endpoint, code: detail.code, reason: detail.reason, pending: this.pending.size }
    });
    this.failAll(() => new AutomationError("connection_lost", `Connection to ${this.endpoint ?? "endpoint"} dropped (code ${detail.code})`, {
      details: { code: detail.code, reason: detail.reason }
    }));
    for (const handler of [...this.disconnectHandlers]) {
      try {
        handler(detail);
      } catch (error) {
        this.logger.error("cdp.disconnect.handler_failed", {
          connectionId: this.connectionId,
          data: { cause: describeCause(error) }
        });
      }
    }
    this.disconnectHandlers.clear();
    this.handlers.clear();
  }

  private settleWithError(id: number, error: AutomationError): void {
    const pending = this.pending.get(id);
    if (!pending) return;
    clearTimeout(pending.timeoutId);
    this.pending.delete(id);
    pending.reject(error);
  }

  private failAll(buildError: () => AutomationError): void {
    const commands = [...this.pending.values()];
    this.pending.clear();
    for (const pending of commands) {
      clearTimeout(pending.timeoutId);
      const error = buildError();
      pending.reject(new AutomationError(error.code, `${pending.method} (id ${pending.id}): ${error.message}`, {
        details: { ...error.details, method: pending.method, id: pending.id }
      }));
    }
    const waiters = [...this.eventWaiters];
    this.eventWaiters.clear();
    for (const waiter of waiters) {
      waiter(buildError());
    }
  }

  private async shutdownSocket(socket: WebSocket): Promise<void> {
    socket.on("error", () => undefined);
    if (socket.readyState === WebSocket.CLOSED) {
      return;
    }
    if (socket.readyState !== WebSocket.OPEN) {
      socket.terminate();
      return;
    }
    await new Promise<void>((resolve) => {
      const timeoutId = setTimeout(() => {
        socket.terminate();
        resolve();
      }, this.closeTimeoutMs);
      socket.once("close", () => {
        clearTimeout(timeoutId);
        resolve();
      });
      socket.close(1000, "closed by client");
    });
  }
}

/** Attaches to the first page target of a `host:port` debugging endpoint. */
export async function attachToPage(
  endpointAddress: string | number,
  options: CdpTransportOptions = {}
): Promise<CdpTransport> {
  const target = await resolvePageTarget(endpointAddress, options.handshakeTimeoutMs);
  const transport = new CdpTransport({ ...options, targetId: target.targetId });
  try {
    await transport.connect(target.webSocketDebuggerUrl);
  } catch (error) {
    await transport.close();
    throw error;
  }
  return transport;
}

/** Runs `fn` with an attached transport and always releases it afterwards. */
export async function withConnection<T>(
  endpoint: string,
  fn: (transport: CdpTransport) => Promise<T>,
  options: CdpTransportOptions = {}
): Promise<T> {
  const transport = new CdpTransport(options);
  try {
    await transport.connect(endpoint);
    return await fn(transport);
  } finally {
    await transport.close();
  }
}
