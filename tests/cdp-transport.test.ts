import { describe, it, expect, afterEach } from "vitest";
import { createServer as createNetServer, type AddressInfo, type Socket } from "net";
import { AutomationError } from "../src/core/errors";
import { createLogger, type LogEnvelope } from "../src/core/logging";
import { attachToPage, CdpTransport, withConnection } from "../src/cdp/transport";
import { FakeBrowser } from "./support/fake-browser";

const quietLogger = (entries: LogEnvelope[] = []) => createLogger("test", (entry) => entries.push(entry), "debug");

const codeOf = (error: unknown): string | undefined => {
  return error instanceof AutomationError ? error.code : undefined;
};

describe("CdpTransport", () => {
  let browser: FakeBrowser | null = null;
  const transports: CdpTransport[] = [];

  const openTransport = async (options: ConstructorParameters<typeof CdpTransport>[0] = {}): Promise<CdpTransport> => {
    if (!browser) throw new Error("fake browser not started");
    const transport = new CdpTransport({ logger: quietLogger(), ...options });
    transports.push(transport);
    await transport.connect(browser.pageWsUrl);
    return transport;
  };

  afterEach(async () => {
    for (const transport of transports.splice(0)) {
      await transport.close();
    }
    if (browser) {
      await browser.close();
      browser = null;
    }
  });

  it("attaches and resolves a command", async () => {
    browser = await FakeBrowser.start();
    browser.onCommand((command, socket) => {
      browser?.reply(socket, command.id, { frameId: "frame-1" });
    });

    const transport = await openTransport();
    expect(transport.state).toBe("attached");

    const result = await transport.send("Page.navigate", { url: "https://example.test/" });
    expect(result).toEqual({ frameId: "frame-1" });
    expect(browser.received[0]).toEqual({ id: 1, method: "Page.navigate", params: { url: "https://example.test/" } });
  });

  it("matches results by id regardless of arrival order", async () => {
    browser = await FakeBrowser.start();
    browser.onCommand((_command, socket) => {
      if (!browser || browser.received.length < 3) return;
      for (const id of [3, 1, 2]) {
        browser.reply(socket, id, { echoed: id * 10 });
      }
    });

    const transport = await openTransport();
    const results = await Promise.all([
      transport.send("Runtime.evaluate", { expression: "1" }),
      transport.send("Runtime.evaluate", { expression: "2" }),
      transport.send("Runtime.evaluate", { expression: "3" })
    ]);

    expect(results).toEqual([{ echoed: 10 }, { echoed: 20 }, { echoed: 30 }]);
    expect(browser.received.map((command) => command.id)).toEqual([1, 2, 3]);
    expect(transport.pendingCount).toBe(0);
  });

  it("allocates strictly increasing ids", async () => {
    browser = await FakeBrowser.start();
    browser.onCommand((command, socket) => browser?.reply(socket, command.id));

    const transport = await openTransport();
    await transport.send("A.one");
    await Promise.all([transport.send("A.two"), transport.send("A.three")]);
    await transport.send("A.four");

    expect(browser.received.map((command) => command.id)).toEqual([1, 2, 3, 4]);
  });

  it("cancels every pending command on close", async () => {
    browser = await FakeBrowser.start();
    const transport = await openTransport();

    const pending = [
      transport.send("Page.navigate", { url: "https://example.test/a" }),
      transport.send("DOM.getDocument"),
      transport.send("Runtime.evaluate", { expression: "1" })
    ];
    const settled = Promise.allSettled(pending);
    expect(transport.pendingCount).toBe(3);

    await transport.close();
    const outcomes = await settled;

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["rejected", "rejected", "rejected"]);
    for (const outcome of outcomes) {
      expect(outcome.status === "rejected" ? codeOf(outcome.reason) : undefined).toBe("cancelled");
    }
    expect(transport.pendingCount).toBe(0);
    expect(transport.state).toBe("closed");
  });

  it("fails fast with not_connected before connect and after close", async () => {
    browser = await FakeBrowser.start();
    const idle = new CdpTransport({ logger: quietLogger() });
    await expect(idle.send("Page.enable")).rejects.toMatchObject({ code: "not_connected" });

    const transport = await openTransport();
    await transport.close();
    await transport.close();
    await expect(transport.send("Page.enable")).rejects.toMatchObject({
      code: "not_connected",
      details: { method: "Page.enable", state: "closed" }
    });
  });

  it("times out unanswered commands without retrying", async () => {
    browser = await FakeBrowser.start();
    const transport = await openTransport({ commandTimeoutMs: 50 });

    await expect(transport.send("DOM.getDocument")).rejects.toMatchObject({
      code: "command_timeout",
      details: { method: "DOM.getDocument", id: 1, timeoutMs: 50 }
    });
    expect(browser.received).toHaveLength(1);
    expect(transport.pendingCount).toBe(0);
  });

  it("rejects protocol error replies with the remote message", async () => {
    browser = await FakeBrowser.start();
    browser.onCommand((command, socket) => {
      browser?.replyError(socket, command.id, "No node with given id found");
    });
    const transport = await openTransport();

    const error = await transport.send("DOM.getBoxModel", { nodeId: 42 }).catch((caught: unknown) => caught);
    expect(codeOf(error)).toBe("protocol_error");
    expect(error).toMatchObject({
      message: "DOM.getBoxModel failed: No node with given id found",
      details: { method: "DOM.getBoxModel", remoteCode: -32000 }
    });
  });

  it("drops late and duplicate results without failing the connection", async () => {
    browser = await FakeBrowser.start();
    browser.onCommand((command, socket) => {
      browser?.reply(socket, 999, { stray: true });
      browser?.reply(socket, command.id, { ok: command.id });
      browser?.reply(socket, command.id, { ok: "duplicate" });
    });
    const entries: LogEnvelope[] = [];
    const transport = await openTransport({ logger: quietLogger(entries) });

    expect(await transport.send("Page.enable")).toEqual({ ok: 1 });
    expect(await transport.send("DOM.enable")).toEqual({ ok: 2 });
    expect(transport.state).toBe("attached");

    const unmatched = entries.filter((entry) => entry.event === "cdp.result.unmatched");
    expect(unmatched.length).toBeGreaterThanOrEqual(2);
    expect(unmatched[0]?.data).toEqual({ id: 999 });
  });

  it("ignores frames that are not JSON objects", async () => {
    browser = await FakeBrowser.start();
    browser.onCommand((command, socket) => {
      browser?.sendRaw("not json");
      browser?.reply(socket, command.id, { ok: true });
    });
    const entries: LogEnvelope[] = [];
    const transport = await openTransport({ logger: quietLogger(entries) });

    expect(await transport.send("Page.enable")).toEqual({ ok: true });
    expect(entries.find((entry) => entry.event === "cdp.frame.invalid")?.data).toEqual({ reason: "frame is not a JSON object" });
  });

  it("delivers events to subscribers in wire order", async () => {
    browser = await FakeBrowser.start();
    const transport = await openTransport();
    const seen: number[] = [];
    const wildcard: string[] = [];
    transport.subscribe("Page.lifecycleEvent", (params) => {
      seen.push(Number(params.seq));
    });
    transport.subscribe("*", (_params, event) => {
      wildcard.push(event.method);
    });

    const last = transport.waitForEvent("Page.loadEventFired", 1000);
    browser.emitEvent("Page.lifecycleEvent", { seq: 1 });
    browser.emitEvent("Page.lifecycleEvent", { seq: 2 });
    browser.emitEvent("Page.lifecycleEvent", { seq: 3 });
    browser.emitEvent("Page.loadEventFired", { timestamp: 1 });
    await last;

    expect(seen).toEqual([1, 2, 3]);
    expect(wildcard).toEqual([
      "Page.lifecycleEvent",
      "Page.lifecycleEvent",
      "Page.lifecycleEvent",
      "Page.loadEventFired"
    ]);
  });

  it("keeps delivering events when one handler throws", async () => {
    browser = await FakeBrowser.start();
    const entries: LogEnvelope[] = [];
    const transport = await openTransport({ logger: quietLogger(entries) });
    const received: string[] = [];
    transport.subscribe("Runtime.consoleAPICalled", () => {
      throw new Error("handler exploded");
    });
    transport.subscribe("Runtime.consoleAPICalled", (params) => {
      received.push(String(params.type));
    });

    const done = transport.waitForEvent("Runtime.consoleAPICalled", 1000);
    browser.emitEvent("Runtime.consoleAPICalled", { type: "log" });
    await done;

    expect(received).toEqual(["log"]);
    expect(entries.some((entry) => entry.event === "cdp.event.handler_failed")).toBe(true);
  });

  it("stops delivering after unsubscribe", async () => {
    browser = await FakeBrowser.start();
    const transport = await openTransport();
    const received: number[] = [];
    const unsubscribe = transport.subscribe("Page.frameNavigated", (params) => {
      received.push(Number(params.n));
    });

    const first = transport.waitForEvent("Page.frameNavigated", 1000);
    browser.emitEvent("Page.frameNavigated", { n: 1 });
    await first;
    unsubscribe();

    const second = transport.waitForEvent("Page.frameNavigated", 1000);
    browser.emitEvent("Page.frameNavigated", { n: 2 });
    await second;

    expect(received).toEqual([1]);
  });

  it("resolves waitForEvent only for events passing the predicate", async () => {
    browser = await FakeBrowser.start();
    const transport = await openTransport();

    const matched = transport.waitForEvent("Page.lifecycleEvent", 1000, (params) => params.name === "load");
    browser.emitEvent("Page.lifecycleEvent", { name: "init" });
    browser.emitEvent("Page.lifecycleEvent", { name: "load" });

    await expect(matched).resolves.toEqual({ name: "load" });
    await expect(transport.waitForEvent("Page.loadEventFired", 30)).rejects.toMatchObject({ code: "wait_timeout" });
  });

  it("abandons an event wait when its signal aborts", async () => {
    browser = await FakeBrowser.start();
    const transport = await openTransport();
    const abandon = new AbortController();
    let delivered = 0;

    const waiting = transport.waitForEvent("Page.loadEventFired", 5000, () => {
      delivered += 1;
      return true;
    }, abandon.signal);
    abandon.abort();

    await expect(waiting).rejects.toMatchObject({ code: "cancelled", message: "Stopped waiting for Page.loadEventFired" });
    const later = transport.waitForEvent("Page.loadEventFired", 1000);
    browser.emitEvent("Page.loadEventFired", { timestamp: 2 });
    await expect(later).resolves.toEqual({ timestamp: 2 });
    expect(delivered).toBe(0);
    await expect(transport.waitForEvent("Page.loadEventFired", 1000, undefined, abandon.signal)).rejects.toMatchObject({
      code: "cancelled"
    });
  });

  it("marks the connection lost on an unexpected drop and does not reconnect", async () => {
    browser = await FakeBrowser.start();
    const transport = await openTransport();
    const disconnects: number[] = [];
    transport.onDisconnect((detail) => {
      disconnects.push(detail.code);
    });

    const pending = transport.send("Page.navigate", { url: "https://example.test/slow" });
    const outcome = pending.catch((error: unknown) => error);
    const waiting = transport.waitForEvent("Page.loadEventFired", 5000).catch((error: unknown) => error);
    await new Promise((resolve) => setTimeout(resolve, 20));
    browser.dropConnections();

    expect(codeOf(await outcome)).toBe("connection_lost");
    expect(codeOf(await waiting)).toBe("connection_lost");
    expect(transport.state).toBe("closed");
    expect(disconnects).toHaveLength(1);

    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(transport.state).toBe("closed");
    await expect(transport.send("Page.enable")).rejects.toMatchObject({ code: "not_connected" });
  });

  it("fails with connection_error when the endpoint is unreachable", async () => {
    const probe = createNetServer();
    await new Promise<void>((resolve) => probe.listen(0, "127.0.0.1", resolve));
    const port = (probe.address() as AddressInfo).port;
    await new Promise<void>((resolve) => probe.close(() => resolve()));

    const transport = new CdpTransport({ logger: quietLogger() });
    transports.push(transport);
    await expect(transport.connect(`ws://127.0.0.1:${port}/devtools/page/x`)).rejects.toMatchObject({
      code: "connection_error"
    });
    expect(transport.state).toBe("disconnected");
  });

  it("fails with connection_error when the handshake stalls", async () => {
    const sockets: Socket[] = [];
    const silent = createNetServer((socket) => {
      sockets.push(socket);
    });
    await new Promise<void>((resolve) => silent.listen(0, "127.0.0.1", resolve));
    const port = (silent.address() as AddressInfo).port;

    const transport = new CdpTransport({ handshakeTimeoutMs: 100, logger: quietLogger() });
    transports.push(transport);
    try {
      await expect(transport.connect(`ws://127.0.0.1:${port}/devtools/page/x`)).rejects.toMatchObject({
        code: "connection_error"
      });
    } finally {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve) => silent.close(() => resolve()));
    }
  });

  it("rejects non-local endpoints unless allowed", async () => {
    const transport = new CdpTransport({ logger: quietLogger() });
    transports.push(transport);
    await expect(transport.connect("ws://example.com:9222/devtools/page/x")).rejects.toMatchObject({
      code: "connection_error",
      message: "Non-local CDP endpoints are disabled by default."
    });
  });

  it("shares one attempt between concurrent connect callers", async () => {
    browser = await FakeBrowser.start();
    const transport = new CdpTransport({ logger: quietLogger() });
    transports.push(transport);

    await Promise.all([transport.connect(browser.pageWsUrl), transport.connect(browser.pageWsUrl)]);

    expect(transport.state).toBe("attached");
    expect(browser.sockets).toHaveLength(1);
  });

  it("releases the connection when the scoped callback throws", async () => {
    browser = await FakeBrowser.start();
    const captured: CdpTransport[] = [];

    await expect(withConnection(browser.pageWsUrl, async (transport) => {
      captured.push(transport);
      throw new Error("task failed");
    }, { logger: quietLogger() })).rejects.toThrow("task failed");

    expect(captured).toHaveLength(1);
    expect(captured[0]?.state).toBe("closed");
  });

  it("attaches to the first page target of a host:port endpoint", async () => {
    browser = await FakeBrowser.start();
    const transport = await attachToPage(browser.address, { logger: quietLogger() });
    transports.push(transport);

    expect(transport.targetId).toBe("page-1");
    expect(transport.state).toBe("attached");
  });

  it("opens a blank page when the browser lists none", async () => {
    browser = await FakeBrowser.start({ targets: [] });
    const transport = await attachToPage(browser.port, { logger: quietLogger() });
    transports.push(transport);

    expect(transport.targetId).toBe("page-new");
  });
});
