import { describe, it, expect, afterEach } from "vitest";
import { createServer, type Server } from "http";
import type { AddressInfo } from "net";
import { fetchVersion, listTargets, resolvePageTarget } from "../src/cdp/targets";
import { FakeBrowser } from "./support/fake-browser";

describe("target discovery", () => {
  let browser: FakeBrowser | null = null;
  let stalled: Server | null = null;

  afterEach(async () => {
    if (browser) {
      await browser.close();
      browser = null;
    }
    if (stalled) {
      stalled.closeAllConnections();
      await new Promise<void>((resolve) => stalled?.close(() => resolve()));
      stalled = null;
    }
  });

  it("reads /json/version", async () => {
    browser = await FakeBrowser.start();

    const version = await fetchVersion(browser.address);
    expect(version).toEqual({
      browser: "HeadlessChrome/120.0.0.0",
      protocolVersion: "1.3",
      userAgent: "test-agent",
      webSocketDebuggerUrl: `ws://127.0.0.1:${browser.port}/devtools/browser/browser-1`
    });
  });

  it("accepts a bare port", async () => {
    browser = await FakeBrowser.start();
    const version = await fetchVersion(browser.port);
    expect(version.browser).toBe("HeadlessChrome/120.0.0.0");
  });

  it("skips malformed target entries", async () => {
    browser = await FakeBrowser.start({
      targets: [
        { id: "sw-1", type: "service_worker", url: "https://example.test/sw.js" },
        { type: "page" },
        "garbage",
        { id: "page-9", type: "page", title: "Docs", url: "https://example.test/docs" }
      ]
    });

    const targets = await listTargets(browser.address);
    expect(targets).toEqual([
      { id: "sw-1", type: "service_worker", title: "", url: "https://example.test/sw.js" },
      { id: "page-9", type: "page", title: "Docs", url: "https://example.test/docs" }
    ]);
  });

  it("picks the first page with a debugger url", async () => {
    browser = await FakeBrowser.start({
      targets: [
        { id: "sw-1", type: "service_worker", webSocketDebuggerUrl: "ws://127.0.0.1:1/devtools/sw" },
        { id: "page-busy", type: "page", url: "https://example.test/" },
        { id: "page-2", type: "page", title: "Two", url: "https://example.test/2", webSocketDebuggerUrl: "ws://127.0.0.1:1/devtools/page/page-2" }
      ]
    });

    const page = await resolvePageTarget(browser.address);
    expect(page).toEqual({
      targetId: "page-2",
      title: "Two",
      url: "https://example.test/2",
      webSocketDebuggerUrl: "ws://127.0.0.1:1/devtools/page/page-2"
    });
  });

  it("opens a new tab when no page target exists", async () => {
    browser = await FakeBrowser.start({ targets: [] });

    const page = await resolvePageTarget(browser.address);
    expect(page.targetId).toBe("page-new");
    expect(page.webSocketDebuggerUrl).toBe(`ws://127.0.0.1:${browser.port}/devtools/page/page-new`);
  });

  it("reports an unreachable endpoint as connection_error", async () => {
    browser = await FakeBrowser.start();
    const port = browser.port;
    await browser.close();
    browser = null;

    await expect(fetchVersion(port)).rejects.toMatchObject({
      code: "connection_error",
      details: { endpoint: `127.0.0.1:${port}`, path: "/json/version" }
    });
  });

  it("times out a metadata request that never answers", async () => {
    stalled = createServer(() => undefined);
    await new Promise<void>((resolve) => stalled?.listen(0, "127.0.0.1", resolve));
    const port = (stalled.address() as AddressInfo).port;

    await expect(listTargets(port, 50)).rejects.toMatchObject({
      code: "connection_error",
      message: `Debugging endpoint 127.0.0.1:${port} did not answer /json/list: Request timed out after 50ms`
    });
  });
});
