import type { CdpParams } from "../cdp/protocol";
import type { CommandChannel } from "../cdp/transport";
import type { ScreenshotConfig } from "../config";
import { AutomationError, describeCause, hasErrorCode } from "../core/errors";
import { createLogger, type Logger } from "../core/logging";
import { writeFileAtomic } from "../utils/fs";
import { keyForCharacter, parseChord, type KeyDefinition } from "./keys";
import {
  attributeScript,
  fillScript,
  findByTextScript,
  linksScript,
  pageInfoScript,
  pageTextScript,
  predicateScript,
  scrollIntoViewScript,
  selectorExistsScript,
  selectScript,
  textScript,
  type SelectBy
} from "./page-scripts";

export type WaitUntil = "none" | "load" | "domcontentloaded";

export type NavigateOptions = {
  waitUntil?: WaitUntil;
  timeoutMs?: number;
};

export type NavigateResult = {
  url: string;
  frameId: string | null;
};

export type ClickPoint = {
  x: number;
  y: number;
};

export type MouseButton = "left" | "middle" | "right";

export type CoordinateClickOptions = {
  button?: MouseButton;
  clickCount?: number;
};

export type EvalResult =
  | { kind: "value"; value: unknown }
  | { kind: "null" }
  | { kind: "error"; message: string };

export type ScreenshotOptions = {
  format?: ScreenshotConfig["format"];
  quality?: number;
  highQuality?: boolean;
  fullPage?: boolean;
};

export type WaitCondition = { selector: string } | { predicate: string };

export type PageInfo = {
  title: string;
  url: string;
  readyState: string;
};

export type PageLinks = {
  title: string;
  url: string;
  links: string[];
};

export type TextMatch = {
  match: "exact" | "contains";
  tag: string;
  text: string;
  selector: string;
  x: number;
  y: number;
};

export type ActionExecutorOptions = {
  logger?: Logger;
  screenshot?: Partial<ScreenshotConfig>;
  navigationTimeoutMs?: number;
  waitTimeoutMs?: number;
  pollIntervalMs?: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const readRecord = (source: CdpParams, key: string): Record<string, unknown> => {
  const value = source[key];
  return isRecord(value) ? value : {};
};

const readString = (source: Record<string, unknown>, key: string): string | null => {
  const value = source[key];
  return typeof value === "string" ? value : null;
};

const readNumber = (source: Record<string, unknown>, key: string): number | null => {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
};

// Values JSON cannot carry: NaN, Infinity, -Infinity, -0 and bigints such as "12n".
const parseUnserializable = (value: string): number | bigint | string => {
  if (/^-?\d+n$/.test(value)) return BigInt(value.slice(0, -1));
  const parsed = Number(value);
  return Number.isNaN(parsed) && value !== "NaN" ? value : parsed;
};

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Centre of a box-model quad: the mean of its four corners. */
export const quadCenter = (quad: unknown): ClickPoint | null => {
  if (!Array.isArray(quad) || quad.length < 8) return null;
  const coords: number[] = [];
  for (const value of quad.slice(0, 8)) {
    if (typeof value !== "number" || !Number.isFinite(value)) return null;
    coords.push(value);
  }
  const [x1 = 0, y1 = 0, x2 = 0, y2 = 0, x3 = 0, y3 = 0, x4 = 0, y4 = 0] = coords;
  return { x: (x1 + x2 + x3 + x4) / 4, y: (y1 + y2 + y3 + y4) / 4 };
};

/**
 * High-level page actions over one attached connection. Selector failures are
 * reported as `element_not_found`; callers choose any fallback themselves.
 */
export class ActionExecutor {
  private channel: CommandChannel;
  private logger: Logger;
  private screenshotDefaults: ScreenshotConfig;
  private navigationTimeoutMs: number;
  private waitTimeoutMs: number;
  private pollIntervalMs: number;

  constructor(channel: CommandChannel, options: ActionExecutorOptions = {}) {
    this.channel = channel;
    this.logger = options.logger ?? createLogger("actions.executor");
    this.screenshotDefaults = {
      format: options.screenshot?.format ?? "jpeg",
      quality: options.screenshot?.quality ?? 60
    };
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 30000;
    this.waitTimeoutMs = options.waitTimeoutMs ?? 30000;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
  }

  async enable(): Promise<void> {
    for (const domain of ["Page", "DOM", "Runtime"]) {
      await this.channel.send(`${domain}.enable`);
    }
  }

  async navigate(url: string, options: NavigateOptions = {}): Promise<NavigateResult> {
    const waitUntil = options.waitUntil ?? "none";
    const timeoutMs = options.timeoutMs ?? this.navigationTimeoutMs;
    const eventName = waitUntil === "load"
      ? "Page.loadEventFired"
      : waitUntil === "domcontentloaded"
        ? "Page.domContentEventFired"
        : null;

    // Subscribed before the command goes out so a fast load event is not missed.
    const abandon = new AbortController();
    const loaded = eventName ? this.channel.waitForEvent(eventName, timeoutMs, undefined, abandon.signal) : null;
    const acknowledged = this.channel.send("Page.navigate", { url }, { timeoutMs }).then((result) => {
      const errorText = readString(result, "errorText");
      if (errorText) {
        throw new AutomationError("navigation_failed", `Navigation to ${url} failed: ${errorText}`, {
          details: { url, errorText }
        });
      }
      return { url, frameId: readString(result, "frameId") };
    });

    if (!loaded) {
      return await acknowledged;
    }
    try {
      const [result] = await Promise.all([acknowledged, loaded]);
      this.logger.debug("action.navigate", { data: { url, waitUntil } });
      return result;
    } finally {
      abandon.abort();
    }
  }

  async click(selector: string): Promise<ClickPoint> {
    const nodeId = await this.querySelector(selector);
    let point: ClickPoint | null;
    try {
      await this.channel.send("DOM.scrollIntoViewIfNeeded", { nodeId });
      const box = await this.channel.send("DOM.getBoxModel", { nodeId });
      point = quadCenter(readRecord(box, "model").content);
    } catch (error) {
      if (!hasErrorCode(error, "protocol_error")) throw error;
      throw new AutomationError("element_not_found", `Element ${selector} has no clickable box: ${error.message}`, {
        details: { selector, cause: describeCause(error) },
        cause: error
      });
    }
    if (!point) {
      throw new AutomationError("element_not_found", `Element ${selector} has no clickable box`, {
        details: { selector }
      });
    }

    await this.channel.send("Input.dispatchMouseEvent", { type: "mouseMoved", x: point.x, y: point.y });
    await this.pressAt(point, "left", 1);
    this.logger.debug("action.click", { data: { selector, x: point.x, y: point.y } });
    return point;
  }

  /** Presses and releases at viewport coordinates without any element lookup. */
  async coordinateClick(x: number, y: number, options: CoordinateClickOptions = {}): Promise<ClickPoint> {
    const point = { x, y };
    await this.pressAt(point, options.button ?? "left", options.clickCount ?? 1);
    return point;
  }

  /** Replaces the field's value and returns what the field holds afterwards. */
  async fill(selector: string, text: string): Promise<string> {
    const record = await this.lookup(fillScript(selector, text), selector);
    return readString(record, "value") ?? "";
  }

  /** Types into the focused element, one key event triple per character. */
  async type(text: string): Promise<void> {
    for (const char of text) {
      await this.pressKey(keyForCharacter(char), 0);
    }
  }

  /** Presses a named key or chord such as `Enter`, `F5` or `Control+a`. */
  async key(name: string): Promise<void> {
    const chord = parseChord(name);
    if (!chord) {
      throw new AutomationError("execution_error", `Unknown key: ${name}`, { details: { key: name } });
    }
    for (const modifier of chord.modifierKeys) {
      await this.channel.send("Input.dispatchKeyEvent", {
        type: "rawKeyDown",
        key: modifier.key,
        code: modifier.code,
        windowsVirtualKeyCode: modifier.keyCode,
        modifiers: chord.modifiers
      });
    }
    await this.pressKey(chord.key, chord.modifiers);
    for (const modifier of [...chord.modifierKeys].reverse()) {
      await this.channel.send("Input.dispatchKeyEvent", {
        type: "keyUp",
        key: modifier.key,
        code: modifier.code,
        windowsVirtualKeyCode: modifier.keyCode
      });
    }
  }

  /**
   * Evaluates an expression in the page. Page exceptions come back as
   * `{ kind: "error" }`; transport failures are thrown.
   */
  async evaluate(script: string): Promise<EvalResult> {
    const response = await this.channel.send("Runtime.evaluate", {
      expression: script,
      returnByValue: true,
      awaitPromise: true
    });
    const exception = response.exceptionDetails;
    if (isRecord(exception)) {
      const thrown = isRecord(exception.exception) ? exception.exception : {};
      const message = readString(thrown, "description")
        ?? readString(exception, "text")
        ?? "Evaluation failed";
      return { kind: "error", message };
    }

    const remote = readRecord(response, "result");
    const unserializable = readString(remote, "unserializableValue");
    if (unserializable !== null) {
      return { kind: "value", value: parseUnserializable(unserializable) };
    }
    if ("value" in remote) {
      return remote.value === null ? { kind: "null" } : { kind: "value", value: remote.value };
    }
    if (remote.type === "undefined" || remote.subtype === "null" || typeof remote.type !== "string") {
      return { kind: "null" };
    }
    return { kind: "value", value: readString(remote, "description") ?? remote.type };
  }

  async evaluateOrThrow(script: string): Promise<unknown> {
    const result = await this.evaluate(script);
    if (result.kind === "error") {
      throw new AutomationError("execution_error", result.message, { details: { script: script.slice(0, 200) } });
    }
    return result.kind === "value" ? result.value : null;
  }

  /** Captures the page and writes the image to `path`. Defaults to a full-page JPEG at quality 60. */
  async screenshot(path: string, options: ScreenshotOptions = {}): Promise<string> {
    const format = options.highQuality ? "png" : options.format ?? this.screenshotDefaults.format;
    const params: CdpParams = { format };
    if (format !== "png") {
      params.quality = options.quality ?? this.screenshotDefaults.quality;
    }
    if (options.fullPage ?? true) {
      const metrics = await this.channel.send("Page.getLayoutMetrics");
      const size = isRecord(metrics.cssContentSize) ? metrics.cssContentSize : readRecord(metrics, "contentSize");
      const width = readNumber(size, "width");
      const height = readNumber(size, "height");
      if (width && height) {
        params.clip = { x: 0, y: 0, width: Math.ceil(width), height: Math.ceil(height), scale: 1 };
        params.captureBeyondViewport = true;
      }
    }

    const capture = await this.channel.send("Page.captureScreenshot", params);
    const data = readString(capture, "data");
    if (!data) {
      throw new AutomationError("execution_error", "Page.captureScreenshot returned no image data", {
        details: { path }
      });
    }
    await writeFileAtomic(path, Buffer.from(data, "base64"));
    this.logger.debug("action.screenshot", { data: { path, format } });
    return path;
  }

  /** Polls until the selector matches or the predicate is truthy. Returns the elapsed milliseconds. */
  async wait(condition: WaitCondition, timeoutMs = this.waitTimeoutMs): Promise<number> {
    const script = "selector" in condition ? selectorExistsScript(condition.selector) : predicateScript(condition.predicate);
    const startedAt = Date.now();
    const deadline = startedAt + timeoutMs;
    let lastError: string | null = null;

    while (true) {
      const result = await this.evaluate(script);
      if (result.kind === "value" && result.value === true) {
        return Date.now() - startedAt;
      }
      lastError = result.kind === "error" ? result.message : lastError;
      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }

    const target = "selector" in condition ? `selector ${condition.selector}` : `predicate ${condition.predicate}`;
    throw new AutomationError("wait_timeout", `Timed out after ${timeoutMs}ms waiting for ${target}`, {
      details: {
        timeoutMs,
        ...("selector" in condition ? { selector: condition.selector } : { predicate: condition.predicate }),
        lastError
      }
    });
  }

  async text(selector: string): Promise<string> {
    const record = await this.lookup(textScript(selector), selector);
    return readString(record, "value") ?? "";
  }

  async attribute(selector: string, name: string): Promise<string | null> {
    const record = await this.lookup(attributeScript(selector, name), selector);
    return readString(record, "value");
  }

  /** Selects an option by value, visible text or index and returns the resulting value. */
  async select(selector: string, value: string, by: SelectBy = "value"): Promise<string> {
    const record = await this.lookup(selectScript(selector, value, by), selector);
    if (record.matched !== true) {
      throw new AutomationError(
        "execution_error",
        `Cannot select ${by} ${value} in ${selector}: ${readString(record, "reason") ?? "no match"}`,
        { details: { selector, value, by } }
      );
    }
    return readString(record, "value") ?? "";
  }

  async scrollTo(selector: string): Promise<void> {
    await this.lookup(scrollIntoViewScript(selector), selector);
  }

  async pageInfo(): Promise<PageInfo> {
    const value = await this.evaluateOrThrow(pageInfoScript);
    const record = isRecord(value) ? value : {};
    return {
      title: readString(record, "title") ?? "",
      url: readString(record, "url") ?? "",
      readyState: readString(record, "readyState") ?? ""
    };
  }

  async pageText(maxChars = 20000): Promise<string> {
    const value = await this.evaluateOrThrow(pageTextScript(maxChars));
    return typeof value === "string" ? value : "";
  }

  /** Title, URL and outgoing links (anchors and form actions) of the current page. */
  async links(): Promise<PageLinks> {
    const value = await this.evaluateOrThrow(linksScript);
    const record = isRecord(value) ? value : {};
    const links = Array.isArray(record.links)
      ? record.links.filter((link): link is string => typeof link === "string")
      : [];
    return {
      title: readString(record, "title") ?? "",
      url: readString(record, "url") ?? "",
      links
    };
  }

  /** Visible elements containing `text`, with a selector and centre point for each. */
  async findByText(text: string, limit = 20): Promise<TextMatch[]> {
    const value = await this.evaluateOrThrow(findByTextScript(text, limit));
    if (!Array.isArray(value)) return [];
    const matches: TextMatch[] = [];
    for (const entry of value) {
      if (!isRecord(entry)) continue;
      const selector = readString(entry, "selector");
      const x = readNumber(entry, "x");
      const y = readNumber(entry, "y");
      if (selector === null || x === null || y === null) continue;
      matches.push({
        match: entry.match === "exact" ? "exact" : "contains",
        tag: readString(entry, "tag") ?? "",
        text: readString(entry, "text") ?? "",
        selector,
        x,
        y
      });
    }
    return matches;
  }

  private async querySelector(selector: string): Promise<number> {
    const document = await this.channel.send("DOM.getDocument", { depth: 0 });
    const rootId = readNumber(readRecord(document, "root"), "nodeId");
    if (rootId === null) {
      throw new AutomationError("execution_error", "DOM.getDocument returned no root node", { details: { selector } });
    }
    let nodeId: number | null;
    try {
      const match = await this.channel.send("DOM.querySelector", { nodeId: rootId, selector });
      nodeId = readNumber(match, "nodeId");
    } catch (error) {
      if (!hasErrorCode(error, "protocol_error")) throw error;
      throw new AutomationError("element_not_found", `Invalid selector ${selector}: ${error.message}`, {
        details: { selector },
        cause: error
      });
    }
    if (!nodeId) {
      throw new AutomationError("element_not_found", `No element matches ${selector}`, { details: { selector } });
    }
    return nodeId;
  }

  private async lookup(script: string, selector: string): Promise<Record<string, unknown>> {
    const result = await this.evaluate(script);
    if (result.kind === "error") {
      throw new AutomationError("execution_error", result.message, { details: { selector } });
    }
    const record = result.kind === "value" && isRecord(result.value) ? result.value : null;
    if (!record || record.found !== true) {
      throw new AutomationError("element_not_found", `No element matches ${selector}`, { details: { selector } });
    }
    return record;
  }

  private async pressAt(point: ClickPoint, button: MouseButton, clickCount: number): Promise<void> {
    const base = { x: point.x, y: point.y, button, clickCount };
    await this.channel.send("Input.dispatchMouseEvent", { type: "mousePressed", ...base });
    await this.channel.send("Input.dispatchMouseEvent", { type: "mouseReleased", ...base });
  }

  private async pressKey(definition: KeyDefinition, modifiers: number): Promise<void> {
    const base = {
      key: definition.key,
      code: definition.code,
      windowsVirtualKeyCode: definition.keyCode,
      modifiers
    };
    await this.channel.send("Input.dispatchKeyEvent", { type: "rawKeyDown", ...base });
    if (definition.text) {
      await this.channel.send("Input.dispatchKeyEvent", { type: "char", text: definition.text, modifiers });
    }
    await this.channel.send("Input.dispatchKeyEvent", { type: "keyUp", ...base });
  }
}
