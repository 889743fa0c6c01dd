import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  getConfigPath,
  loadConfig,
  parseBooleanEnv,
  parseIntegerEnv,
  parsePortRangeEnv,
  readEnvOverrides
} from "../src/config";

vi.mock("fs");
vi.mock("os");

const expectedPath = path.join("/home/testuser", ".config", "cdp-pilot", "cdp-pilot.jsonc");

describe("loadConfig", () => {
  beforeEach(() => {
    vi.mocked(os.homedir).mockReturnValue("/home/testuser");
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("returns defaults when no config file exists", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    const config = loadConfig({}, {});
    expect(config.headless).toBe(true);
    expect(config.port).toBeUndefined();
    expect(config.portRange).toEqual({ start: 9222, end: 9400 });
    expect(config.instanceCount).toBe(1);
    expect(config.chromePath).toBeUndefined();
    expect(config.flags).toEqual([]);
    expect(config.startupTimeoutMs).toBe(15000);
    expect(config.commandTimeoutMs).toBe(30000);
    expect(config.killGraceMs).toBe(3000);
    expect(config.allowNonLocal).toBe(false);
    expect(config.screenshot).toEqual({ format: "jpeg", quality: 60 });
    expect(config.crawl).toEqual({ maxPages: 10, settleMs: 2000 });
    expect(fs.existsSync).toHaveBeenCalledWith(expectedPath);
  });

  it("reads the JSONC config file", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(`{
      // local overrides
      "headless": false,
      "portRange": { "start": 9300, "end": 9310 },
      "flags": ["--mute-audio"],
      "crawl": { "maxPages": 25 },
    }`);

    const config = loadConfig({}, {});
    expect(config.headless).toBe(false);
    expect(config.portRange).toEqual({ start: 9300, end: 9310 });
    expect(config.flags).toEqual(["--mute-audio"]);
    expect(config.crawl).toEqual({ maxPages: 25, settleMs: 2000 });
    expect(fs.readFileSync).toHaveBeenCalledWith(expectedPath, "utf-8");
  });

  it("respects CDP_PILOT_CONFIG_DIR", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    loadConfig({}, { CDP_PILOT_CONFIG_DIR: "/custom/dir" });
    expect(fs.existsSync).toHaveBeenCalledWith(path.join("/custom/dir", "cdp-pilot.jsonc"));
  });

  it("layers environment over file and explicit overrides over both", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ headless: true, port: 9250, instanceCount: 2 }));

    const config = loadConfig(
      { instanceCount: 4, chromePath: undefined },
      { CDP_HEADLESS: "0", CDP_PORT: "9260", CDP_COUNT: "3", CDP_CHROME_PATH: "/opt/chrome/chrome" }
    );
    expect(config.headless).toBe(false);
    expect(config.port).toBe(9260);
    expect(config.instanceCount).toBe(4);
    expect(config.chromePath).toBe("/opt/chrome/chrome");
  });

  it("throws on invalid config values", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ portRange: { start: 9400, end: 9222 } }));

    expect(() => loadConfig({}, {})).toThrow(
      `Invalid cdp-pilot config at ${expectedPath}: portRange: portRange.start must not exceed portRange.end`
    );
  });

  it("throws on malformed JSONC", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue("{ \"headless\": ");

    expect(() => loadConfig({}, {})).toThrow(/Invalid JSONC in cdp-pilot config/);
  });

  it("rejects a config file that is not an object", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue("[1, 2]");

    expect(() => loadConfig({}, {})).toThrow("expected an object");
  });
});

describe("environment parsing", () => {
  beforeEach(() => {
    vi.mocked(os.homedir).mockReturnValue("/home/testuser");
  });

  it("parses booleans", () => {
    expect(parseBooleanEnv("yes")).toBe(true);
    expect(parseBooleanEnv(" OFF ")).toBe(false);
    expect(parseBooleanEnv("maybe")).toBeUndefined();
    expect(parseBooleanEnv(undefined)).toBeUndefined();
  });

  it("parses integers", () => {
    expect(parseIntegerEnv("9223")).toBe(9223);
    expect(parseIntegerEnv("92a")).toBeUndefined();
    expect(parseIntegerEnv("-1")).toBeUndefined();
  });

  it("parses port ranges", () => {
    expect(parsePortRangeEnv("9222-9230")).toEqual({ start: 9222, end: 9230 });
    expect(parsePortRangeEnv("9230-9222")).toBeUndefined();
    expect(parsePortRangeEnv("9222")).toBeUndefined();
  });

  it("treats CDP_PORT=auto as unset", () => {
    expect(readEnvOverrides({ CDP_PORT: "auto", CDP_RANGE: "9300-9301" })).toEqual({
      portRange: { start: 9300, end: 9301 }
    });
  });

  it("locates the config under the home directory by default", () => {
    expect(getConfigPath({})).toBe(expectedPath);
  });
});
