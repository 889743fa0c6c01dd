import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { parse as parseJsonc } from "jsonc-parser";

export type PortRange = {
  start: number;
  end: number;
};

export type ScreenshotConfig = {
  format: "jpeg" | "png" | "webp";
  quality: number;
};

export type CrawlConfig = {
  maxPages: number;
  settleMs: number;
};

export type PilotConfig = {
  headless: boolean;
  port?: number;
  portRange: PortRange;
  instanceCount: number;
  chromePath?: string;
  flags: string[];
  startupTimeoutMs: number;
  commandTimeoutMs: number;
  handshakeTimeoutMs: number;
  killGraceMs: number;
  allowNonLocal: boolean;
  screenshot: ScreenshotConfig;
  crawl: CrawlConfig;
};

export const DEFAULT_PORT = 9222;
export const DEFAULT_PORT_RANGE: PortRange = { start: DEFAULT_PORT, end: 9400 };

const portSchema = z.number().int().min(1).max(65535);

const portRangeSchema = z.object({
  start: portSchema.default(DEFAULT_PORT_RANGE.start),
  end: portSchema.default(DEFAULT_PORT_RANGE.end)
}).refine((range) => range.start <= range.end, {
  message: "portRange.start must not exceed portRange.end"
});

const screenshotSchema = z.object({
  format: z.enum(["jpeg", "png", "webp"]).default("jpeg"),
  quality: z.number().int().min(1).max(100).default(60)
});

const crawlSchema = z.object({
  maxPages: z.number().int().min(1).max(10000).default(10),
  settleMs: z.number().int().min(0).max(60000).default(2000)
});

const configSchema = z.object({
  headless: z.boolean().default(true),
  port: portSchema.optional(),
  portRange: portRangeSchema.default({}),
  instanceCount: z.number().int().min(1).max(64).default(1),
  chromePath: z.string().min(1).optional(),
  flags: z.array(z.string()).default([]),
  startupTimeoutMs: z.number().int().min(100).max(120000).default(15000),
  commandTimeoutMs: z.number().int().min(100).max(600000).default(30000),
  handshakeTimeoutMs: z.number().int().min(100).max(60000).default(5000),
  killGraceMs: z.number().int().min(0).max(60000).default(3000),
  allowNonLocal: z.boolean().default(false),
  screenshot: screenshotSchema.default({}),
  crawl: crawlSchema.default({})
});

const CONFIG_FILE_NAME = "cdp-pilot.jsonc";

const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "n", "off"]);

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configDir = env.CDP_PILOT_CONFIG_DIR
    || path.join(os.homedir(), ".config", "cdp-pilot");
  return path.join(configDir, CONFIG_FILE_NAME);
}

function loadConfigFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const content = fs.readFileSync(filePath, "utf-8");
  const errors: Array<{ error: number; offset: number; length: number }> = [];
  const parsed: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const firstError = errors[0];
    throw new Error(`Invalid JSONC in cdp-pilot config at ${filePath}: parse error at offset ${firstError?.offset ?? 0}`);
  }
  return parsed ?? {};
}

export function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
}

export function parseIntegerEnv(value: string | undefined): number | undefined {
  if (typeof value !== "string" || !/^\s*\d+\s*$/.test(value)) return undefined;
  return Number.parseInt(value, 10);
}

/** Parses `CDP_RANGE` values such as `9222-9400`. */
export function parsePortRangeEnv(value: string | undefined): PortRange | undefined {
  if (typeof value !== "string") return undefined;
  const match = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(value);
  if (!match) return undefined;
  const start = Number.parseInt(match[1] ?? "", 10);
  const end = Number.parseInt(match[2] ?? "", 10);
  if (!Number.isFinite(start) || !Number.isFinite(end) || start > end) return undefined;
  return { start, end };
}

type EnvOverrides = {
  headless?: boolean;
  port?: number;
  portRange?: PortRange;
  instanceCount?: number;
  chromePath?: string;
};

export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): EnvOverrides {
  const headless = parseBooleanEnv(env.CDP_HEADLESS);
  const port = env.CDP_PORT === "auto" ? undefined : parseIntegerEnv(env.CDP_PORT);
  const portRange = parsePortRangeEnv(env.CDP_RANGE);
  const instanceCount = parseIntegerEnv(env.CDP_COUNT);
  const chromePath = env.CDP_CHROME_PATH?.trim();
  return {
    ...(typeof headless === "boolean" ? { headless } : {}),
    ...(typeof port === "number" ? { port } : {}),
    ...(portRange ? { portRange } : {}),
    ...(typeof instanceCount === "number" ? { instanceCount } : {}),
    ...(chromePath ? { chromePath } : {})
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolves the effective configuration.
 * Precedence: explicit overrides > environment > config file > defaults.
 */
export function loadConfig(
  overrides: Partial<PilotConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): PilotConfig {
  const configPath = getConfigPath(env);
  const fileValue = loadConfigFile(configPath);
  if (!isRecord(fileValue)) {
    throw new Error(`Invalid cdp-pilot config at ${configPath}: expected an object`);
  }

  const merged: Record<string, unknown> = {
    ...fileValue,
    ...readEnvOverrides(env),
    ...Object.fromEntries(Object.entries(overrides).filter(([, value]) => typeof value !== "undefined"))
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid cdp-pilot config at ${configPath}: ${issues}`);
  }
  return parsed.data;
}
