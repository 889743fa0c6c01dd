import { AutomationError } from "../core/errors";

const ALLOWED_PROTOCOLS = new Set(["ws:", "wss:", "http:", "https:"]);
const LOCAL_HOSTNAMES = new Set(["localhost", "127.0.0.1", "::1", "[::1]"]);

export type EndpointAddress = {
  host: string;
  port: number;
};

export function isLocalHostname(hostname: string): boolean {
  const normalized = hostname.toLowerCase();
  return LOCAL_HOSTNAMES.has(normalized) || normalized.startsWith("::ffff:127.");
}

export function ensureLocalEndpoint(endpoint: string, allowNonLocal: boolean): void {
  let parsed: URL;
  try {
    parsed = new URL(endpoint);
  } catch {
    throw new AutomationError("connection_error", `Invalid CDP endpoint URL: ${endpoint}`, {
      details: { endpoint }
    });
  }

  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    throw new AutomationError(
      "connection_error",
      `Disallowed protocol "${parsed.protocol}" for CDP endpoint. Allowed: ws, wss, http, https.`,
      { details: { endpoint } }
    );
  }

  if (allowNonLocal) return;

  if (!isLocalHostname(parsed.hostname)) {
    throw new AutomationError("connection_error", "Non-local CDP endpoints are disabled by default.", {
      details: { endpoint }
    });
  }
}

/** Accepts `host:port`, a bare port, or an http(s)/ws(s) URL and returns its host and port. */
export function parseEndpointAddress(value: string | number): EndpointAddress {
  if (typeof value === "number") {
    return { host: "127.0.0.1", port: value };
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return { host: "127.0.0.1", port: Number.parseInt(trimmed, 10) };
  }
  const withScheme = /^[a-z]+:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new AutomationError("connection_error", `Invalid debugging endpoint address: ${value}`, {
      details: { endpoint: value }
    });
  }
  const port = Number.parseInt(parsed.port, 10);
  if (!Number.isFinite(port)) {
    throw new AutomationError("connection_error", `Debugging endpoint address has no port: ${value}`, {
      details: { endpoint: value }
    });
  }
  return { host: parsed.hostname, port };
}

export function formatEndpointAddress(address: EndpointAddress): string {
  const host = address.host.includes(":") && !address.host.startsWith("[") ? `[${address.host}]` : address.host;
  return `${host}:${address.port}`;
}
