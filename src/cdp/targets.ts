import { AutomationError, describeCause } from "../core/errors";
import { fetchJson } from "../utils/http";
import {
  formatEndpointAddress,
  parseEndpointAddress,
  type EndpointAddress
} from "../utils/endpoint-validation";
import {
  toBrowserVersion,
  toTargetDescriptor,
  type BrowserVersion,
  type TargetDescriptor
} from "./protocol";

export type PageTarget = {
  targetId: string;
  url: string;
  title: string;
  webSocketDebuggerUrl: string;
};

const DEFAULT_METADATA_TIMEOUT_MS = 2000;

const metadataUrl = (address: EndpointAddress, pathname: string): string => {
  return `http://${formatEndpointAddress(address)}${pathname}`;
};

const wrapHttpFailure = (address: EndpointAddress, pathname: string, error: unknown): AutomationError => {
  if (error instanceof AutomationError) return error;
  return new AutomationError(
    "connection_error",
    `Debugging endpoint ${formatEndpointAddress(address)} did not answer ${pathname}: ${describeCause(error)}`,
    {
      details: { endpoint: formatEndpointAddress(address), path: pathname, cause: describeCause(error) },
      cause: error
    }
  );
};

/** Reads `/json/version`; this is also the readiness probe used after spawning a browser. */
export async function fetchVersion(
  endpoint: string | number,
  timeoutMs = DEFAULT_METADATA_TIMEOUT_MS
): Promise<BrowserVersion> {
  const address = parseEndpointAddress(endpoint);
  let body: unknown;
  try {
    body = await fetchJson(metadataUrl(address, "/json/version"), {}, timeoutMs);
  } catch (error) {
    throw wrapHttpFailure(address, "/json/version", error);
  }
  const version = toBrowserVersion(body);
  if (!version) {
    throw new AutomationError("connection_error", `Unexpected /json/version payload from ${formatEndpointAddress(address)}`, {
      details: { endpoint: formatEndpointAddress(address) }
    });
  }
  return version;
}

export async function listTargets(
  endpoint: string | number,
  timeoutMs = DEFAULT_METADATA_TIMEOUT_MS
): Promise<TargetDescriptor[]> {
  const address = parseEndpointAddress(endpoint);
  let body: unknown;
  try {
    body = await fetchJson(metadataUrl(address, "/json/list"), {}, timeoutMs);
  } catch (error) {
    throw wrapHttpFailure(address, "/json/list", error);
  }
  if (!Array.isArray(body)) {
    return [];
  }
  const targets: TargetDescriptor[] = [];
  for (const entry of body) {
    const target = toTargetDescriptor(entry);
    if (target) targets.push(target);
  }
  return targets;
}

async function openTarget(address: EndpointAddress, timeoutMs: number): Promise<TargetDescriptor> {
  const pathname = "/json/new?about:blank";
  let body: unknown;
  try {
    // Recent Chrome rejects GET on /json/new.
    body = await fetchJson(metadataUrl(address, pathname), { method: "PUT" }, timeoutMs);
  } catch (error) {
    throw wrapHttpFailure(address, pathname, error);
  }
  const target = toTargetDescriptor(body);
  if (!target) {
    throw new AutomationError("connection_error", `Unexpected /json/new payload from ${formatEndpointAddress(address)}`, {
      details: { endpoint: formatEndpointAddress(address) }
    });
  }
  return target;
}

const toPageTarget = (target: TargetDescriptor): PageTarget | null => {
  if (target.type !== "page" || !target.webSocketDebuggerUrl) return null;
  return {
    targetId: target.id,
    url: target.url,
    title: target.title,
    webSocketDebuggerUrl: target.webSocketDebuggerUrl
  };
};

/**
 * Picks the first page target of a debugging endpoint, opening a blank tab when
 * the browser has none.
 */
export async function resolvePageTarget(
  endpoint: string | number,
  timeoutMs = DEFAULT_METADATA_TIMEOUT_MS
): Promise<PageTarget> {
  const address = parseEndpointAddress(endpoint);
  const targets = await listTargets(endpoint, timeoutMs);
  for (const target of targets) {
    const page = toPageTarget(target);
    if (page) return page;
  }

  const opened = toPageTarget(await openTarget(address, timeoutMs));
  if (!opened) {
    throw new AutomationError("connection_error", `No attachable page target at ${formatEndpointAddress(address)}`, {
      details: { endpoint: formatEndpointAddress(address) }
    });
  }
  return opened;
}
