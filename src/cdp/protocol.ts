export type CdpParams = Record<string, unknown>;

export type CdpCommand = {
  id: number;
  method: string;
  params?: CdpParams;
  sessionId?: string;
};

export type CdpErrorBody = {
  code: number;
  message: string;
  data?: string;
};

export type CdpResult =
  | { id: number; result: CdpParams; sessionId?: string }
  | { id: number; error: CdpErrorBody; sessionId?: string };

export type CdpEvent = {
  method: string;
  params: CdpParams;
  sessionId?: string;
};

export type CdpFrame =
  | { kind: "result"; message: CdpResult }
  | { kind: "event"; message: CdpEvent }
  | { kind: "invalid"; reason: string };

/** Metadata answered by `/json/version`. */
export type BrowserVersion = {
  browser: string;
  protocolVersion: string;
  userAgent: string;
  webSocketDebuggerUrl?: string;
};

/** One entry of `/json/list`. */
export type TargetDescriptor = {
  id: string;
  type: string;
  title: string;
  url: string;
  webSocketDebuggerUrl?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const isErrorBody = (value: unknown): value is CdpErrorBody => {
  return isRecord(value) && typeof value.code === "number" && typeof value.message === "string";
};

const readSessionId = (record: Record<string, unknown>): { sessionId?: string } => {
  return typeof record.sessionId === "string" ? { sessionId: record.sessionId } : {};
};

const parseText = (data: string): unknown => {
  try {
    return JSON.parse(data);
  } catch {
    return null;
  }
};

/**
 * Classifies one incoming frame. Frames carrying a numeric `id` are results;
 * frames with a `method` and no `id` are events; anything else is invalid.
 */
export const decodeFrame = (data: string): CdpFrame => {
  const message = parseText(data);
  if (!isRecord(message)) {
    return { kind: "invalid", reason: "frame is not a JSON object" };
  }

  if ("id" in message && typeof message.id !== "undefined") {
    if (typeof message.id !== "number" || !Number.isInteger(message.id)) {
      return { kind: "invalid", reason: "frame id is not an integer" };
    }
    if (isErrorBody(message.error)) {
      return {
        kind: "result",
        message: { id: message.id, error: message.error, ...readSessionId(message) }
      };
    }
    const result = isRecord(message.result) ? message.result : {};
    return {
      kind: "result",
      message: { id: message.id, result, ...readSessionId(message) }
    };
  }

  if (typeof message.method === "string") {
    return {
      kind: "event",
      message: {
        method: message.method,
        params: isRecord(message.params) ? message.params : {},
        ...readSessionId(message)
      }
    };
  }

  return { kind: "invalid", reason: "frame has neither id nor method" };
};

export const encodeCommand = (command: CdpCommand): string => {
  return JSON.stringify({
    id: command.id,
    method: command.method,
    params: command.params ?? {},
    ...(command.sessionId ? { sessionId: command.sessionId } : {})
  });
};

/** Normalizes the capitalized keys Chrome uses in `/json/version`. */
export const toBrowserVersion = (value: unknown): BrowserVersion | null => {
  if (!isRecord(value)) return null;
  const browser = value.Browser ?? value.browser;
  if (typeof browser !== "string") return null;
  const protocolVersion = value["Protocol-Version"] ?? value.protocolVersion;
  const userAgent = value["User-Agent"] ?? value.userAgent;
  const wsUrl = value.webSocketDebuggerUrl;
  return {
    browser,
    protocolVersion: typeof protocolVersion === "string" ? protocolVersion : "",
    userAgent: typeof userAgent === "string" ? userAgent : "",
    ...(typeof wsUrl === "string" ? { webSocketDebuggerUrl: wsUrl } : {})
  };
};

export const toTargetDescriptor = (value: unknown): TargetDescriptor | null => {
  if (!isRecord(value)) return null;
  if (typeof value.id !== "string" || typeof value.type !== "string") return null;
  const wsUrl = value.webSocketDebuggerUrl;
  return {
    id: value.id,
    type: value.type,
    title: typeof value.title === "string" ? value.title : "",
    url: typeof value.url === "string" ? value.url : "",
    ...(typeof wsUrl === "string" ? { webSocketDebuggerUrl: wsUrl } : {})
  };
};
