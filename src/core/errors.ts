export type AutomationErrorCode =
  | "connection_error"
  | "not_connected"
  | "connection_lost"
  | "command_timeout"
  | "protocol_error"
  | "element_not_found"
  | "execution_error"
  | "navigation_failed"
  | "wait_timeout"
  | "spawn_error"
  | "no_port_available"
  | "cancelled"
  | "invalid_step";

export type ErrorDetails = Record<string, string | number | boolean | null>;

export type SerializedAutomationError = {
  code: AutomationErrorCode;
  message: string;
  retryable: boolean;
  details?: ErrorDetails;
};

const ERROR_NAMES: Record<AutomationErrorCode, string> = {
  connection_error: "ConnectionError",
  not_connected: "NotConnected",
  connection_lost: "ConnectionLost",
  command_timeout: "CommandTimeout",
  protocol_error: "ProtocolError",
  element_not_found: "ElementNotFound",
  execution_error: "ExecutionError",
  navigation_failed: "NavigationFailed",
  wait_timeout: "WaitTimeout",
  spawn_error: "SpawnError",
  no_port_available: "NoPortAvailable",
  cancelled: "Cancelled",
  invalid_step: "InvalidStep"
};

// Callers may retry these after an explicit decision (e.g. a coordinate-click fallback);
// nothing in this package retries them on its own.
export const isRetryableByCode = (code: AutomationErrorCode): boolean => {
  return code === "command_timeout"
    || code === "element_not_found"
    || code === "wait_timeout"
    || code === "navigation_failed";
};

export class AutomationError extends Error {
  readonly code: AutomationErrorCode;
  readonly retryable: boolean;
  readonly details?: ErrorDetails;

  constructor(
    code: AutomationErrorCode,
    message: string,
    options: {
      retryable?: boolean;
      details?: ErrorDetails;
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = ERROR_NAMES[code];
    this.code = code;
    this.retryable = options.retryable ?? isRetryableByCode(code);
    this.details = options.details;
  }

  toJSON(): SerializedAutomationError {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      ...(this.details ? { details: this.details } : {})
    };
  }
}

export const isAutomationError = (value: unknown): value is AutomationError => {
  return value instanceof AutomationError;
};

export const hasErrorCode = (value: unknown, code: AutomationErrorCode): value is AutomationError => {
  return isAutomationError(value) && value.code === code;
};

export const describeCause = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};

export const toAutomationError = (
  error: unknown,
  fallbackCode: AutomationErrorCode,
  details?: ErrorDetails
): AutomationError => {
  if (isAutomationError(error)) {
    return error;
  }
  const message = describeCause(error) || "Unknown failure";
  return new AutomationError(fallbackCode, message, { details, cause: error });
};
