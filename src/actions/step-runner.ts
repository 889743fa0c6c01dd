import { AutomationError, toAutomationError, type AutomationErrorCode } from "../core/errors";
import { createLogger, type Logger } from "../core/logging";
import type { ActionExecutor, MouseButton, WaitUntil } from "./executor";
import type { SelectBy } from "./page-scripts";

export type Step = {
  action: string;
  args?: Record<string, unknown>;
};

export type StepResult = {
  i: number;
  ok: boolean;
  data?: unknown;
  error?: { code: AutomationErrorCode; message: string };
};

export type RunOutcome = {
  results: StepResult[];
  timingMs: number;
};

export type RunOptions = {
  stopOnError?: boolean;
};

/** Runs `{ action, args }` steps in order against one executor. */
export class StepRunner {
  private executor: ActionExecutor;
  private logger: Logger;

  constructor(executor: ActionExecutor, logger: Logger = createLogger("actions.steps")) {
    this.executor = executor;
    this.logger = logger;
  }

  async run(steps: Step[], options: RunOptions = {}): Promise<RunOutcome> {
    const stopOnError = options.stopOnError ?? true;
    const startTime = Date.now();
    const results: StepResult[] = [];

    for (let i = 0; i < steps.length; i += 1) {
      const step = steps[i];
      if (!step) {
        continue;
      }
      try {
        const data = await this.executeStep(step);
        results.push(typeof data === "undefined" ? { i, ok: true } : { i, ok: true, data });
      } catch (error) {
        const failure = toAutomationError(error, "execution_error", { step: i });
        this.logger.warn("step.failed", { data: { i, action: step.action, code: failure.code, message: failure.message } });
        results.push({ i, ok: false, error: { code: failure.code, message: failure.message } });
        if (stopOnError) {
          break;
        }
      }
    }

    return { results, timingMs: Date.now() - startTime };
  }

  private async executeStep(step: Step): Promise<unknown> {
    const args = step.args ?? {};

    switch (step.action) {
      case "navigate":
      case "goto":
        return this.executor.navigate(requireString(args.url, "url"), {
          waitUntil: requireWaitUntil(args.waitUntil),
          timeoutMs: optionalNumber(args.timeoutMs, "timeoutMs")
        });
      case "click":
        return this.executor.click(requireString(args.selector, "selector"));
      case "coordinate_click":
        return this.executor.coordinateClick(requireNumber(args.x, "x"), requireNumber(args.y, "y"), {
          button: requireButton(args.button),
          clickCount: optionalNumber(args.clickCount, "clickCount")
        });
      case "fill":
        return this.executor.fill(requireString(args.selector, "selector"), requireText(args.text, "text"));
      case "type":
        return this.executor.type(requireText(args.text, "text"));
      case "key":
        return this.executor.key(requireString(args.key, "key"));
      case "evaluate":
        return this.executor.evaluate(requireString(args.script, "script"));
      case "screenshot":
        return this.executor.screenshot(requireString(args.path, "path"), {
          highQuality: args.highQuality === true,
          fullPage: args.fullPage !== false
        });
      case "wait": {
        const timeoutMs = optionalNumber(args.timeoutMs, "timeoutMs");
        if (typeof args.predicate === "string") {
          return this.executor.wait({ predicate: requireString(args.predicate, "predicate") }, timeoutMs);
        }
        return this.executor.wait({ selector: requireString(args.selector, "selector") }, timeoutMs);
      }
      case "select":
        return this.executor.select(
          requireString(args.selector, "selector"),
          requireText(args.value, "value"),
          requireSelectBy(args.by)
        );
      case "scroll":
        return this.executor.scrollTo(requireString(args.selector, "selector"));
      case "get_text":
        return this.executor.text(requireString(args.selector, "selector"));
      case "get_attribute":
        return this.executor.attribute(requireString(args.selector, "selector"), requireString(args.name, "name"));
      case "page_info":
        return this.executor.pageInfo();
      case "page_text":
        return this.executor.pageText(optionalNumber(args.maxChars, "maxChars"));
      case "find_by_text":
        return this.executor.findByText(requireString(args.text, "text"), optionalNumber(args.limit, "limit"));
      case "sleep":
        return sleep(requireNumber(args.ms ?? 1000, "ms"));
      default:
        throw invalid(`Unknown action: ${step.action}`);
    }
  }
}

function invalid(message: string): AutomationError {
  return new AutomationError("invalid_step", message);
}

function requireString(value: unknown, label: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw invalid(`Missing ${label}`);
  }
  return value;
}

// Text may legitimately be empty (clearing a field).
function requireText(value: unknown, label: string): string {
  if (typeof value !== "string") {
    throw invalid(`Missing ${label}`);
  }
  return value;
}

function requireNumber(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw invalid(`Invalid ${label}`);
  }
  return value;
}

function optionalNumber(value: unknown, label: string): number | undefined {
  if (typeof value === "undefined") return undefined;
  return requireNumber(value, label);
}

function requireWaitUntil(value: unknown): WaitUntil {
  if (typeof value === "undefined") return "load";
  if (value === "none" || value === "load" || value === "domcontentloaded") {
    return value;
  }
  throw invalid(`Invalid waitUntil: ${String(value)}`);
}

function requireButton(value: unknown): MouseButton {
  if (typeof value === "undefined") return "left";
  if (value === "left" || value === "middle" || value === "right") return value;
  throw invalid(`Invalid button: ${String(value)}`);
}

function requireSelectBy(value: unknown): SelectBy {
  if (typeof value === "undefined") return "value";
  if (value === "value" || value === "text" || value === "index") return value;
  throw invalid(`Invalid by: ${String(value)}`);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
