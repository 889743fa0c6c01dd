export {
  loadConfig,
  getConfigPath,
  readEnvOverrides,
  DEFAULT_PORT,
  DEFAULT_PORT_RANGE,
  type PilotConfig,
  type PortRange,
  type ScreenshotConfig,
  type CrawlConfig
} from "./config";
export {
  AutomationError,
  isAutomationError,
  hasErrorCode,
  toAutomationError,
  type AutomationErrorCode,
  type ErrorDetails,
  type SerializedAutomationError
} from "./core/errors";
export { createLogger, parseLogLevel, silentLogger, type Logger, type LogEnvelope, type LogLevel, type LogSink } from "./core/logging";
export { createPilot, type Pilot, type PilotOptions, type PageSession } from "./core/bootstrap";

export type { CdpParams, CdpEvent, BrowserVersion, TargetDescriptor } from "./cdp/protocol";
export { fetchVersion, listTargets, resolvePageTarget, type PageTarget } from "./cdp/targets";
export {
  CdpTransport,
  ALL_EVENTS,
  attachToPage,
  withConnection,
  type CommandChannel,
  type ConnectionState,
  type CdpTransportOptions,
  type SendOptions,
  type EventHandler,
  type DisconnectDetail
} from "./cdp/transport";

export {
  ProcessManager,
  buildChromeArgs,
  spawnBrowser,
  type BrowserInstance,
  type ExternalBrowser,
  type BrowserProcess,
  type InstanceState,
  type ProcessManagerConfig,
  type ProcessManagerDeps,
  type StartOptions,
  type StartResult
} from "./browser/process-manager";
export { findFreePort, isPortFree } from "./browser/ports";
export { signalPid, signalProcessTree, type SignalOptions } from "./browser/signals";
export { findChromeExecutable } from "./cache/chrome-locator";
export { createPidfileStore, pidfilePath, type PidfileStore } from "./cache/pidfiles";

export {
  ActionExecutor,
  type ActionExecutorOptions,
  type ClickPoint,
  type EvalResult,
  type NavigateOptions,
  type NavigateResult,
  type PageInfo,
  type PageLinks,
  type ScreenshotOptions,
  type TextMatch,
  type WaitCondition,
  type WaitUntil
} from "./actions/executor";
export { StepRunner, type Step, type StepResult, type RunOutcome, type RunOptions } from "./actions/step-runner";

export { SiteCrawler, type PageDriver, type PageNode, type SiteMap, type CrawlOptions } from "./crawler/site-crawler";
export { canonicalizeUrl } from "./crawler/canonical";
