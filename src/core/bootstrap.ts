import { ActionExecutor } from "../actions/executor";
import { StepRunner } from "../actions/step-runner";
import { ProcessManager, type ProcessManagerDeps } from "../browser/process-manager";
import { attachToPage, type CdpTransport } from "../cdp/transport";
import { loadConfig, type PilotConfig } from "../config";
import { SiteCrawler, type PageDriver, type SiteCrawlerOptions } from "../crawler/site-crawler";
import { createLogger } from "./logging";

export type PilotOptions = {
  config?: PilotConfig;
  overrides?: Partial<PilotConfig>;
  env?: NodeJS.ProcessEnv;
  processDeps?: ProcessManagerDeps;
};

export type PageSession = {
  transport: CdpTransport;
  executor: ActionExecutor;
  runner: StepRunner;
  close: () => Promise<void>;
};

export type Pilot = {
  config: PilotConfig;
  processes: ProcessManager;
  openPage: (endpoint: string | number) => Promise<PageSession>;
  createCrawler: (driver: PageDriver, options?: SiteCrawlerOptions) => SiteCrawler;
  shutdown: () => Promise<void>;
};

/** Builds every component from one resolved configuration. */
export function createPilot(options: PilotOptions = {}): Pilot {
  const config = options.config ?? loadConfig(options.overrides, options.env);
  const logger = createLogger("pilot");
  const processes = new ProcessManager(config, { ...options.processDeps, loadConfig: () => config });
  const sessions = new Set<CdpTransport>();

  const openPage = async (endpoint: string | number): Promise<PageSession> => {
    const transport = await attachToPage(endpoint, {
      handshakeTimeoutMs: config.handshakeTimeoutMs,
      commandTimeoutMs: config.commandTimeoutMs,
      allowNonLocal: config.allowNonLocal
    });
    const executor = new ActionExecutor(transport, {
      screenshot: config.screenshot,
      navigationTimeoutMs: config.commandTimeoutMs
    });
    try {
      await executor.enable();
    } catch (error) {
      await transport.close();
      throw error;
    }
    sessions.add(transport);
    logger.debug("pilot.page.open", { data: { endpoint: String(endpoint), connectionId: transport.connectionId } });
    return {
      transport,
      executor,
      runner: new StepRunner(executor),
      close: async () => {
        sessions.delete(transport);
        await transport.close();
      }
    };
  };

  const createCrawler = (driver: PageDriver, crawlerOptions: SiteCrawlerOptions = {}): SiteCrawler => {
    return new SiteCrawler(driver, {
      maxPages: config.crawl.maxPages,
      settleMs: config.crawl.settleMs,
      navigationTimeoutMs: config.commandTimeoutMs,
      ...crawlerOptions
    });
  };

  const shutdown = async (): Promise<void> => {
    const open = [...sessions];
    sessions.clear();
    await Promise.all(open.map((transport) => transport.close()));
    await processes.stopAll();
  };

  return { config, processes, openPage, createCrawler, shutdown };
}
