import type { NavigateOptions, NavigateResult, PageLinks } from "../actions/executor";
import { AutomationError, describeCause } from "../core/errors";
import { createLogger, type Logger } from "../core/logging";
import { canonicalizeUrl, isSameOrigin, originOf } from "./canonical";

/** The slice of the action executor a crawl needs. */
export type PageDriver = {
  navigate: (url: string, options?: NavigateOptions) => Promise<NavigateResult>;
  links: () => Promise<PageLinks>;
};

export type PageNode = Readonly<{
  url: string;
  title: string;
  links: readonly string[];
  depth: number;
  error?: string;
}>;

export type CrawlOptions = {
  maxPages?: number;
  settleMs?: number;
  navigationTimeoutMs?: number;
};

export type SiteMap = {
  seed: string | null;
  nodes: Record<string, string[]>;
  visited: string[];
  discovered: string[];
  uncrawled: string[];
};

export type SiteCrawlerOptions = {
  logger?: Logger;
  maxPages?: number;
  settleMs?: number;
  navigationTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

type FrontierEntry = {
  url: string;
  depth: number;
};

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Breadth-first discovery of same-origin pages. Pages that fail to load or
 * yield links are recorded with `error` and the crawl moves on.
 */
export class SiteCrawler {
  private driver: PageDriver;
  private logger: Logger;
  private defaults: Required<CrawlOptions>;
  private sleep: (ms: number) => Promise<void>;
  private running = false;
  private seed: string | null = null;
  private nodes = new Map<string, PageNode>();
  private discovered = new Set<string>();

  constructor(driver: PageDriver, options: SiteCrawlerOptions = {}) {
    this.driver = driver;
    this.logger = options.logger ?? createLogger("crawler");
    this.defaults = {
      maxPages: options.maxPages ?? 10,
      settleMs: options.settleMs ?? 2000,
      navigationTimeoutMs: options.navigationTimeoutMs ?? 30000
    };
    this.sleep = options.sleep ?? defaultSleep;
  }

  async crawl(seedUrl: string, options: CrawlOptions = {}): Promise<PageNode[]> {
    const settings = { ...this.defaults, ...definedOnly(options) };
    const seed = canonicalizeUrl(seedUrl);
    const origin = originOf(seed);
    if (!origin) {
      throw new AutomationError("navigation_failed", `Cannot crawl ${seedUrl}: not an http(s) URL`, {
        details: { url: seedUrl }
      });
    }
    if (this.running) {
      throw new AutomationError("execution_error", "A crawl is already running on this crawler", {
        details: { url: seedUrl }
      });
    }

    this.running = true;
    this.seed = seed;
    this.nodes = new Map();
    this.discovered = new Set([seed]);
    const frontier: FrontierEntry[] = [{ url: seed, depth: 0 }];
    let head = 0;

    this.logger.info("crawl.start", { data: { seed, maxPages: settings.maxPages } });
    try {
      while (head < frontier.length && this.nodes.size < settings.maxPages) {
        const entry = frontier[head];
        head += 1;
        if (!entry || this.nodes.has(entry.url)) continue;

        const node = await this.visit(entry, origin, settings);
        this.nodes.set(node.url, node);
        for (const link of node.links) {
          if (this.discovered.has(link)) continue;
          this.discovered.add(link);
          frontier.push({ url: link, depth: entry.depth + 1 });
        }
      }
    } finally {
      this.running = false;
    }

    this.logger.info("crawl.done", {
      data: { seed, visited: this.nodes.size, discovered: this.discovered.size }
    });
    return [...this.nodes.values()];
  }

  /** Link graph of the last crawl, keyed by canonical URL. */
  getSiteMap(): SiteMap {
    const nodes: Record<string, string[]> = {};
    for (const [url, node] of this.nodes) {
      nodes[url] = [...node.links];
    }
    const discovered = [...this.discovered].sort();
    return {
      seed: this.seed,
      nodes,
      visited: [...this.nodes.keys()],
      discovered,
      uncrawled: discovered.filter((url) => !this.nodes.has(url))
    };
  }

  /** Visited URLs matching a pattern, e.g. to locate a confirmation route. */
  findRoutes(pattern: RegExp | string): string[] {
    const matches = typeof pattern === "string"
      ? (url: string) => url.includes(pattern)
      : (url: string) => new RegExp(pattern.source, pattern.flags.replace("g", "").replace("y", "")).test(url);
    return [...this.nodes.keys()].filter(matches);
  }

  private async visit(entry: FrontierEntry, origin: string, settings: Required<CrawlOptions>): Promise<PageNode> {
    try {
      await this.driver.navigate(entry.url, { waitUntil: "load", timeoutMs: settings.navigationTimeoutMs });
      if (settings.settleMs > 0) {
        await this.sleep(settings.settleMs);
      }
      const page = await this.driver.links();
      const links: string[] = [];
      for (const href of page.links) {
        const link = canonicalizeUrl(href);
        if (isSameOrigin(link, origin) && !links.includes(link)) {
          links.push(link);
        }
      }
      this.logger.debug("crawl.page", { data: { url: entry.url, depth: entry.depth, links: links.length } });
      return Object.freeze({ url: entry.url, title: page.title, links: Object.freeze(links), depth: entry.depth });
    } catch (error) {
      const message = describeCause(error);
      this.logger.warn("crawl.page_failed", { data: { url: entry.url, depth: entry.depth, error: message } });
      return Object.freeze({ url: entry.url, title: "", links: Object.freeze([]), depth: entry.depth, error: message });
    }
  }
}

function definedOnly(options: CrawlOptions): CrawlOptions {
  const result: CrawlOptions = {};
  if (typeof options.maxPages === "number") result.maxPages = options.maxPages;
  if (typeof options.settleMs === "number") result.settleMs = options.settleMs;
  if (typeof options.navigationTimeoutMs === "number") result.navigationTimeoutMs = options.navigationTimeoutMs;
  return result;
}
