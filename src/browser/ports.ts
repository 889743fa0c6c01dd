import { createServer } from "net";
import type { PortRange } from "../config";

export type PortProbe = (port: number) => Promise<boolean>;

/** True when nothing is bound to `host:port`; checked by binding and releasing it. */
export async function isPortFree(port: number, host = "127.0.0.1"): Promise<boolean> {
  return await new Promise<boolean>((resolve) => {
    const server = createServer();
    server.unref();
    server.once("error", () => resolve(false));
    server.once("listening", () => {
      server.close(() => resolve(true));
    });
    server.listen({ port, host, exclusive: true });
  });
}

/**
 * Order in which ports are tried: the preferred port, then upward to the end
 * of the range, then wrapping once from the start of the range.
 */
export function candidatePorts(range: PortRange, preferred?: number): number[] {
  const ordered: number[] = [];
  const seen = new Set<number>();
  const push = (port: number): void => {
    if (seen.has(port)) return;
    seen.add(port);
    ordered.push(port);
  };

  if (typeof preferred === "number") {
    push(preferred);
  }
  const pivot = typeof preferred === "number" ? Math.max(preferred, range.start) : range.start;
  for (let port = pivot; port <= range.end; port += 1) push(port);
  for (let port = range.start; port < Math.min(pivot, range.end + 1); port += 1) push(port);
  return ordered;
}

export async function findFreePort(
  range: PortRange,
  options: {
    preferred?: number;
    isTaken?: (port: number) => boolean;
    probe?: PortProbe;
  } = {}
): Promise<number | null> {
  const probe = options.probe ?? ((port: number) => isPortFree(port));
  for (const port of candidatePorts(range, options.preferred)) {
    if (options.isTaken?.(port)) continue;
    if (await probe(port)) return port;
  }
  return null;
}
