import { findApp } from "./apps.js";
import { type MonitorDeps, runAll } from "./monitor.js";
import type { CheckTarget } from "./types.js";

export const USAGE = "Usage: arcade-version-watch [serve | check [id...]]";

/**
 * One-shot run of the named checkers (all of them when `ids` is empty).
 * Prints one line per result and resolves to the process exit code.
 */
export async function runChecks(
  ids: string[],
  targets: CheckTarget[],
  deps: MonitorDeps,
  concurrency?: number,
): Promise<number> {
  const wanted = new Set<string>();
  const unknown: string[] = [];
  for (const id of ids) {
    const app = findApp(id);
    if (app && targets.some((t) => t.app.id === app.id)) wanted.add(app.id);
    else unknown.push(id);
  }
  if (unknown.length > 0) {
    console.error(`[APP] Unknown checker(s): ${unknown.join(", ")}`);
    return 1;
  }

  const selected = wanted.size ? targets.filter((t) => wanted.has(t.app.id)) : targets;
  const results = await runAll(selected, deps, concurrency);

  let failed = false;
  for (const [id, result] of results) {
    if (result.status === "error") {
      failed = true;
      console.log(`${id}: error (${result.stage}) ${result.message}`);
    } else {
      console.log(`${id}: ${result.status} ${result.version}`);
    }
  }
  return failed ? 1 : 0;
}

export interface Stoppable {
  stop(): void;
}

export interface Closable {
  close(): PromiseLike<unknown>;
}

/** Signal handler for `serve`: stops the timers, closes the server, then exits. */
export function createShutdown(
  scheduler: Stoppable,
  server: Closable,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => Promise<void> {
  return async (signal) => {
    console.log(`[APP] Received ${signal}, shutting down...`);
    scheduler.stop();
    try {
      await server.close();
      exit(0);
    } catch (err) {
      console.error("[APP] Error while closing server:", err);
      exit(1);
    }
  };
}
