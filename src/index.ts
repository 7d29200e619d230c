#!/usr/bin/env node
import { USAGE, createShutdown, runChecks } from "./cli.js";
import { appConfig } from "./config.js";
import { EventLog } from "./log.js";
import type { MonitorDeps } from "./monitor.js";
import { PushoverNotifier } from "./pushover.js";
import { CheckerScheduler } from "./scheduler.js";
import { fetchPage } from "./scraper.js";
import { buildServer } from "./server.js";
import { VersionStore } from "./store.js";

function createDeps(): MonitorDeps {
  const log = new EventLog(appConfig.LOG_PATH);
  return {
    log,
    store: new VersionStore(appConfig.DATA_DIR, appConfig.LASTCHECK_FILE),
    notifier: new PushoverNotifier(
      {
        token: appConfig.PUSHOVER_TOKEN,
        user: appConfig.PUSHOVER_USER,
        device: appConfig.PUSHOVER_DEVICE,
        priority: appConfig.PUSHOVER_PRIORITY,
        enabled: appConfig.PUSHOVER_ENABLED,
      },
      log,
    ),
    fetchPage: (url) => fetchPage(url, appConfig.HTTP_TIMEOUT_MS),
  };
}

async function serve(): Promise<void> {
  const deps = createDeps();
  const scheduler = new CheckerScheduler(appConfig.checkers, deps);
  const server = buildServer({
    allowedHosts: appConfig.WEB_ALLOWED_HOSTS,
    dashboard: {
      title: appConfig.WEB_TITLE,
      targets: appConfig.checkers,
      store: deps.store,
      log: deps.log,
      logLines: appConfig.WEB_LOG_LINES,
    },
  });

  const shutdown = createShutdown(scheduler, server);
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
  process.once("SIGINT", () => void shutdown("SIGINT"));

  await server.listen({ host: appConfig.WEB_HOST, port: appConfig.WEB_PORT });
  console.log(`[WEB] Dashboard listening on http://${appConfig.WEB_HOST}:${appConfig.WEB_PORT}`);

  console.log(`[APP] Version watch starting with ${scheduler.enabledTargets.length} checker(s).`);
  await scheduler.start({ runImmediately: appConfig.RUN_ON_STARTUP, concurrency: appConfig.CHECK_CONCURRENCY });
  console.log("[APP] All checkers scheduled.");
}

async function main(argv: string[]): Promise<void> {
  const [command = "serve", ...rest] = argv;
  if (command === "serve") {
    await serve();
  } else if (command === "check") {
    process.exitCode = await runChecks(rest, appConfig.checkers, createDeps(), appConfig.CHECK_CONCURRENCY);
  } else {
    console.error(`[APP] Unknown command "${command}". ${USAGE}`);
    process.exitCode = 1;
  }
}

main(process.argv.slice(2)).catch((e) => {
  console.error("[APP] Fatal:", e);
  process.exit(1);
});
