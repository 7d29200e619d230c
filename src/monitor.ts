import pLimit from "p-limit";
import { errorMessage } from "./errors.js";
import type { EventLog } from "./log.js";
import type { PageFetcher } from "./scraper.js";
import type { VersionStore } from "./store.js";
import type { CheckResult, CheckStage, CheckTarget, ExtractedVersion, Notifier } from "./types.js";

export interface MonitorDeps {
  store: VersionStore;
  log: EventLog;
  notifier: Notifier;
  fetchPage: PageFetcher;
  now?: () => Date;
}

function describe(v: ExtractedVersion): string {
  return `${v.version}${v.previous ? ` (from ${v.previous})` : ""}${v.prerelease ? " (beta)" : ""}`;
}

/**
 * One run of one checker: fetch, extract, compare with the cached version,
 * and on change persist it and notify. Failures end the run and come back
 * as an `error` result; the cache is only written once a version was found.
 */
export async function runCheck(target: CheckTarget, deps: MonitorDeps): Promise<CheckResult> {
  const { store, log, notifier } = deps;
  const { app, label } = target;
  const now = (deps.now ?? (() => new Date()))();

  const fail = async (stage: CheckStage, message: string): Promise<CheckResult> => {
    log.error(message);
    if (target.notifyOnError) {
      await notifier.send({ title: `${label} Check Error`, message });
    }
    return { status: "error", stage, message };
  };

  // Recorded whatever the outcome of the run
  try {
    await store.writeLastCheck({ timestamp: now, label });
  } catch (err) {
    log.error(`${label}: ${errorMessage(err)}`);
  }

  let html: string;
  try {
    html = await deps.fetchPage(target.url);
  } catch (err) {
    return fail("fetch", `${label} ERROR: failed to fetch ${app.pageName}: ${errorMessage(err)}`);
  }

  let extracted: ExtractedVersion;
  try {
    extracted = app.extract(html);
  } catch (err) {
    return fail("extract", `${label} ERROR: failed to parse version from ${app.pageName}: ${errorMessage(err)}`);
  }

  let local: string | null;
  try {
    local = (await store.readVersion(target.versionFile))?.version ?? null;
  } catch (err) {
    return fail("store", `${label} ERROR: ${errorMessage(err)}`);
  }

  if (local === null) {
    log.error(`${label}: no local version found; treating ${extracted.version} as new.`);
  } else {
    log.info(`${label}: local version ${local}, ${app.pageName} reports ${describe(extracted)}`);
  }

  if (local === extracted.version) {
    log.info(`${label}: version ${local} is current.`);
    return { status: "unchanged", version: local };
  }

  log.info(`${label}: new version detected. Local=${local ?? "none"}, ${app.pageName}=${describe(extracted)}`);
  try {
    await store.writeVersion(target.versionFile, { version: extracted.version, recordedAt: now });
  } catch (err) {
    return fail("store", `${label} ERROR: ${errorMessage(err)}`);
  }

  let notified = false;
  if (target.notifyOnUpdate) {
    notified = await notifier.send({
      title: `New ${label} Version`,
      message: app.describeUpdate(label, extracted),
    });
  }

  return { status: "changed", version: extracted.version, previousVersion: local, notified };
}

export async function runAll(
  targets: CheckTarget[],
  deps: MonitorDeps,
  concurrency = 2,
): Promise<Map<string, CheckResult>> {
  const limiter = pLimit(concurrency);
  const results = await Promise.all(
    targets.map((target) => limiter(async () => [target.app.id, await runCheck(target, deps)] as const)),
  );
  return new Map(results);
}
