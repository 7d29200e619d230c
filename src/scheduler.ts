import cron from "node-cron";
import pLimit from "p-limit";
import { errorMessage } from "./errors.js";
import { type MonitorDeps, runCheck } from "./monitor.js";
import type { CheckResult, CheckTarget } from "./types.js";

export interface ScheduledTaskHandle {
  stop(): void;
}

export type ScheduleFn = (expression: string, job: () => void) => ScheduledTaskHandle;

const cronSchedule: ScheduleFn = (expression, job) => cron.schedule(expression, job);

/**
 * Gives every enabled checker its own cron timer. Runs never overlap per
 * checker and a failing run never takes the timer down with it.
 */
export class CheckerScheduler {
  private readonly tasks: ScheduledTaskHandle[] = [];
  private readonly running = new Set<string>();

  constructor(
    private readonly targets: CheckTarget[],
    private readonly deps: MonitorDeps,
    private readonly schedule: ScheduleFn = cronSchedule,
  ) {}

  get enabledTargets(): CheckTarget[] {
    return this.targets.filter((t) => t.schedule !== null);
  }

  async runOnce(target: CheckTarget): Promise<CheckResult | null> {
    const id = target.app.id;
    if (this.running.has(id)) {
      this.deps.log.error(`${target.label}: previous run still in progress; skipping.`);
      return null;
    }

    this.running.add(id);
    try {
      const result = await runCheck(target, this.deps);
      console.log(`[SCHEDULER] ${target.label}: run completed (${result.status}).`);
      return result;
    } catch (err) {
      console.error(`[SCHEDULER] ${target.label}: unhandled error in checker:`, errorMessage(err));
      return null;
    } finally {
      this.running.delete(id);
    }
  }

  async start(options: { runImmediately: boolean; concurrency?: number }): Promise<void> {
    for (const target of this.targets) {
      if (target.schedule === null) {
        console.log(`[SCHEDULER] ${target.label}: schedule is off, checker disabled.`);
        continue;
      }
      const expression = target.schedule;
      console.log(`[SCHEDULER] ${target.label}: scheduled "${expression}".`);
      this.tasks.push(
        this.schedule(expression, () => {
          void this.runOnce(target);
        }),
      );
    }

    if (options.runImmediately) {
      // runOnce owns each checker's running flag and never rejects.
      const limiter = pLimit(options.concurrency ?? 2);
      await Promise.all(this.enabledTargets.map((target) => limiter(() => this.runOnce(target))));
    }
  }

  stop(): void {
    for (const task of this.tasks.splice(0)) task.stop();
  }
}
