import type { CheckStage } from "./types.js";

/**
 * Base for failures that end a single checker run. The stage tells the
 * monitor which part of the run gave up.
 */
export abstract class CheckError extends Error {
  abstract readonly stage: CheckStage;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class FetchError extends CheckError {
  readonly stage = "fetch" as const;
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause);
    this.url = url;
    this.status = options.status;
  }
}

export class ExtractionError extends CheckError {
  readonly stage = "extract" as const;
}

export class StoreError extends CheckError {
  readonly stage = "store" as const;
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(message, cause);
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
