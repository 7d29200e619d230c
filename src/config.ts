import { config as loadDotenv } from "dotenv";
import cron from "node-cron";
import { z } from "zod";
import { APPS } from "./apps.js";
import type { AppDefinition, CheckTarget } from "./types.js";

loadDotenv();

export const DEFAULT_SCHEDULE = "0 */6 * * *";

const flag = (fallback: boolean) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => v.trim().toLowerCase() === "true");

const integer = (fallback: number, min: number, max: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => Number(v.trim()))
    .pipe(z.number().int().min(min).max(max));

// Blank values count as unset
const optionalText = z
  .string()
  .optional()
  .transform((v) => v?.trim() || undefined);

const schema = z.object({
  DATA_DIR: z.string().min(1).default("./data"),
  LASTCHECK_FILE: z.string().min(1).default("lastcheck"),
  LOG_PATH: z.string().min(1).default("./data/arcadecheck.log"),
  HTTP_TIMEOUT_MS: integer(20000, 1000, 300000),
  CHECK_CONCURRENCY: integer(2, 1, 10),
  RUN_ON_STARTUP: flag(true),
  WEB_HOST: z.string().min(1).default("0.0.0.0"),
  WEB_PORT: integer(5000, 1, 65535),
  WEB_TITLE: z.string().min(1).default("Arcade App Version Monitor"),
  WEB_LOG_LINES: integer(40, 0, 10000),
  WEB_ALLOWED_HOSTS: z
    .string()
    .default("")
    .transform((v) => v.split(/[\s,]+/).filter(Boolean)),
  PUSHOVER_TOKEN: optionalText,
  PUSHOVER_USER: optionalText,
  PUSHOVER_DEVICE: optionalText,
  PUSHOVER_PRIORITY: integer(0, -2, 2),
  PUSHOVER_ENABLED: flag(true),
});

const checkerSchema = (app: AppDefinition) =>
  z.object({
    url: z.string().url().default(app.defaultUrl),
    versionFile: z.string().min(1).default(`${app.id}.ver`),
    label: z.string().min(1).default(app.label),
    schedule: z
      .string()
      .default(DEFAULT_SCHEDULE)
      .transform((v) => v.trim())
      .refine((v) => v.toLowerCase() === "off" || cron.validate(v), "invalid cron expression")
      .transform((v) => (v.toLowerCase() === "off" ? null : v)),
    notifyOnUpdate: flag(true),
    notifyOnError: flag(true),
  });

// Checker setting -> environment variable suffix, e.g. MAME_VERSION_FILE
const CHECKER_ENV = {
  url: "URL",
  versionFile: "VERSION_FILE",
  label: "LABEL",
  schedule: "SCHEDULE",
  notifyOnUpdate: "NOTIFY_ON_UPDATE",
  notifyOnError: "NOTIFY_ON_ERROR",
} as const;

export type AppConfig = z.infer<typeof schema> & { checkers: CheckTarget[] };

function formatIssues(error: z.ZodError, nameOf: (key: string) => string = (k) => k): string[] {
  return error.errors.map((e) => `${nameOf(e.path.map(String).join("."))}: ${e.message}`);
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const errs: string[] = [];

  const parsed = schema.safeParse(env);
  if (!parsed.success) errs.push(...formatIssues(parsed.error));

  const checkers: CheckTarget[] = [];
  for (const app of APPS) {
    const envName = (key: string): string => {
      const suffix = Object.entries(CHECKER_ENV).find(([k]) => k === key)?.[1] ?? key;
      return `${app.id.toUpperCase()}_${suffix}`;
    };
    const input = Object.fromEntries(Object.keys(CHECKER_ENV).map((key) => [key, env[envName(key)]]));
    const result = checkerSchema(app).safeParse(input);
    if (result.success) checkers.push({ app, ...result.data });
    else errs.push(...formatIssues(result.error, envName));
  }

  if (!parsed.success || errs.length > 0) {
    // Show concise errors without secrets
    throw new Error(`Invalid configuration: ${errs.join(", ")}`);
  }

  return { ...parsed.data, checkers };
}

export const appConfig = parseConfig(process.env);
