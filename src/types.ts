export interface VersionRecord {
  version: string;
  recordedAt: Date; // date only, local time
}

export interface LastCheckRecord {
  timestamp: Date;
  label: string; // e.g. "MAME"
}

// What the files hold, before the date text is interpreted
export interface CachedVersion {
  version: string;
  dateText: string | null;
}

export interface CachedLastCheck {
  timestampText: string;
  label: string;
}

export interface ExtractedVersion {
  version: string;
  previous?: string; // e.g. the "from" side of a MAME update set
  prerelease?: boolean;
}

export type ExtractionRule = (html: string) => ExtractedVersion;

export interface AppDefinition {
  id: string; // e.g. "mame"
  label: string;
  defaultUrl: string;
  pageName: string; // used in error messages, e.g. "changelog page"
  extract: ExtractionRule;
  describeUpdate: (label: string, extracted: ExtractedVersion) => string;
}

export interface CheckerSettings {
  url: string;
  versionFile: string;
  label: string;
  schedule: string | null; // null when disabled
  notifyOnUpdate: boolean;
  notifyOnError: boolean;
}

export interface CheckTarget extends CheckerSettings {
  app: AppDefinition;
}

export interface Notification {
  title: string;
  message: string;
  priority?: number;
}

export interface Notifier {
  send(notification: Notification): Promise<boolean>;
}

export type CheckStage = "fetch" | "extract" | "store";

export type CheckResult =
  | { status: "unchanged"; version: string }
  | { status: "changed"; version: string; previousVersion: string | null; notified: boolean }
  | { status: "error"; stage: CheckStage; message: string };
