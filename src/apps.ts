import {
  extractLaunchBoxVersion,
  extractLedBlinkyVersion,
  extractMameVersion,
  extractRetroArchVersion,
  extractScummVmVersion,
} from "./extractors.js";
import type { AppDefinition } from "./types.js";

export const APPS: AppDefinition[] = [
  {
    id: "mame",
    label: "MAME",
    defaultUrl: "https://pleasuredome.github.io/pleasuredome/mame/index.html",
    pageName: "Pleasuredome page",
    extract: extractMameVersion,
    describeUpdate: (label, v) =>
      `New ${label} update ROMs version ${v.version} is available` +
      (v.previous ? ` (from ${v.previous}).` : "."),
  },
  {
    id: "launchbox",
    label: "LaunchBox",
    defaultUrl: "https://www.launchbox-app.com/about/changelog",
    pageName: "changelog page",
    extract: extractLaunchBoxVersion,
    describeUpdate: (label, v) => `New ${label} version ${v.version}${v.prerelease ? " (beta)" : ""} is available.`,
  },
  {
    id: "ledblinky",
    label: "LEDBlinky",
    defaultUrl: "https://ledblinky.net/Download.htm",
    pageName: "download page",
    extract: extractLedBlinkyVersion,
    describeUpdate: (label, v) => `New ${label} version ${v.version} is available.`,
  },
  {
    id: "retroarch",
    label: "RetroArch",
    defaultUrl: "https://www.retroarch.com/?page=platforms",
    pageName: "platforms page",
    extract: extractRetroArchVersion,
    describeUpdate: (label, v) => `New ${label} stable version ${v.version} is available.`,
  },
  {
    id: "scummvm",
    label: "ScummVM",
    defaultUrl: "https://www.scummvm.org/downloads/",
    pageName: "downloads page",
    extract: extractScummVmVersion,
    describeUpdate: (label, v) => `New ${label} stable version ${v.version} is available.`,
  },
];

export function findApp(id: string): AppDefinition | undefined {
  return APPS.find((a) => a.id === id.toLowerCase());
}
