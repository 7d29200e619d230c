import fs from "node:fs";
import path from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { StoreError } from "../errors.js";
import { VersionStore } from "../store.js";
import { read, tempDir } from "./helpers/fixtures.js";

describe("VersionStore", () => {
  let dir: string;
  let store: VersionStore;

  beforeEach(() => {
    dir = tempDir();
    store = new VersionStore(path.join(dir, "data"));
  });

  it("returns null for a missing version file", async () => {
    expect(await store.readVersion("mame.ver")).toBeNull();
  });

  it("writes the version and the date on two lines", async () => {
    await store.writeVersion("mame.ver", { version: "0.283", recordedAt: new Date(2025, 2, 5, 18, 0) });

    expect(read(path.join(dir, "data", "mame.ver"))).toBe("0.283\n03-05-2025\n");
    expect(await store.readVersion("mame.ver")).toEqual({ version: "0.283", dateText: "03-05-2025" });
  });

  it("treats a blank first line as no version", async () => {
    fs.mkdirSync(store.dataDir, { recursive: true });
    fs.writeFileSync(store.versionPath("mame.ver"), "\n03-05-2025\n");
    expect(await store.readVersion("mame.ver")).toBeNull();
  });

  it("accepts a version file without a date line", async () => {
    fs.mkdirSync(store.dataDir, { recursive: true });
    fs.writeFileSync(store.versionPath("scummvm.ver"), "  2.9.1  ");
    expect(await store.readVersion("scummvm.ver")).toEqual({ version: "2.9.1", dateText: null });
  });

  it("overwrites the shared last-check file", async () => {
    await store.writeLastCheck({ timestamp: new Date(2025, 2, 5, 15, 30, 22), label: "MAME" });
    await store.writeLastCheck({ timestamp: new Date(2025, 2, 5, 15, 31, 0), label: "ScummVM" });

    expect(read(store.lastCheckPath)).toBe("03-05-2025 15:31:00\nScummVM\n");
    expect(await store.readLastCheck()).toEqual({ timestampText: "03-05-2025 15:31:00", label: "ScummVM" });
  });

  it("ignores an incomplete last-check file", async () => {
    fs.mkdirSync(store.dataDir, { recursive: true });
    fs.writeFileSync(store.lastCheckPath, "03-05-2025 15:31:00\n");
    expect(await store.readLastCheck()).toBeNull();
  });

  it("raises StoreError when a version file cannot be read", async () => {
    fs.mkdirSync(store.versionPath("mame.ver"), { recursive: true });
    await expect(store.readVersion("mame.ver")).rejects.toBeInstanceOf(StoreError);
  });

  it("raises StoreError when a version file cannot be written", async () => {
    fs.mkdirSync(store.dataDir, { recursive: true });
    fs.writeFileSync(path.join(store.dataDir, "blocker"), "");
    await expect(
      store.writeVersion("blocker/mame.ver", { version: "0.283", recordedAt: new Date() }),
    ).rejects.toBeInstanceOf(StoreError);
  });
});
