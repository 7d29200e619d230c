import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EventLog } from "../log.js";
import { PUSHOVER_API_URL, PushoverNotifier, type PushoverOptions } from "../pushover.js";
import { read, tempDir } from "./helpers/fixtures.js";

const { post } = vi.hoisted(() => ({ post: vi.fn() }));
vi.mock("axios", () => ({ default: { post } }));

const enabled: PushoverOptions = { token: "test-token", user: "test-user", priority: 0, enabled: true };

describe("PushoverNotifier", () => {
  let log: EventLog;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    post.mockReset();
    log = new EventLog(path.join(tempDir(), "check.log"), () => new Date(Date.UTC(2025, 0, 2, 3, 4, 5)));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stays silent without credentials or when switched off", async () => {
    const noUser = new PushoverNotifier({ token: "test-token", priority: 0, enabled: true }, log);
    const off = new PushoverNotifier({ ...enabled, enabled: false }, log);

    expect(noUser.enabled).toBe(false);
    await expect(noUser.send({ title: "t", message: "m" })).resolves.toBe(false);
    await expect(off.send({ title: "t", message: "m" })).resolves.toBe(false);
    expect(post).not.toHaveBeenCalled();
  });

  it("posts a form-encoded message", async () => {
    post.mockResolvedValue({ status: 200, data: '{"status":1}' });
    const notifier = new PushoverNotifier({ ...enabled, device: "cab1" }, log);

    await expect(notifier.send({ title: "New MAME Version", message: "hello world" })).resolves.toBe(true);

    expect(post).toHaveBeenCalledTimes(1);
    const [url, body] = post.mock.calls[0] ?? [];
    expect(url).toBe(PUSHOVER_API_URL);
    expect(String(body)).toBe(
      "token=test-token&user=test-user&title=New+MAME+Version&message=hello+world&priority=0&device=cab1",
    );
  });

  it("lets a notification override the default priority", async () => {
    post.mockResolvedValue({ status: 200, data: "" });
    await new PushoverNotifier(enabled, log).send({ title: "t", message: "m", priority: 1 });

    const [, body] = post.mock.calls[0] ?? [];
    expect(new URLSearchParams(String(body)).get("priority")).toBe("1");
  });

  it("logs API errors instead of throwing", async () => {
    post.mockResolvedValue({ status: 400, data: "application token is invalid" });

    await expect(new PushoverNotifier(enabled, log).send({ title: "t", message: "m" })).resolves.toBe(false);
    expect(read(log.filePath)).toBe("2025-01-02 03:04:05 (-) Pushover API error 400: application token is invalid\n");
  });

  it("logs transport failures instead of throwing", async () => {
    post.mockRejectedValue(new Error("socket hang up"));

    await expect(new PushoverNotifier(enabled, log).send({ title: "t", message: "m" })).resolves.toBe(false);
    expect(read(log.filePath)).toBe("2025-01-02 03:04:05 (-) Failed to send Pushover notification: socket hang up\n");
  });
});
