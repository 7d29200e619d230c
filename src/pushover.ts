import axios from "axios";
import { errorMessage } from "./errors.js";
import type { EventLog } from "./log.js";
import type { Notification, Notifier } from "./types.js";

export const PUSHOVER_API_URL = "https://api.pushover.net/1/messages.json";

export interface PushoverOptions {
  token?: string;
  user?: string;
  device?: string;
  priority: number;
  enabled: boolean;
}

export class PushoverNotifier implements Notifier {
  constructor(
    private readonly options: PushoverOptions,
    private readonly log: EventLog,
  ) {}

  get enabled(): boolean {
    return this.options.enabled && Boolean(this.options.token && this.options.user);
  }

  /** Resolves true only when Pushover accepted the message; never rejects. */
  async send(notification: Notification): Promise<boolean> {
    const { token, user, device } = this.options;
    if (!this.enabled || !token || !user) return false;

    const payload = new URLSearchParams({
      token,
      user,
      title: notification.title,
      message: notification.message,
      priority: String(notification.priority ?? this.options.priority),
    });
    if (device) payload.set("device", device);

    try {
      const res = await axios.post<unknown>(PUSHOVER_API_URL, payload, {
        timeout: 10000,
        responseType: "text",
        validateStatus: () => true,
      });
      if (res.status !== 200) {
        const body = typeof res.data === "string" ? res.data : "";
        this.log.error(`Pushover API error ${res.status}: ${body.slice(0, 200)}`);
        return false;
      }
      return true;
    } catch (err) {
      this.log.error(`Failed to send Pushover notification: ${errorMessage(err)}`);
      return false;
    }
  }
}
