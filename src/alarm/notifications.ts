import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ResourceUnavailableError, describeError } from "../errors.js";

const execFileAsync = promisify(execFile);

export interface AlarmNotification {
  title: string;
  body: string;
}

export interface NotificationSink {
  notify(notification: AlarmNotification): Promise<void>;
}

export function escapeAppleScript(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n").replace(/\r/g, "\\r");
}

export function buildNotificationScript({ title, body }: AlarmNotification): string {
  return `display notification "${escapeAppleScript(body)}" with title "${escapeAppleScript(title)}" sound name "default"`;
}

/** Delivers notifications through macOS Notification Center. */
export class OsascriptNotificationSink implements NotificationSink {
  async notify(notification: AlarmNotification): Promise<void> {
    try {
      await execFileAsync("osascript", ["-e", buildNotificationScript(notification)]);
    } catch (error) {
      throw new ResourceUnavailableError("notification", `Notification was not delivered: ${describeError(error)}`, {
        cause: error
      });
    }
  }
}
