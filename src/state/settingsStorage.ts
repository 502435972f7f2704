import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import type { TimerSettings } from "../types.js";

const hotkeySchema = z
  .object({
    keyCode: z.number().int().min(0),
    modifiers: z.number().int().min(0)
  })
  .nullable();

export const presetSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(48),
  minutes: z.number().int().min(0).max(1440),
  seconds: z.number().int().min(0).max(59)
});

export const settingsSchema = z.object({
  presets: z.array(presetSchema),
  selectedAlarmSound: z.string().min(1),
  hotkeys: z.object({
    start: hotkeySchema.default(null),
    pauseResume: hotkeySchema.default(null),
    stop: hotkeySchema.default(null)
  })
});

export interface SettingsStorage {
  /** Returns null when nothing has been saved yet. */
  load(): Promise<TimerSettings | null>;
  save(settings: TimerSettings): Promise<void>;
}

export class SettingsFileStorage implements SettingsStorage {
  private pending = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async load(): Promise<TimerSettings | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const parsed = settingsSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Settings file ${this.filePath} is invalid: ${parsed.error.issues.map(issue => issue.message).join("; ")}`);
    }
    return parsed.data;
  }

  async save(settings: TimerSettings): Promise<void> {
    const serialized = JSON.stringify(settings, null, 2);
    this.pending = this.pending
      .catch(() => undefined)
      .then(async () => {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, serialized, "utf-8");
      });
    await this.pending;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
