import { z } from "zod";
import { describeError } from "../errors.js";
import { describeHotkey, HOTKEY_ACTIONS, recordHotkey, type HotkeyChannel } from "../hotkeys.js";
import { presetSchema } from "../state/settingsStorage.js";
import { AVAILABLE_SOUNDS, presetDisplayName, presetTotalSeconds, type SettingsStore } from "../state/settingsStore.js";
import type { TimerEngine } from "../timers.js";
import type { HotkeyAction, TimerPreset, TimerSettings, TimerUpdateResult } from "../types.js";
import { formatDuration, formatTime } from "../ui/builders.js";
import { MAX_DURATION_SECONDS, parseDurationSeconds } from "./duration.js";

export const durationInput = z
  .union([
    z.number(),
    z.string().min(1),
    z.object({
      minutes: z.number().int().min(0).default(0),
      seconds: z.number().int().min(0).max(59).default(0)
    })
  ])
  .transform((value, ctx) => {
    if (typeof value === "number") {
      return value;
    }
    if (typeof value === "object") {
      return value.minutes * 60 + value.seconds;
    }
    try {
      return parseDurationSeconds(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(error) });
      return z.NEVER;
    }
  })
  .pipe(
    z
      .number()
      .int({ message: "Durations are counted in whole seconds." })
      .positive({ message: "Timers must be at least 1 second long." })
      .max(MAX_DURATION_SECONDS, { message: "Timers can run for at most 24 hours." })
  );

export const startTimerInput = z
  .object({
    duration: durationInput.optional(),
    preset: z.string().min(1).optional(),
    label: z.string().max(120).optional()
  })
  .refine(value => value.duration !== undefined || value.preset !== undefined, {
    message: "Provide a duration or the name of a preset."
  });

export const presetInput = presetSchema
  .omit({ id: true })
  .refine(value => presetTotalSeconds(value) > 0, { message: "Presets must be at least 1 second long." });

const hotkeyActionSchema = z.enum(["start", "pauseResume", "stop"]);

export const hotkeyBindingInput = z.object({
  action: hotkeyActionSchema,
  keyCode: z.number().int().min(0).max(127).nullable(),
  modifiers: z.number().int().min(0).default(0)
});

export interface PresetSummary extends TimerPreset {
  displayName: string;
}

export interface SettingsSummary {
  presets: PresetSummary[];
  selectedAlarmSound: string;
  availableSounds: string[];
  hotkeys: Record<HotkeyAction, string | null>;
}

export class TimerToolset {
  constructor(
    private readonly engine: TimerEngine,
    private readonly settings: SettingsStore,
    private readonly hotkeys: HotkeyChannel
  ) {}

  status(): TimerUpdateResult {
    const snapshot = this.engine.snapshot();
    switch (snapshot.state) {
      case "running":
        return { snapshot, message: `${this.describeTask(snapshot.taskLabel)} has ${formatTime(snapshot)} left.` };
      case "paused":
        return { snapshot, message: `${this.describeTask(snapshot.taskLabel)} is paused at ${formatTime(snapshot)}.` };
      case "alarming":
        return { snapshot, message: `${this.describeTask(snapshot.taskLabel)} just finished.` };
      case "idle":
        return { snapshot, message: "No timer running." };
    }
  }

  startTimer(input: z.input<typeof startTimerInput>): TimerUpdateResult {
    const parsed = startTimerInput.parse(input);
    let totalSeconds = parsed.duration;
    let label = parsed.label;

    if (totalSeconds === undefined && parsed.preset !== undefined) {
      const preset = this.settings.findPreset(parsed.preset);
      if (!preset) {
        throw new Error(`No preset named "${parsed.preset}".`);
      }
      totalSeconds = presetTotalSeconds(preset);
      label = label ?? preset.name;
    }
    if (totalSeconds === undefined) {
      throw new Error("Provide a duration or the name of a preset.");
    }

    const snapshot = this.engine.start(totalSeconds, label?.trim() ?? "");
    return {
      snapshot,
      message: `Started ${snapshot.taskLabel ? `"${snapshot.taskLabel}"` : "a timer"} for ${formatDuration(totalSeconds)}.`
    };
  }

  pauseTimer(): TimerUpdateResult {
    if (this.engine.snapshot().state !== "running") {
      return { snapshot: this.engine.snapshot(), message: "No running timer to pause." };
    }
    const snapshot = this.engine.pause();
    return { snapshot, message: `Paused with ${formatTime(snapshot)} left.` };
  }

  resumeTimer(): TimerUpdateResult {
    if (this.engine.snapshot().state !== "paused") {
      return { snapshot: this.engine.snapshot(), message: "No paused timer to resume." };
    }
    const snapshot = this.engine.resume();
    return { snapshot, message: `Resumed. ${formatTime(snapshot)} remaining.` };
  }

  togglePauseResume(): TimerUpdateResult {
    const state = this.engine.snapshot().state;
    if (state === "running") {
      return this.pauseTimer();
    }
    if (state === "paused") {
      return this.resumeTimer();
    }
    return { snapshot: this.engine.snapshot(), message: "No active timer to pause or resume." };
  }

  stopTimer(): TimerUpdateResult {
    const wasActive = this.engine.snapshot().state !== "idle";
    const snapshot = this.engine.stop();
    return { snapshot, message: wasActive ? "Timer stopped." : "No timer was running." };
  }

  triggerHotkey(action: HotkeyAction): TimerUpdateResult {
    this.hotkeys.trigger(action);
    return this.status();
  }

  listPresets(): PresetSummary[] {
    return this.settings.getPresets().map(summarizePreset);
  }

  async addPreset(input: z.input<typeof presetInput>): Promise<PresetSummary> {
    const parsed = presetInput.parse(input);
    const preset = this.settings.addPreset(parsed);
    await this.settings.waitForPersistence();
    return summarizePreset(preset);
  }

  async updatePreset(idOrName: string, input: z.input<typeof presetInput>): Promise<PresetSummary> {
    const parsed = presetInput.parse(input);
    const preset = this.settings.updatePreset(this.requirePreset(idOrName).id, parsed);
    await this.settings.waitForPersistence();
    return summarizePreset(preset);
  }

  async removePreset(idOrName: string): Promise<PresetSummary> {
    const preset = this.settings.removePreset(this.requirePreset(idOrName).id);
    await this.settings.waitForPersistence();
    return summarizePreset(preset);
  }

  getSettings(): SettingsSummary {
    return summarizeSettings(this.settings.getAll());
  }

  async selectSound(sound: string): Promise<SettingsSummary> {
    this.settings.selectAlarmSound(sound);
    await this.settings.waitForPersistence();
    return this.getSettings();
  }

  async setHotkey(input: z.input<typeof hotkeyBindingInput>): Promise<SettingsSummary> {
    const parsed = hotkeyBindingInput.parse(input);
    if (parsed.keyCode === null) {
      this.settings.setHotkey(parsed.action, null);
    } else {
      const binding = recordHotkey(parsed.keyCode, parsed.modifiers);
      if (!binding) {
        throw new Error("Hotkeys need at least one of ⌘, ⇧, ⌥ or ⌃.");
      }
      this.settings.setHotkey(parsed.action, binding);
    }
    await this.settings.waitForPersistence();
    return this.getSettings();
  }

  private requirePreset(idOrName: string): TimerPreset {
    const preset = this.settings.findPreset(idOrName);
    if (!preset) {
      throw new Error(`No preset named "${idOrName}".`);
    }
    return preset;
  }

  private describeTask(taskLabel: string): string {
    return taskLabel ? `"${taskLabel}"` : "Timer";
  }
}

function summarizePreset(preset: TimerPreset): PresetSummary {
  return { ...preset, displayName: presetDisplayName(preset) };
}

function summarizeSettings(settings: TimerSettings): SettingsSummary {
  const hotkeys: Record<HotkeyAction, string | null> = { start: null, pauseResume: null, stop: null };
  for (const action of HOTKEY_ACTIONS) {
    const binding = settings.hotkeys[action];
    hotkeys[action] = binding ? describeHotkey(binding) : null;
  }
  return {
    presets: settings.presets.map(summarizePreset),
    selectedAlarmSound: settings.selectedAlarmSound,
    availableSounds: [...AVAILABLE_SOUNDS],
    hotkeys
  };
}
