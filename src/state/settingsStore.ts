import { v4 as uuid } from "uuid";
import type { SettingsReader } from "../alarm/alarmSequencer.js";
import type { HotkeyAction, HotkeyConfig, TimerPreset, TimerSettings } from "../types.js";

export const AVAILABLE_SOUNDS = ["Chime", "Bell", "Ping", "Alert", "Complete"] as const;
export const DEFAULT_SOUND = "Chime";

const DEFAULT_PRESETS: ReadonlyArray<Omit<TimerPreset, "id">> = [
  { name: "Quick", minutes: 5, seconds: 0 },
  { name: "Short", minutes: 10, seconds: 0 },
  { name: "Pomodoro", minutes: 25, seconds: 0 }
];

export function defaultSettings(): TimerSettings {
  return {
    presets: DEFAULT_PRESETS.map(preset => ({ id: uuid(), ...preset })),
    selectedAlarmSound: DEFAULT_SOUND,
    hotkeys: { start: null, pauseResume: null, stop: null }
  };
}

export function presetTotalSeconds(preset: Pick<TimerPreset, "minutes" | "seconds">): number {
  return preset.minutes * 60 + preset.seconds;
}

export function presetDisplayName(preset: Pick<TimerPreset, "minutes" | "seconds">): string {
  return preset.seconds === 0 ? `${preset.minutes}m` : `${preset.minutes}m ${preset.seconds}s`;
}

export type PresetInput = Omit<TimerPreset, "id">;

interface SettingsStoreOptions {
  initialSettings?: TimerSettings | null;
  onChange?: (settings: TimerSettings) => void | Promise<void>;
}

export class SettingsStore implements SettingsReader {
  private settings: TimerSettings;
  private readonly onChange?: (settings: TimerSettings) => void | Promise<void>;
  private pendingPersist: Promise<void> = Promise.resolve();
  private lastPersistError: Error | null = null;

  constructor(options: SettingsStoreOptions = {}) {
    this.settings = options.initialSettings ? cloneSettings(options.initialSettings) : defaultSettings();
    this.onChange = options.onChange;
  }

  getAll(): TimerSettings {
    return cloneSettings(this.settings);
  }

  getPresets(): TimerPreset[] {
    return this.settings.presets.map(preset => ({ ...preset }));
  }

  findPreset(idOrName: string): TimerPreset | undefined {
    const needle = idOrName.trim().toLowerCase();
    const match = this.settings.presets.find(preset => preset.id === idOrName || preset.name.toLowerCase() === needle);
    return match ? { ...match } : undefined;
  }

  selectedAlarmSound(): string {
    return this.settings.selectedAlarmSound;
  }

  async waitForPersistence(): Promise<void> {
    try {
      await this.pendingPersist;
    } catch (error) {
      if (!this.lastPersistError && error instanceof Error) {
        this.lastPersistError = error;
      }
    }

    if (this.lastPersistError) {
      const error = this.lastPersistError;
      this.lastPersistError = null;
      this.pendingPersist = Promise.resolve();
      throw error;
    }
  }

  addPreset(input: PresetInput): TimerPreset {
    const preset: TimerPreset = { id: uuid(), ...input };
    this.settings = { ...this.settings, presets: [...this.settings.presets, preset] };
    this.emitChange();
    return { ...preset };
  }

  updatePreset(id: string, input: PresetInput): TimerPreset {
    const index = this.requirePresetIndex(id);
    const updated: TimerPreset = { id, ...input };
    const presets = [...this.settings.presets];
    presets[index] = updated;
    this.settings = { ...this.settings, presets };
    this.emitChange();
    return { ...updated };
  }

  removePreset(id: string): TimerPreset {
    const index = this.requirePresetIndex(id);
    const removed = this.settings.presets[index];
    this.settings = {
      ...this.settings,
      presets: this.settings.presets.filter(preset => preset.id !== id)
    };
    this.emitChange();
    return { ...removed };
  }

  selectAlarmSound(sound: string): void {
    if (!isAvailableSound(sound)) {
      throw new Error(`Unknown alarm sound "${sound}". Choose one of: ${AVAILABLE_SOUNDS.join(", ")}.`);
    }
    this.settings = { ...this.settings, selectedAlarmSound: sound };
    this.emitChange();
  }

  setHotkey(action: HotkeyAction, config: HotkeyConfig | null): void {
    this.settings = {
      ...this.settings,
      hotkeys: { ...this.settings.hotkeys, [action]: config ? { ...config } : null }
    };
    this.emitChange();
  }

  private requirePresetIndex(id: string): number {
    const index = this.settings.presets.findIndex(preset => preset.id === id);
    if (index === -1) {
      throw new Error("Preset not found.");
    }
    return index;
  }

  private emitChange(): void {
    if (!this.onChange) {
      return;
    }

    const snapshot = this.getAll();
    this.lastPersistError = null;
    const result = Promise.resolve(this.onChange(snapshot));
    this.pendingPersist = result.catch(error => {
      this.lastPersistError = error instanceof Error ? error : new Error(String(error));
      throw this.lastPersistError;
    });
  }
}

export function isAvailableSound(sound: string): sound is (typeof AVAILABLE_SOUNDS)[number] {
  return AVAILABLE_SOUNDS.some(candidate => candidate === sound);
}

function cloneSettings(settings: TimerSettings): TimerSettings {
  return {
    presets: settings.presets.map(preset => ({ ...preset })),
    selectedAlarmSound: settings.selectedAlarmSound,
    hotkeys: {
      start: settings.hotkeys.start ? { ...settings.hotkeys.start } : null,
      pauseResume: settings.hotkeys.pauseResume ? { ...settings.hotkeys.pauseResume } : null,
      stop: settings.hotkeys.stop ? { ...settings.hotkeys.stop } : null
    }
  };
}
