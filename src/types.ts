export type TimerState = "idle" | "running" | "paused" | "alarming";

export interface TimerSnapshot {
  readonly sessionId: string | null;
  readonly state: TimerState;
  readonly totalSeconds: number;
  readonly remainingSeconds: number;
  readonly taskLabel: string;
  readonly startedAt: string | null;
}

export type TimerEventType = "start" | "pause" | "resume" | "tick" | "expire" | "reset" | "stop";

export interface TimerEvent {
  readonly type: TimerEventType;
  readonly snapshot: TimerSnapshot;
}

export interface TimerPreset {
  id: string;
  name: string;
  minutes: number;
  seconds: number;
}

export interface HotkeyConfig {
  keyCode: number;
  modifiers: number;
}

export type HotkeyAction = "start" | "pauseResume" | "stop";

export interface TimerSettings {
  presets: TimerPreset[];
  selectedAlarmSound: string;
  hotkeys: Record<HotkeyAction, HotkeyConfig | null>;
}

export interface TimerUpdateResult {
  snapshot: TimerSnapshot;
  message: string;
}
