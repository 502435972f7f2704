import { addSeconds, format } from "date-fns";
import { presetDisplayName } from "../state/settingsStore.js";
import type { TimerPreset, TimerSnapshot } from "../types.js";

export const IDLE_GLYPH = "⏱";
export const MAX_LABEL_LENGTH = 15;
export const ELLIPSIS = "…";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatSeconds(totalSeconds: number): string {
  const safe = Math.max(Math.floor(totalSeconds), 0);
  const hours = Math.floor(safe / 3600);
  const minutes = Math.floor((safe % 3600) / 60);
  const seconds = safe % 60;
  return hours > 0 ? `${hours}:${pad(minutes)}:${pad(seconds)}` : `${pad(minutes)}:${pad(seconds)}`;
}

export function formatTime(snapshot: TimerSnapshot): string {
  return formatSeconds(snapshot.remainingSeconds);
}

export function truncateLabel(label: string, maxLength = MAX_LABEL_LENGTH): string {
  const characters = Array.from(label);
  return characters.length > maxLength ? characters.slice(0, maxLength).join("") + ELLIPSIS : label;
}

export function menuBarLabel(snapshot: TimerSnapshot): string {
  if (snapshot.state === "idle") {
    return IDLE_GLYPH;
  }
  const time = formatTime(snapshot);
  return snapshot.taskLabel ? `${time} · ${truncateLabel(snapshot.taskLabel)}` : time;
}

export function progressFraction(snapshot: TimerSnapshot): number {
  if (snapshot.totalSeconds === 0) {
    return 0;
  }
  return (snapshot.totalSeconds - snapshot.remainingSeconds) / snapshot.totalSeconds;
}

/** Wall-clock time the running timer will reach zero, e.g. "14:05". */
export function estimatedEnd(snapshot: TimerSnapshot, now: Date): string | null {
  if (snapshot.state !== "running") {
    return null;
  }
  return format(addSeconds(now, snapshot.remainingSeconds), "HH:mm");
}

export function formatDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const parts: string[] = [];

  if (hours > 0) {
    parts.push(`${hours} hour${hours === 1 ? "" : "s"}`);
  }
  if (minutes > 0) {
    parts.push(`${minutes} minute${minutes === 1 ? "" : "s"}`);
  }
  if (seconds > 0) {
    parts.push(`${seconds} second${seconds === 1 ? "" : "s"}`);
  }

  if (parts.length === 0) {
    return "0 seconds";
  }
  if (parts.length === 1) {
    return parts[0];
  }
  return `${parts.slice(0, -1).join(", ")} and ${parts[parts.length - 1]}`;
}

export function statusCopy(snapshot: TimerSnapshot): string {
  switch (snapshot.state) {
    case "running":
      return `${formatTime(snapshot)} remaining`;
    case "paused":
      return `Paused with ${formatTime(snapshot)} left`;
    case "alarming":
      return "Time's up";
    case "idle":
      return "No timer running";
  }
}

export interface MenuBarContent {
  surface: "menu_bar";
  title: string;
  accessibilityLabel: string;
}

export interface FloatingPanelContent {
  surface: "floating_panel";
  visible: boolean;
  time: string;
  dimmed: boolean;
  taskLabel: string | null;
  progress: number;
}

export interface PresetButton {
  id: string;
  label: string;
}

export interface PopoverContent {
  surface: "popover";
  displayTime: string;
  sliderFraction: number;
  taskLabel: string;
  presets: PresetButton[];
  /** Presets past the first three, listed in the "…" menu. */
  overflowPresets: PresetButton[];
  controls: {
    toggle: "pause" | "play";
    stop: true;
  } | null;
  endsAt: string | null;
}

export interface TimerStructuredContent {
  state: TimerSnapshot["state"];
  remainingSeconds: number;
  totalSeconds: number;
  taskLabel: string;
  progress: number;
  menuBar: MenuBarContent;
  floatingPanel?: FloatingPanelContent;
  popover?: PopoverContent;
}

export function buildMenuBar(snapshot: TimerSnapshot): MenuBarContent {
  const title = menuBarLabel(snapshot);
  return {
    surface: "menu_bar",
    title,
    accessibilityLabel: snapshot.taskLabel ? `Timer ${snapshot.taskLabel}, ${statusCopy(snapshot)}` : `Timer, ${statusCopy(snapshot)}`
  };
}

export function buildFloatingPanel(snapshot: TimerSnapshot, visible: boolean): FloatingPanelContent {
  const idle = snapshot.state === "idle";
  return {
    surface: "floating_panel",
    visible,
    time: idle ? "00:00" : formatTime(snapshot),
    dimmed: idle,
    taskLabel: snapshot.taskLabel || null,
    progress: progressFraction(snapshot)
  };
}

export const VISIBLE_PRESET_COUNT = 3;

export function buildPresetButtons(
  presets: TimerPreset[],
  visible = VISIBLE_PRESET_COUNT
): Pick<PopoverContent, "presets" | "overflowPresets"> {
  const buttons = presets.map(preset => ({ id: preset.id, label: presetDisplayName(preset) }));
  return { presets: buttons.slice(0, visible), overflowPresets: buttons.slice(visible) };
}

export function buildTimerStructuredContent(input: {
  snapshot: TimerSnapshot;
  floatingPanel?: FloatingPanelContent;
  popover?: PopoverContent;
}): TimerStructuredContent {
  const { snapshot, floatingPanel, popover } = input;
  return {
    state: snapshot.state,
    remainingSeconds: snapshot.remainingSeconds,
    totalSeconds: snapshot.totalSeconds,
    taskLabel: snapshot.taskLabel,
    progress: progressFraction(snapshot),
    menuBar: buildMenuBar(snapshot),
    floatingPanel,
    popover
  };
}
