import type { Clock } from "../clock.js";
import type { SettingsStore } from "../state/settingsStore.js";
import { presetTotalSeconds } from "../state/settingsStore.js";
import type { TimerEngine } from "../timers.js";
import type { TimerEvent, TimerSnapshot } from "../types.js";
import {
  buildFloatingPanel,
  buildPresetButtons,
  estimatedEnd,
  formatSeconds,
  formatTime,
  menuBarLabel,
  type FloatingPanelContent,
  type PopoverContent
} from "./builders.js";

export const MAX_SLIDER_SECONDS = 60 * 60;

/** Keeps the status item title in sync with the engine. */
export class MenuBarStatusItem {
  private currentTitle: string;
  private readonly unsubscribe: () => void;

  constructor(engine: TimerEngine, private readonly render: (title: string) => void = () => undefined) {
    this.currentTitle = menuBarLabel(engine.snapshot());
    this.unsubscribe = engine.subscribe(event => this.handle(event));
  }

  get title(): string {
    return this.currentTitle;
  }

  dispose(): void {
    this.unsubscribe();
  }

  private handle({ snapshot }: TimerEvent): void {
    const title = menuBarLabel(snapshot);
    if (title === this.currentTitle) {
      return;
    }
    this.currentTitle = title;
    this.render(title);
  }
}

/** Always-on-top countdown panel. */
export class FloatingPanel {
  private latest: TimerSnapshot;
  private visible = false;
  private readonly unsubscribe: () => void;

  constructor(engine: TimerEngine) {
    this.latest = engine.snapshot();
    this.unsubscribe = engine.subscribe(({ snapshot }) => {
      this.latest = snapshot;
    });
  }

  get isVisible(): boolean {
    return this.visible;
  }

  show(): void {
    this.visible = true;
  }

  hide(): void {
    this.visible = false;
  }

  toggle(): void {
    this.visible = !this.visible;
  }

  view(): FloatingPanelContent {
    return buildFloatingPanel(this.latest, this.visible);
  }

  dispose(): void {
    this.unsubscribe();
  }
}

/**
 * Draft state behind the menu bar popover: a duration slider, preset shortcuts
 * and the task field. While a timer is active the slider follows the remaining
 * time unless the user is dragging it.
 */
export class PopoverController {
  private latest: TimerSnapshot;
  private sliderSeconds = 0;
  private dragging = false;
  private taskLabel = "";
  private readonly unsubscribe: () => void;

  constructor(
    private readonly engine: TimerEngine,
    private readonly settings: SettingsStore,
    private readonly clock: Clock
  ) {
    this.latest = engine.snapshot();
    this.unsubscribe = engine.subscribe(({ snapshot }) => {
      this.latest = snapshot;
    });
  }

  get draftSeconds(): number {
    return this.sliderSeconds;
  }

  get draftLabel(): string {
    return this.taskLabel;
  }

  beginDrag(): void {
    this.dragging = true;
  }

  endDrag(): void {
    this.dragging = false;
  }

  setSliderSeconds(seconds: number): void {
    this.sliderSeconds = Math.min(Math.max(Math.round(seconds), 0), MAX_SLIDER_SECONDS);
  }

  setSliderFraction(fraction: number): void {
    this.setSliderSeconds(fraction * MAX_SLIDER_SECONDS);
  }

  setTaskLabel(label: string): void {
    this.taskLabel = label;
  }

  selectPreset(id: string): boolean {
    const preset = this.settings.findPreset(id);
    if (!preset) {
      return false;
    }
    this.setSliderSeconds(presetTotalSeconds(preset));
    return true;
  }

  /** Starts a timer from the draft. Returns null when the slider is at zero. */
  start(): TimerSnapshot | null {
    if (this.sliderSeconds <= 0) {
      return null;
    }
    return this.engine.start(this.sliderSeconds, this.taskLabel);
  }

  togglePauseResume(): TimerSnapshot {
    return this.engine.togglePauseResume();
  }

  stop(): TimerSnapshot {
    this.sliderSeconds = 0;
    return this.engine.stop();
  }

  view(): PopoverContent {
    const active = this.latest.state !== "idle";
    const sliderValue = active && !this.dragging ? this.latest.remainingSeconds : this.sliderSeconds;
    return {
      surface: "popover",
      displayTime: active ? formatTime(this.latest) : formatSeconds(this.sliderSeconds),
      sliderFraction: Math.min(1, sliderValue / MAX_SLIDER_SECONDS),
      taskLabel: this.taskLabel,
      ...buildPresetButtons(this.settings.getPresets()),
      controls: active ? { toggle: this.latest.state === "running" ? "pause" : "play", stop: true } : null,
      endsAt: estimatedEnd(this.latest, this.clock.now())
    };
  }

  dispose(): void {
    this.unsubscribe();
  }
}
