import type { Cancellable, Clock } from "../clock.js";
import type { Logger } from "../logger.js";
import type { AlarmSequence, AlarmStarter } from "../timers.js";
import type { TimerSnapshot } from "../types.js";
import type { NotificationSink } from "./notifications.js";
import type { Playback, SoundPlayer } from "./soundPlayer.js";

export interface SettingsReader {
  selectedAlarmSound(): string;
}

export interface AlarmSequencerOptions {
  player: SoundPlayer;
  notifier: NotificationSink;
  settings: SettingsReader;
  clock: Clock;
  logger: Logger;
}

export const ALARM_TITLE = "Timer Finished!";
/** Extra plays after the first one. */
export const ALARM_REPEATS = 2;
export const GRACE_MULTIPLIER = 3;
export const FALLBACK_GRACE_MS = 3000;
export const FALLBACK_BEEP_COUNT = 5;
export const FALLBACK_BEEP_SPACING_MS = 500;

export function alarmBody(taskLabel: string): string {
  return taskLabel ? `Task completed: ${taskLabel}` : "Your timer has completed.";
}

export class AlarmSequencer implements AlarmStarter {
  constructor(private readonly options: AlarmSequencerOptions) {}

  begin(expired: TimerSnapshot, onFinished: () => void): AlarmSequence {
    const sequence = new ActiveAlarm(this.options, expired, onFinished);
    sequence.run();
    return sequence;
  }
}

class ActiveAlarm implements AlarmSequence {
  private active = true;
  private playback: Playback | null = null;
  private readonly pending = new Set<Cancellable>();
  private readonly logger: Logger;

  constructor(
    private readonly options: AlarmSequencerOptions,
    private readonly expired: TimerSnapshot,
    private readonly onFinished: () => void
  ) {
    this.logger = options.logger.child({ sessionId: expired.sessionId });
  }

  run(): void {
    this.playSound().catch(error => {
      this.logger.error({ err: error }, "Alarm playback step failed");
    });
    this.sendNotification().catch(error => {
      this.logger.error({ err: error }, "Alarm notification step failed");
    });
  }

  cancel(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    for (const task of this.pending) {
      task.cancel();
    }
    this.pending.clear();
    this.silence();
  }

  private async playSound(): Promise<void> {
    const soundId = this.options.settings.selectedAlarmSound();
    let playback: Playback;
    try {
      playback = await this.options.player.play(soundId, { repeats: ALARM_REPEATS });
    } catch (error) {
      this.logger.warn({ err: error, soundId }, "Alarm sound unavailable, falling back to system beeps");
      if (this.active) {
        this.beepFallback();
      }
      return;
    }

    if (!this.active) {
      playback.stop();
      return;
    }

    this.playback = playback;
    const graceMs =
      playback.durationSeconds === null
        ? FALLBACK_GRACE_MS
        : Math.round(playback.durationSeconds * GRACE_MULTIPLIER * 1000);
    this.schedule(graceMs, () => this.finish());
  }

  private beepFallback(): void {
    for (let index = 0; index < FALLBACK_BEEP_COUNT; index += 1) {
      this.schedule(index * FALLBACK_BEEP_SPACING_MS, () => this.beep());
    }
    this.schedule(FALLBACK_GRACE_MS, () => this.finish());
  }

  private beep(): void {
    if (!this.active) {
      return;
    }
    this.options.player.beep().catch(error => {
      this.logger.debug({ err: error }, "System beep failed");
    });
  }

  private async sendNotification(): Promise<void> {
    try {
      await this.options.notifier.notify({
        title: ALARM_TITLE,
        body: alarmBody(this.expired.taskLabel)
      });
    } catch (error) {
      this.logger.warn({ err: error }, "Could not deliver timer notification");
    }
  }

  private schedule(delayMs: number, task: () => void): void {
    const handle = this.options.clock.setTimeout(() => {
      this.pending.delete(handle);
      task();
    }, delayMs);
    this.pending.add(handle);
  }

  private finish(): void {
    if (!this.active) {
      return;
    }
    this.cancel();
    this.onFinished();
  }

  private silence(): void {
    if (!this.playback) {
      return;
    }
    try {
      this.playback.stop();
    } catch (error) {
      this.logger.debug({ err: error }, "Stopping alarm playback failed");
    }
    this.playback = null;
  }
}
