import { formatISO } from "date-fns";
import { v4 as uuid } from "uuid";
import { TICK_INTERVAL_MS, type Cancellable, type Clock } from "./clock.js";
import { InvalidDurationError } from "./errors.js";
import type { Logger } from "./logger.js";
import { ObserverFanout, type Listener } from "./state/fanout.js";
import type { TimerEvent, TimerEventType, TimerSnapshot, TimerState } from "./types.js";

export interface AlarmSequence {
  cancel(): void;
}

export interface AlarmStarter {
  /** Starts the alarm for an expired session. `onFinished` fires once when the grace period ends. */
  begin(expired: TimerSnapshot, onFinished: () => void): AlarmSequence;
}

export interface TimerEngineOptions {
  clock: Clock;
  alarm: AlarmStarter;
  logger: Logger;
}

export class TimerEngine {
  private readonly clock: Clock;
  private readonly alarm: AlarmStarter;
  private readonly logger: Logger;
  private readonly fanout: ObserverFanout<TimerEvent>;

  private state: TimerState = "idle";
  private sessionId: string | null = null;
  private totalSeconds = 0;
  private remainingSeconds = 0;
  private taskLabel = "";
  private startedAt: string | null = null;

  private ticks: Cancellable | null = null;
  private activeAlarm: AlarmSequence | null = null;

  constructor(options: TimerEngineOptions) {
    this.clock = options.clock;
    this.alarm = options.alarm;
    this.logger = options.logger;
    this.fanout = new ObserverFanout<TimerEvent>(options.logger);
  }

  subscribe(listener: Listener<TimerEvent>): () => void {
    return this.fanout.subscribe(listener);
  }

  snapshot(): TimerSnapshot {
    return Object.freeze({
      sessionId: this.sessionId,
      state: this.state,
      totalSeconds: this.totalSeconds,
      remainingSeconds: this.remainingSeconds,
      taskLabel: this.taskLabel,
      startedAt: this.startedAt
    });
  }

  start(totalSeconds: number, taskLabel = ""): TimerSnapshot {
    if (!Number.isInteger(totalSeconds) || totalSeconds <= 0) {
      throw new InvalidDurationError(totalSeconds);
    }

    this.cancelTicks();
    this.cancelAlarm();

    this.sessionId = uuid();
    this.totalSeconds = totalSeconds;
    this.remainingSeconds = totalSeconds;
    this.taskLabel = taskLabel;
    this.startedAt = formatISO(this.clock.now());
    this.state = "running";
    this.armTicks();

    this.logger.info({ sessionId: this.sessionId, totalSeconds, taskLabel }, "Timer started");
    return this.emit("start");
  }

  pause(): TimerSnapshot {
    if (this.state !== "running") {
      return this.snapshot();
    }
    this.cancelTicks();
    this.state = "paused";
    return this.emit("pause");
  }

  resume(): TimerSnapshot {
    if (this.state !== "paused") {
      return this.snapshot();
    }
    this.state = "running";
    this.armTicks();
    return this.emit("resume");
  }

  togglePauseResume(): TimerSnapshot {
    switch (this.state) {
      case "running":
        return this.pause();
      case "paused":
        return this.resume();
      default:
        return this.snapshot();
    }
  }

  stop(): TimerSnapshot {
    this.cancelTicks();
    this.cancelAlarm();
    this.clearSession();
    return this.emit("stop");
  }

  tick(): void {
    if (this.state !== "running") {
      return;
    }
    if (this.remainingSeconds === 0) {
      this.expire();
      return;
    }

    const sessionId = this.sessionId;
    this.remainingSeconds -= 1;
    this.emit("tick");
    // A listener may have stopped, paused or restarted the timer during delivery.
    if (this.state === "running" && this.sessionId === sessionId && this.remainingSeconds === 0) {
      this.expire();
    }
  }

  private armTicks(): void {
    const sessionId = this.sessionId;
    this.ticks = this.clock.setInterval(() => {
      // A tick captured before cancellation must not touch a newer session.
      if (this.sessionId === sessionId) {
        this.tick();
      }
    }, TICK_INTERVAL_MS);
  }

  private cancelTicks(): void {
    this.ticks?.cancel();
    this.ticks = null;
  }

  private cancelAlarm(): void {
    this.activeAlarm?.cancel();
    this.activeAlarm = null;
  }

  private expire(): void {
    this.cancelTicks();
    this.state = "alarming";
    const sessionId = this.sessionId;
    const expired = this.snapshot();

    this.logger.info({ sessionId, taskLabel: this.taskLabel }, "Timer finished");
    this.activeAlarm = this.alarm.begin(expired, () => this.finishAlarm(sessionId));
    this.emit("expire");
  }

  private finishAlarm(sessionId: string | null): void {
    if (this.state !== "alarming" || this.sessionId !== sessionId) {
      return;
    }
    this.cancelAlarm();
    this.clearSession();
    this.emit("reset");
  }

  private clearSession(): void {
    this.state = "idle";
    this.sessionId = null;
    this.totalSeconds = 0;
    this.remainingSeconds = 0;
    this.taskLabel = "";
    this.startedAt = null;
  }

  private emit(type: TimerEventType): TimerSnapshot {
    const snapshot = this.snapshot();
    this.fanout.publish({ type, snapshot });
    return snapshot;
  }
}
