import { test } from "node:test";
import assert from "node:assert/strict";
import { ALARM_TITLE, alarmBody } from "../src/alarm/alarmSequencer.js";
import type { Playback, SoundPlayer } from "../src/alarm/soundPlayer.js";
import {
  FakeNotificationSink,
  FakeSoundPlayer,
  createAlarmHarness,
  eventTypes,
  flushAsync
} from "./helpers/fakes.js";

/** Resolves playback only when the test says so. */
class DeferredSoundPlayer implements SoundPlayer {
  stops = 0;
  private resolvePlay: ((playback: Playback) => void) | null = null;

  play(): Promise<Playback> {
    return new Promise(resolve => {
      this.resolvePlay = resolve;
    });
  }

  async beep(): Promise<void> {}

  resolve(durationSeconds: number | null): void {
    this.resolvePlay?.({
      durationSeconds,
      stop: () => {
        this.stops += 1;
      }
    });
  }
}

test("expiry plays the selected sound, notifies, and resets after three plays", async () => {
  const player = new FakeSoundPlayer({ durationSeconds: 2 });
  const notifier = new FakeNotificationSink();
  const { engine, clock, events } = createAlarmHarness({ player, notifier, sound: "Bell" });

  engine.start(2, "write report");
  clock.advance(2000);
  await flushAsync();

  assert.deepEqual(player.plays, [{ soundId: "Bell", repeats: 2 }]);
  assert.deepEqual(notifier.sent, [{ title: ALARM_TITLE, body: "Task completed: write report" }]);
  assert.equal(engine.snapshot().state, "alarming");

  clock.advance(5999);
  assert.equal(engine.snapshot().state, "alarming");

  clock.advance(1);
  assert.equal(engine.snapshot().state, "idle");
  assert.equal(player.stops, 1);
  assert.deepEqual(eventTypes(events), ["start", "tick", "tick", "expire", "reset"]);
  assert.equal(clock.pendingCount, 0);
});

test("the notification body falls back when there is no label", () => {
  assert.equal(alarmBody(""), "Your timer has completed.");
  assert.equal(alarmBody("tea"), "Task completed: tea");
});

test("an unknown sound duration uses the fixed grace window", async () => {
  const player = new FakeSoundPlayer({ durationSeconds: null });
  const { engine, clock } = createAlarmHarness({ player });

  engine.start(1);
  clock.advance(1000);
  await flushAsync();

  clock.advance(2999);
  assert.equal(engine.snapshot().state, "alarming");
  clock.advance(1);
  assert.equal(engine.snapshot().state, "idle");
});

test("a missing sound falls back to five spaced beeps", async () => {
  const player = new FakeSoundPlayer({ fail: true });
  const { engine, clock, events } = createAlarmHarness({ player });

  engine.start(1);
  clock.advance(1000);
  await flushAsync();

  clock.advance(0);
  assert.equal(player.beeps, 1);
  clock.advance(499);
  assert.equal(player.beeps, 1);
  clock.advance(1);
  assert.equal(player.beeps, 2);
  clock.advance(1500);
  assert.equal(player.beeps, 5);

  clock.advance(999);
  assert.equal(engine.snapshot().state, "alarming");
  clock.advance(1);
  assert.equal(engine.snapshot().state, "idle");
  assert.equal(player.beeps, 5);
  assert.equal(events[events.length - 1].type, "reset");
});

test("stop between beeps suppresses the remaining ones", async () => {
  const player = new FakeSoundPlayer({ fail: true });
  const { engine, clock, events } = createAlarmHarness({ player });

  engine.start(1);
  clock.advance(1000);
  await flushAsync();
  clock.advance(1000);
  assert.equal(player.beeps, 3);

  engine.stop();
  clock.advance(5000);

  assert.equal(player.beeps, 3);
  assert.equal(engine.snapshot().state, "idle");
  assert.equal(events.filter(event => event.type === "reset").length, 0);
  assert.equal(clock.pendingCount, 0);
});

test("stop before the grace window silences the sound without a second reset", async () => {
  const player = new FakeSoundPlayer({ durationSeconds: 4 });
  const { engine, clock, events } = createAlarmHarness({ player });

  engine.start(1);
  clock.advance(1000);
  await flushAsync();
  clock.advance(1000);

  engine.stop();
  clock.advance(20_000);

  assert.equal(player.stops, 1);
  assert.deepEqual(eventTypes(events), ["start", "tick", "expire", "stop"]);
});

test("playback that starts after stop is silenced right away", async () => {
  const player = new DeferredSoundPlayer();
  const { engine, clock } = createAlarmHarness({ player });

  engine.start(1);
  clock.advance(1000);
  engine.stop();

  player.resolve(3);
  await flushAsync();

  assert.equal(player.stops, 1);
  assert.equal(clock.pendingCount, 0);
});

test("a failed notification does not hold up the reset", async () => {
  const player = new FakeSoundPlayer({ durationSeconds: 1 });
  const notifier = new FakeNotificationSink(true);
  const { engine, clock } = createAlarmHarness({ player, notifier });

  engine.start(1, "call back");
  clock.advance(1000);
  await flushAsync();
  clock.advance(3000);

  assert.equal(engine.snapshot().state, "idle");
});

test("starting a new timer during the alarm keeps the new one running", async () => {
  const player = new FakeSoundPlayer({ durationSeconds: 2 });
  const { engine, clock } = createAlarmHarness({ player });

  engine.start(1, "old");
  clock.advance(1000);
  await flushAsync();

  engine.start(100, "new");
  clock.advance(6000);

  const snapshot = engine.snapshot();
  assert.equal(snapshot.state, "running");
  assert.equal(snapshot.taskLabel, "new");
  assert.equal(snapshot.remainingSeconds, 94);
  assert.equal(player.stops, 1);
});
