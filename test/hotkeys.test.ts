import { test } from "node:test";
import assert from "node:assert/strict";
import { createApp } from "../src/app.js";
import {
  HotkeyChannel,
  MODIFIER_COMMAND,
  MODIFIER_CONTROL,
  MODIFIER_OPTION,
  MODIFIER_SHIFT,
  bindHotkeys,
  describeHotkey,
  recordHotkey
} from "../src/hotkeys.js";
import { createSilentLogger } from "../src/logger.js";
import { FakeNotificationSink, FakeSoundPlayer, MemorySettingsStorage, testConfig } from "./helpers/fakes.js";
import { FakeClock } from "./helpers/fakeClock.js";

test("describeHotkey lists modifiers in menu order before the key", () => {
  assert.equal(describeHotkey({ keyCode: 17, modifiers: MODIFIER_COMMAND | MODIFIER_SHIFT }), "⌘⇧T");
  assert.equal(
    describeHotkey({
      keyCode: 49,
      modifiers: MODIFIER_CONTROL | MODIFIER_OPTION | MODIFIER_SHIFT | MODIFIER_COMMAND
    }),
    "⌘⇧⌥⌃Space"
  );
  assert.equal(describeHotkey({ keyCode: 126, modifiers: MODIFIER_OPTION }), "⌥↑");
  assert.equal(describeHotkey({ keyCode: 200, modifiers: MODIFIER_COMMAND }), "⌘");
});

test("recording a hotkey requires a modifier", () => {
  assert.equal(recordHotkey(0, 0), null);
  assert.equal(recordHotkey(0, 0x1), null);
  assert.deepEqual(recordHotkey(0, MODIFIER_COMMAND | 0x1), { keyCode: 0, modifiers: MODIFIER_COMMAND });
});

test("bound handlers fire until unbound", () => {
  const channel = new HotkeyChannel();
  const fired: string[] = [];
  const unbind = bindHotkeys(channel, {
    start: () => fired.push("start"),
    pauseResume: () => fired.push("pauseResume"),
    stop: () => fired.push("stop")
  });

  channel.trigger("pauseResume");
  channel.trigger("stop");
  unbind();
  channel.trigger("start");

  assert.deepEqual(fired, ["pauseResume", "stop"]);
});

async function createTestApp() {
  return createApp(testConfig, {
    logger: createSilentLogger(),
    clock: new FakeClock(),
    player: new FakeSoundPlayer(),
    notifier: new FakeNotificationSink(),
    storage: new MemorySettingsStorage()
  });
}

test("the start hotkey uses the first preset when the draft is empty", async () => {
  const app = await createTestApp();

  app.hotkeys.trigger("start");

  const snapshot = app.engine.snapshot();
  assert.equal(snapshot.state, "running");
  assert.equal(snapshot.totalSeconds, 300);
  assert.equal(app.menuBar.title, "05:00");
  await app.shutdown();
});

test("the start hotkey starts the popover draft with its label", async () => {
  const app = await createTestApp();
  app.popover.setSliderSeconds(90);
  app.popover.setTaskLabel("plank");

  app.hotkeys.trigger("start");

  assert.equal(app.engine.snapshot().totalSeconds, 90);
  assert.equal(app.menuBar.title, "01:30 · plank");
  await app.shutdown();
});

test("pause/resume and stop hotkeys drive the engine", async () => {
  const app = await createTestApp();
  app.engine.start(120, "read");

  app.hotkeys.trigger("pauseResume");
  assert.equal(app.engine.snapshot().state, "paused");
  app.hotkeys.trigger("pauseResume");
  assert.equal(app.engine.snapshot().state, "running");

  app.hotkeys.trigger("stop");
  assert.equal(app.engine.snapshot().state, "idle");
  assert.equal(app.menuBar.title, "⏱");
  await app.shutdown();
});
