import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SettingsFileStorage } from "../src/state/settingsStorage.js";
import { SettingsStore, presetDisplayName, presetTotalSeconds } from "../src/state/settingsStore.js";
import type { TimerSettings } from "../src/types.js";

async function createTempDir() {
  const dir = await mkdtemp(join(tmpdir(), "tickbar-settings-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

test("defaults provide three presets and the chime", () => {
  const store = new SettingsStore();
  const settings = store.getAll();

  assert.deepEqual(
    settings.presets.map(preset => [preset.name, preset.minutes, preset.seconds]),
    [
      ["Quick", 5, 0],
      ["Short", 10, 0],
      ["Pomodoro", 25, 0]
    ]
  );
  assert.equal(store.selectedAlarmSound(), "Chime");
  assert.deepEqual(settings.hotkeys, { start: null, pauseResume: null, stop: null });
});

test("preset helpers compute totals and display names", () => {
  assert.equal(presetTotalSeconds({ minutes: 5, seconds: 30 }), 330);
  assert.equal(presetDisplayName({ minutes: 5, seconds: 0 }), "5m");
  assert.equal(presetDisplayName({ minutes: 5, seconds: 30 }), "5m 30s");
});

test("preset edits are persisted through onChange", async () => {
  const saved: TimerSettings[] = [];
  const store = new SettingsStore({ onChange: settings => void saved.push(settings) });

  const added = store.addPreset({ name: "Tea", minutes: 3, seconds: 30 });
  store.updatePreset(added.id, { name: "Green tea", minutes: 2, seconds: 0 });
  const quick = store.findPreset("quick");
  assert.ok(quick);
  store.removePreset(quick.id);
  await store.waitForPersistence();

  assert.equal(saved.length, 3);
  assert.deepEqual(
    saved[2].presets.map(preset => preset.name),
    ["Short", "Pomodoro", "Green tea"]
  );
  assert.equal(store.findPreset(added.id)?.minutes, 2);
});

test("unknown presets and sounds are rejected", () => {
  const store = new SettingsStore();

  assert.throws(() => store.removePreset("nope"), /Preset not found/);
  assert.throws(() => store.selectAlarmSound("Foghorn"), /Unknown alarm sound "Foghorn"/);

  store.selectAlarmSound("Ping");
  assert.equal(store.selectedAlarmSound(), "Ping");
});

test("waitForPersistence reports a failed save once", async () => {
  const store = new SettingsStore({
    onChange: async () => {
      throw new Error("disk full");
    }
  });

  store.setHotkey("stop", { keyCode: 1, modifiers: 256 });

  await assert.rejects(store.waitForPersistence(), /disk full/);
  await store.waitForPersistence();
});

test("returned settings are copies", () => {
  const store = new SettingsStore();
  const settings = store.getAll();

  settings.presets[0].minutes = 99;

  assert.equal(store.getPresets()[0].minutes, 5);
});

test("file storage returns null before the first save", async t => {
  const { dir, cleanup } = await createTempDir();
  t.after(cleanup);

  const storage = new SettingsFileStorage(join(dir, "settings.json"));

  assert.equal(await storage.load(), null);
});

test("file storage round-trips settings", async t => {
  const { dir, cleanup } = await createTempDir();
  t.after(cleanup);
  const filePath = join(dir, "nested", "settings.json");
  const storage = new SettingsFileStorage(filePath);
  const store = new SettingsStore({ onChange: settings => storage.save(settings) });

  store.addPreset({ name: "Stand-up", minutes: 15, seconds: 0 });
  store.selectAlarmSound("Bell");
  await store.waitForPersistence();

  const persisted = JSON.parse(await readFile(filePath, "utf-8"));
  assert.equal(persisted.selectedAlarmSound, "Bell");
  assert.equal(persisted.presets.length, 4);

  const reloaded = await storage.load();
  assert.deepEqual(reloaded, store.getAll());
});

test("file storage rejects malformed settings", async t => {
  const { dir, cleanup } = await createTempDir();
  t.after(cleanup);
  const filePath = join(dir, "settings.json");
  await writeFile(filePath, JSON.stringify({ presets: "lots", selectedAlarmSound: "Chime", hotkeys: {} }), "utf-8");

  await assert.rejects(new SettingsFileStorage(filePath).load(), /is invalid/);
});
