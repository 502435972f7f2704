import { AlarmSequencer } from "./alarm/alarmSequencer.js";
import { OsascriptNotificationSink, type NotificationSink } from "./alarm/notifications.js";
import { SystemSoundPlayer, type SoundPlayer } from "./alarm/soundPlayer.js";
import { SystemClock, type Clock } from "./clock.js";
import type { AppConfig } from "./config.js";
import { bindHotkeys, HotkeyChannel } from "./hotkeys.js";
import { createLogger, type Logger } from "./logger.js";
import { SettingsFileStorage, type SettingsStorage } from "./state/settingsStorage.js";
import { SettingsStore } from "./state/settingsStore.js";
import { TimerEngine } from "./timers.js";
import type { TimerSettings } from "./types.js";
import { FloatingPanel, MenuBarStatusItem, PopoverController } from "./ui/surfaces.js";

export interface TimerApp {
  logger: Logger;
  clock: Clock;
  settings: SettingsStore;
  engine: TimerEngine;
  menuBar: MenuBarStatusItem;
  floatingPanel: FloatingPanel;
  popover: PopoverController;
  hotkeys: HotkeyChannel;
  shutdown(): Promise<void>;
}

export interface TimerAppOverrides {
  logger?: Logger;
  clock?: Clock;
  player?: SoundPlayer;
  notifier?: NotificationSink;
  storage?: SettingsStorage;
}

/** The single place where the engine and its collaborators are constructed and wired together. */
export async function createApp(config: AppConfig, overrides: TimerAppOverrides = {}): Promise<TimerApp> {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const clock = overrides.clock ?? new SystemClock();
  const storage = overrides.storage ?? new SettingsFileStorage(config.settingsPath);

  const settings = new SettingsStore({
    initialSettings: await loadSettings(storage, logger),
    onChange: next => storage.save(next)
  });

  const alarm = new AlarmSequencer({
    player:
      overrides.player ??
      new SystemSoundPlayer({
        soundsDir: config.soundsDir,
        command: config.playerCommand,
        beepSound: config.beepSound,
        logger: logger.child({ component: "sound" })
      }),
    notifier: overrides.notifier ?? new OsascriptNotificationSink(),
    settings,
    clock,
    logger: logger.child({ component: "alarm" })
  });

  const engine = new TimerEngine({ clock, alarm, logger: logger.child({ component: "engine" }) });
  const menuBar = new MenuBarStatusItem(engine, title => logger.debug({ title }, "Menu bar title updated"));
  const floatingPanel = new FloatingPanel(engine);
  const popover = new PopoverController(engine, settings, clock);

  const hotkeys = new HotkeyChannel();
  const unbindHotkeys = bindHotkeys(hotkeys, {
    start: () => {
      if (popover.draftSeconds === 0) {
        const [first] = settings.getPresets();
        if (first) {
          popover.selectPreset(first.id);
        }
      }
      popover.start();
    },
    pauseResume: () => {
      engine.togglePauseResume();
    },
    stop: () => {
      popover.stop();
    }
  });

  return {
    logger,
    clock,
    settings,
    engine,
    menuBar,
    floatingPanel,
    popover,
    hotkeys,
    async shutdown() {
      unbindHotkeys();
      engine.stop();
      menuBar.dispose();
      floatingPanel.dispose();
      popover.dispose();
      await settings.waitForPersistence();
    }
  };
}

async function loadSettings(storage: SettingsStorage, logger: Logger): Promise<TimerSettings | null> {
  try {
    return await storage.load();
  } catch (error) {
    logger.error({ err: error }, "Could not read settings, using defaults");
    return null;
  }
}
