import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { isLogLevel, type LogLevel } from "./logger.js";

export interface AppConfig {
  settingsPath: string;
  soundsDir: string;
  playerCommand: string;
  beepSound: string;
  logLevel: LogLevel;
}

const CONFIG_DIR = join(homedir(), ".config", "tickbar");

const envSchema = z.object({
  TICKBAR_SETTINGS_PATH: z.string().min(1).optional(),
  TICKBAR_SOUNDS_DIR: z.string().min(1).optional(),
  TICKBAR_PLAYER_COMMAND: z.string().min(1).default("afplay"),
  TICKBAR_BEEP_SOUND: z.string().min(1).default("/System/Library/Sounds/Tink.aiff"),
  LOG_LEVEL: z
    .string()
    .default("info")
    .refine(isLogLevel, { message: "LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent." })
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    settingsPath: parsed.TICKBAR_SETTINGS_PATH ?? join(CONFIG_DIR, "settings.json"),
    soundsDir: parsed.TICKBAR_SOUNDS_DIR ?? join(CONFIG_DIR, "sounds"),
    playerCommand: parsed.TICKBAR_PLAYER_COMMAND,
    beepSound: parsed.TICKBAR_BEEP_SOUND,
    logLevel: parsed.LOG_LEVEL
  };
}
