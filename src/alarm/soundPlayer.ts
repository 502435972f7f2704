import { spawn, type ChildProcess } from "node:child_process";
import { once } from "node:events";
import { access, readFile } from "node:fs/promises";
import { join } from "node:path";
import { ResourceUnavailableError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";

export interface Playback {
  /** Length of a single play, or null when it could not be determined. */
  readonly durationSeconds: number | null;
  stop(): void;
}

export interface SoundPlayer {
  play(soundId: string, options: { repeats: number }): Promise<Playback>;
  beep(): Promise<void>;
}

export interface SystemSoundPlayerOptions {
  soundsDir: string;
  command: string;
  beepSound: string;
  logger: Logger;
}

export const SOUND_EXTENSIONS = ["wav", "mp3", "aiff"] as const;

export class SystemSoundPlayer implements SoundPlayer {
  constructor(private readonly options: SystemSoundPlayerOptions) {}

  async play(soundId: string, { repeats }: { repeats: number }): Promise<Playback> {
    const filePath = await this.locate(soundId);
    const durationSeconds = filePath.endsWith(".wav") ? readWavDurationSeconds(await readFile(filePath)) : null;
    const playback = new LoopingPlayback(this.options.command, filePath, repeats, durationSeconds, this.options.logger);
    await playback.begin();
    return playback;
  }

  async beep(): Promise<void> {
    const child = spawn(this.options.command, [this.options.beepSound], { stdio: "ignore" });
    const [code] = await once(child, "exit");
    if (code !== 0) {
      throw new ResourceUnavailableError("sound", `${this.options.command} exited with code ${String(code)}`);
    }
  }

  private async locate(soundId: string): Promise<string> {
    for (const extension of SOUND_EXTENSIONS) {
      const candidate = join(this.options.soundsDir, `${soundId}.${extension}`);
      try {
        await access(candidate);
        return candidate;
      } catch {
        continue;
      }
    }
    throw new ResourceUnavailableError("sound", `No sound file found for "${soundId}" in ${this.options.soundsDir}.`);
  }
}

class LoopingPlayback implements Playback {
  private child: ChildProcess | null = null;
  private playsLeft: number;
  private stopped = false;

  constructor(
    private readonly command: string,
    private readonly filePath: string,
    repeats: number,
    readonly durationSeconds: number | null,
    private readonly logger: Logger
  ) {
    this.playsLeft = repeats + 1;
  }

  async begin(): Promise<void> {
    const child = this.spawnNext();
    try {
      await once(child, "spawn");
    } catch (error) {
      this.stop();
      throw new ResourceUnavailableError("sound", `Could not start ${this.command}: ${describeError(error)}`, {
        cause: error
      });
    }
  }

  stop(): void {
    this.stopped = true;
    this.child?.kill();
    this.child = null;
  }

  private spawnNext(): ChildProcess {
    this.playsLeft -= 1;
    const child = spawn(this.command, [this.filePath], { stdio: "ignore" });
    child.on("exit", code => {
      if (this.child !== child) {
        return;
      }
      this.child = null;
      if (code !== 0) {
        this.logger.debug({ code, filePath: this.filePath }, "Alarm player exited early");
        return;
      }
      if (!this.stopped && this.playsLeft > 0) {
        this.spawnNext();
      }
    });
    child.on("error", error => {
      this.logger.debug({ err: error }, "Alarm player process error");
    });
    this.child = child;
    return child;
  }
}

/** Reads the play length of a PCM WAV file from its RIFF header, or null if the header is not understood. */
export function readWavDurationSeconds(buffer: Buffer): number | null {
  if (buffer.length < 12 || buffer.toString("ascii", 0, 4) !== "RIFF" || buffer.toString("ascii", 8, 12) !== "WAVE") {
    return null;
  }

  let byteRate: number | null = null;
  let offset = 12;
  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString("ascii", offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === "fmt " && body + 12 <= buffer.length) {
      byteRate = buffer.readUInt32LE(body + 8);
    } else if (chunkId === "data") {
      if (!byteRate) {
        return null;
      }
      return chunkSize / byteRate;
    }
    offset = body + chunkSize + (chunkSize % 2);
  }
  return null;
}
