/**
 * Plays alert sounds through the platform's command-line audio player.
 *
 * One player process at a time. Asking for the condition that is already
 * playing is a no-op; asking for the other one replaces it.
 */

import { spawn } from "child_process";
import { existsSync } from "fs";
import { extname } from "path";
import type { AlertKind } from "@glucose-alarm/core";
import type { Logger } from "../logger.js";
import type { AlertSink } from "./alert-sink.js";

/** The parts of a child process the sink relies on */
export interface PlayerProcess {
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(): boolean;
  once(event: "spawn" | "exit", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export type SpawnPlayer = (command: string, args: string[]) => PlayerProcess;

export interface AudioSinkOptions {
  /** Sound file per condition (WAV or MP3) */
  sounds: Record<AlertKind, string>;
  /** Player command to use instead of the platform default; the file is appended */
  player?: string[];
  platform?: NodeJS.Platform;
  spawn?: SpawnPlayer;
  fileExists?: (path: string) => boolean;
  logger?: Logger;
}

interface Playback {
  condition: AlertKind;
  process: PlayerProcess;
}

/**
 * Command and arguments that play a file on a platform
 */
export function playerCommand(
  file: string,
  platform: NodeJS.Platform,
  override?: string[]
): [string, string[]] {
  if (override && override.length > 0) {
    const [command, ...args] = override;
    return [command, [...args, file]];
  }

  switch (platform) {
    case "darwin":
      return ["afplay", [file]];
    case "win32":
      return [
        "powershell",
        [
          "-NoProfile",
          "-Command",
          `(New-Object Media.SoundPlayer '${file.replace(/'/g, "''")}').PlaySync()`,
        ],
      ];
    case "linux": {
      const ext = extname(file).toLowerCase();
      return ext === ".mp3" || ext === ".mpeg" ? ["mpg123", ["-q", file]] : ["aplay", ["-q", file]];
    }
    default:
      throw new Error(`No audio player known for platform ${platform}`);
  }
}

const defaultSpawn: SpawnPlayer = (command, args) => spawn(command, args, { stdio: "ignore" });

export class AudioSink implements AlertSink {
  private current: Playback | null = null;

  constructor(private readonly options: AudioSinkOptions) {}

  async play(condition: AlertKind): Promise<void> {
    if (this.current?.condition === condition && isRunning(this.current.process)) {
      return;
    }
    await this.stop();

    const file = this.options.sounds[condition];
    const fileExists = this.options.fileExists ?? existsSync;
    if (!fileExists(file)) {
      throw new Error(`Alert sound file not found: ${file}`);
    }

    const [command, args] = playerCommand(
      file,
      this.options.platform ?? process.platform,
      this.options.player
    );
    const child = (this.options.spawn ?? defaultSpawn)(command, args);
    const playback: Playback = { condition, process: child };
    this.current = playback;

    child.once("exit", () => {
      if (this.current === playback) this.current = null;
    });

    await new Promise<void>((resolve, reject) => {
      child.once("spawn", resolve);
      child.on("error", (error) => {
        if (this.current === playback) this.current = null;
        this.options.logger?.error(`Audio player ${command} failed: ${error.message}`);
        reject(error);
      });
    });
  }

  stop(): Promise<void> {
    const playback = this.current;
    this.current = null;
    if (playback && isRunning(playback.process)) {
      playback.process.kill();
    }
    return Promise.resolve();
  }

  close(): Promise<void> {
    return this.stop();
  }

  /** Condition currently audible, if any */
  get playing(): AlertKind | null {
    return this.current && isRunning(this.current.process) ? this.current.condition : null;
  }
}

function isRunning(child: PlayerProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}
