/**
 * Runtime configuration
 *
 * Values come from the environment; `loadEnvFile()` lets a local `.env`
 * populate it first. CLI flags and manifest fields override these defaults.
 */

import dotenv from 'dotenv';
import { createLogger, isLogLevel, LogLevel } from './logger';

const log = createLogger('CONFIG');

export const DEFAULT_FPS = 60;
export const DEFAULT_OUTPUT = 'final_montage.mp4';

export interface AppConfig {
  /** ffmpeg binary; null means "ffmpeg" on PATH */
  ffmpegPath: string | null;
  /** ffprobe binary; null means ffprobe-static, then "ffprobe" on PATH */
  ffprobePath: string | null;
  defaultFps: number;
  defaultOutput: string;
  logLevel: LogLevel;
}

export function loadEnvFile(path?: string): void {
  const result = dotenv.config(path ? { path } : undefined);
  if (result.error && path) {
    log.warn(`Could not read env file ${path}:`, result.error.message);
  }
}

const nonEmpty = (value: string | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  let defaultFps = DEFAULT_FPS;
  const rawFps = nonEmpty(env.DROPSYNC_FPS);
  if (rawFps !== null) {
    const parsed = Number(rawFps);
    if (Number.isInteger(parsed) && parsed > 0) {
      defaultFps = parsed;
    } else {
      log.warn(`Ignoring DROPSYNC_FPS="${rawFps}" (expected a positive integer), using ${DEFAULT_FPS}`);
    }
  }

  let logLevel: LogLevel = 'info';
  const rawLevel = nonEmpty(env.LOG_LEVEL)?.toLowerCase();
  if (rawLevel !== undefined) {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      log.warn(`Ignoring LOG_LEVEL="${rawLevel}", using info`);
    }
  }

  return {
    ffmpegPath: nonEmpty(env.FFMPEG_PATH),
    ffprobePath: nonEmpty(env.FFPROBE_PATH),
    defaultFps,
    defaultOutput: nonEmpty(env.DROPSYNC_OUTPUT) ?? DEFAULT_OUTPUT,
    logLevel,
  };
}
