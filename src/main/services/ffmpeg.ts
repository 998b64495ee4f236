/**
 * FFmpeg Service Module
 *
 * WHY THIS FILE EXISTS:
 * - Points fluent-ffmpeg at the ffmpeg/ffprobe binaries
 * - Extracts clip and song metadata using FFprobe
 * - Centralizes all FFprobe-related operations
 *
 * DEPENDENCIES:
 * - fluent-ffmpeg: High-level FFmpeg API for Node.js
 * - ffprobe-static: Pre-bundled FFprobe binary
 */

import ffmpeg from 'fluent-ffmpeg';
import * as ffprobeStatic from 'ffprobe-static';
import * as fs from 'fs';
import { AppConfig } from '../config';
import { createLogger } from '../logger';
import { AudioMetadata, ProbedMedia, VideoMetadata } from '../../types/media';

const log = createLogger('FFMPEG');

function pathIfExists(p: string | null | undefined): string | null {
  if (!p) return null;
  try {
    return fs.existsSync(p) ? p : null;
  } catch {
    return null;
  }
}

export function firstExisting(paths: Array<string | null | undefined>): string | null {
  for (const p of paths) {
    const exists = pathIfExists(p);
    if (exists) return exists;
  }
  return null;
}

export interface ResolvedBinaries {
  ffmpegPath: string;
  ffprobePath: string;
}

/**
 * Decide which binaries to use.
 *
 * ffmpeg: FFMPEG_PATH, else "ffmpeg" from PATH.
 * ffprobe: FFPROBE_PATH, else the ffprobe-static binary when it exists for
 * this platform, else "ffprobe" from PATH.
 */
export function resolveBinaries(config: Pick<AppConfig, 'ffmpegPath' | 'ffprobePath'>): ResolvedBinaries {
  const ffprobePath =
    config.ffprobePath ?? firstExisting([ffprobeStatic.path]) ?? 'ffprobe';
  return {
    ffmpegPath: config.ffmpegPath ?? 'ffmpeg',
    ffprobePath,
  };
}

/**
 * Configure fluent-ffmpeg with the resolved binaries.
 * Call once at start-up before probing or rendering.
 */
export function configureFfmpeg(config: Pick<AppConfig, 'ffmpegPath' | 'ffprobePath'>): ResolvedBinaries {
  const binaries = resolveBinaries(config);

  // npm may drop the execute bit on the bundled binary
  if (binaries.ffprobePath === ffprobeStatic.path && process.platform !== 'win32') {
    try {
      fs.chmodSync(binaries.ffprobePath, 0o755);
    } catch (chmodError) {
      log.warn('Could not set permissions (may already be set):', chmodError);
    }
  }

  ffmpeg.setFfmpegPath(binaries.ffmpegPath);
  ffmpeg.setFfprobePath(binaries.ffprobePath);

  log.debug('FFmpeg binary path:', binaries.ffmpegPath);
  log.debug('FFprobe binary path:', binaries.ffprobePath);
  return binaries;
}

function probe(filePath: string): Promise<ffmpeg.FfprobeData> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err: Error | null, metadata: ffmpeg.FfprobeData) => {
      if (err) {
        log.error('Error extracting metadata:', err.message);
        reject(new Error(`Failed to extract metadata from ${filePath}: ${err.message}`));
        return;
      }
      resolve(metadata);
    });
  });
}

function fileSize(filePath: string, reported: number | undefined): number {
  if (reported) return reported;
  return fs.statSync(filePath).size;
}

function toVideoMetadata(filePath: string, metadata: ffmpeg.FfprobeData): VideoMetadata | null {
  const videoStream = metadata.streams.find((stream) => stream.codec_type === 'video');
  if (!videoStream) return null;
  return {
    duration: metadata.format.duration || 0,
    width: videoStream.width || 0,
    height: videoStream.height || 0,
    size: fileSize(filePath, metadata.format.size),
  };
}

function toAudioMetadata(filePath: string, metadata: ffmpeg.FfprobeData): AudioMetadata | null {
  const audioStream = metadata.streams.find((stream) => stream.codec_type === 'audio');
  if (!audioStream) return null;

  // Prefer the audio stream's own duration over the container's
  const streamDuration = Number(audioStream.duration);
  const duration = Number.isFinite(streamDuration) && streamDuration > 0
    ? streamDuration
    : metadata.format.duration || 0;

  return {
    duration,
    size: fileSize(filePath, metadata.format.size),
  };
}

/**
 * Extract video metadata using FFprobe
 *
 * - Duration (seconds) from the container format
 * - Resolution from the first video stream
 * - File size, falling back to fs.statSync when FFprobe omits it
 *
 * @throws Error if the file cannot be probed or has no video stream
 *
 * @example
 * const metadata = await getVideoMetadata('/clips/clip1.mp4');
 * console.log(`Duration: ${metadata.duration}s, Resolution: ${metadata.width}x${metadata.height}`);
 */
export async function getVideoMetadata(filePath: string): Promise<VideoMetadata> {
  const video = toVideoMetadata(filePath, await probe(filePath));
  if (!video) {
    throw new Error(`No video stream found in ${filePath}`);
  }
  return video;
}

/**
 * Extract song metadata using FFprobe.
 *
 * @throws Error if the file cannot be probed or has no audio stream
 */
export async function getAudioMetadata(filePath: string): Promise<AudioMetadata> {
  const audio = toAudioMetadata(filePath, await probe(filePath));
  if (!audio) {
    throw new Error(`No audio stream found in ${filePath}`);
  }
  return audio;
}

export async function getAudioDuration(filePath: string): Promise<number> {
  const { duration } = await getAudioMetadata(filePath);
  return duration;
}

/**
 * Probe any media file: video metadata when it has a video stream,
 * otherwise audio metadata.
 */
export async function probeMedia(filePath: string): Promise<ProbedMedia> {
  const metadata = await probe(filePath);
  const video = toVideoMetadata(filePath, metadata);
  if (video) return { path: filePath, kind: 'video', metadata: video };
  const audio = toAudioMetadata(filePath, metadata);
  if (audio) return { path: filePath, kind: 'audio', metadata: audio };
  throw new Error(`No audio or video stream found in ${filePath}`);
}
