/**
 * Media Types and Interfaces
 *
 * WHY THIS FILE EXISTS:
 * - Defines what the ffprobe service reports about clips and songs
 * - Central location for media-related TypeScript interfaces
 *
 * USAGE:
 * - Returned by getVideoMetadata / getAudioMetadata
 * - Used by the plan and render commands to build planner input
 */

/**
 * Video Metadata
 *
 * What FFprobe returns for a clip.
 *
 * @example
 * const meta: VideoMetadata = {
 *   duration: 20.02,
 *   width: 1920,
 *   height: 1080,
 *   size: 45678900,
 * };
 */
export interface VideoMetadata {
  /** Duration in seconds */
  duration: number;

  /** Video width in pixels */
  width: number;

  /** Video height in pixels */
  height: number;

  /** File size in bytes */
  size: number;
}

export interface AudioMetadata {
  duration: number;
  size: number;
}

/**
 * MontageClip
 *
 * A clip listed in a montage manifest after probing: its file, its key
 * moment and the metadata the planner and renderer need.
 */
export interface MontageClip extends VideoMetadata {
  /** Absolute path to the clip on disk */
  path: string;

  /** Filename without directory (e.g. "clip3.mp4") */
  filename: string;

  /** Local time of the key moment in seconds */
  keyTime: number;
}

export type ProbedMedia =
  | { path: string; kind: 'video'; metadata: VideoMetadata }
  | { path: string; kind: 'audio'; metadata: AudioMetadata };
