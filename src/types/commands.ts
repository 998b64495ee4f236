/**
 * CLI Command Definitions and Result Types
 *
 * WHY THIS FILE EXISTS:
 * - Centralizes all command names as constants to prevent typos
 * - Provides request/response types for every command
 * - Gives every command the same success/error result shape
 *
 * NAMING CONVENTION:
 * - Command names use kebab-case (e.g., 'plan')
 * - Constant names use SCREAMING_SNAKE_CASE (e.g., PLAN)
 * - Request/Response interfaces use PascalCase with suffix (e.g., PlanResponse)
 */

import { AudioMetadata, MontageClip, ProbedMedia } from './media';
import { TimelinePlan } from './timeline';

export const COMMANDS = {
  /**
   * Probe clips and song, run the planner, report placements
   */
  PLAN: 'plan',

  /**
   * Plan, then render the montage with ffmpeg
   */
  RENDER: 'render',

  /**
   * Print ffprobe metadata for one or more files
   */
  PROBE: 'probe',
} as const;

export type CommandName = typeof COMMANDS[keyof typeof COMMANDS];

export type ExportResolution = 'source' | '720p' | '1080p';

// ============================================================================
// PLAN
// ============================================================================

export interface PlanRequest {
  /** Path to the montage manifest JSON */
  manifestPath: string;
  /** Order clips by the number in their filename (clip1, clip2, ...) */
  sortByNumber?: boolean;
}

export interface PlanResponse {
  success: true;
  song: { path: string } & AudioMetadata;
  clips: MontageClip[];
  targets: number[];
  timeline: TimelinePlan;
}

// ============================================================================
// RENDER
// ============================================================================

export interface RenderRequest extends PlanRequest {
  outputPath?: string;
  fps?: number;
  resolution?: ExportResolution;
}

export interface RenderResponse {
  success: true;
  outputPath: string;
  jobId: string;
  totalDuration: number;
  placedClips: number;
}

// ============================================================================
// PROBE
// ============================================================================

export interface ProbeRequest {
  paths: string[];
}

export interface ProbeResponse {
  success: true;
  files: ProbedMedia[];
}

// =========================================================================
// RENDER PROGRESS
// =========================================================================

export type RenderStatus = 'idle' | 'processing' | 'complete' | 'error' | 'cancelled';

export interface RenderProgressEvent {
  jobId: string;
  percent: number; // 0..100
  currentSeconds: number; // processed
  etaSeconds?: number;
  status: RenderStatus;
  errorMessage?: string;
}

/**
 * Error result shared by all commands
 */
export interface CommandErrorResponse {
  success: false;
  /** User-facing error message */
  error: string;
  /** Technical details (stack, tool output, validation issues) */
  details?: string;
}

/**
 * Type guard to check if a command result is an error
 *
 * USAGE:
 * const result = await runPlan({ manifestPath });
 * if (isCommandError(result)) {
 *   console.error(result.error);
 * }
 */
export function isCommandError(response: unknown): response is CommandErrorResponse {
  return (
    typeof response === 'object' &&
    response !== null &&
    'success' in response &&
    response.success === false
  );
}

export type CommandResult<T> = T | CommandErrorResponse;
