/**
 * Timeline Types and Interfaces
 *
 * WHY THIS FILE EXISTS:
 * - Defines the inputs and outputs of the beat-drop timeline planner
 * - Shared by the planner, the render graph builder and the CLI commands
 */

/**
 * ClipInput
 *
 * A source clip handed to the planner. Time values are in seconds.
 * `source` is whatever handle the caller needs later to extract media
 * (a file path for the CLI); the planner never looks inside it.
 */
export interface ClipInput<S = string> {
  /** Opaque reference to the clip's media */
  source: S;

  /** Total length of the source clip (> 0) */
  duration: number;

  /** Local timestamp of the key moment (0 ≤ keyTime ≤ duration) */
  keyTime: number;
}

/** Absolute output-timeline position a clip's key moment is pinned to */
export type TargetTime = number;

/**
 * PlacementPlan
 *
 * One extracted segment and where it sits on the output timeline.
 */
export interface PlacementPlan<S = string> {
  /** Index of the clip in the planner's input list */
  sourceIndex: number;

  source: S;

  /** Trim start within the source clip in seconds */
  trimStart: number;

  /** Trim end within the source clip in seconds (> trimStart) */
  trimEnd: number;

  /** Absolute start of the segment on the output timeline; may be negative */
  timelineOffset: number;
}

export interface SkippedClip {
  sourceIndex: number;
  reason: string;
}

export interface TimelinePlan<S = string> {
  plans: PlacementPlan<S>[];
  /** max(end of the last placed segment, audio duration) */
  totalDuration: number;
  /** Clips whose trim window collapsed; not errors */
  skipped: SkippedClip[];
}
