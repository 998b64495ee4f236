/**
 * Timeline Planner
 *
 * Pins each clip's key moment to its beat-drop target and decides which
 * part of the clip to keep:
 * - every segment ends KEY_PADDING_SECONDS after its key moment
 * - the first clip starts at its local 0
 * - every later clip is cut so it would start KEY_PADDING_SECONDS after the
 *   previous clip's key moment on the output timeline
 *
 * Pure and synchronous: no media access, no logging, no shared state.
 */

import { ValidationError, ValidationIssue } from '../errors';
import {
  ClipInput,
  PlacementPlan,
  SkippedClip,
  TargetTime,
  TimelinePlan,
} from '../../types/timeline';

export const KEY_PADDING_SECONDS = 1;

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

export interface TrimWindow {
  /** Unclamped start solved from the alignment equation */
  rawStart: number;
  rawEnd: number;
  trimStart: number;
  trimEnd: number;
}

/**
 * Solve the local trim window for one clip.
 *
 * For a later clip the segment should begin at previousKeyPosition + 1 on the
 * timeline, and its key moment must land on `target`:
 *   (previousKeyPosition + 1) + (keyTime - rawStart) = target
 *
 * @param previousKeyPosition - Target of the previous clip; null for the first clip
 */
export function solveTrimWindow(
  clip: Pick<ClipInput<unknown>, 'duration' | 'keyTime'>,
  target: TargetTime,
  previousKeyPosition: number | null
): TrimWindow {
  const rawEnd = clip.keyTime + KEY_PADDING_SECONDS;
  let rawStart = 0;
  if (previousKeyPosition !== null) {
    const finalStart = previousKeyPosition + KEY_PADDING_SECONDS;
    rawStart = clip.keyTime - (target - finalStart);
  }

  return {
    rawStart,
    rawEnd,
    trimStart: clamp(rawStart, 0, clip.duration),
    trimEnd: clamp(rawEnd, 0, clip.duration),
  };
}

/**
 * Check planner input and throw a ValidationError listing every problem.
 */
export function validateTimelineInput(
  clips: ReadonlyArray<Pick<ClipInput<unknown>, 'duration' | 'keyTime'>>,
  targets: ReadonlyArray<TargetTime>,
  audioDuration: number
): void {
  const issues: ValidationIssue[] = [];

  if (clips.length === 0) {
    issues.push({ path: 'clips', message: 'at least one clip is required' });
  }
  if (clips.length !== targets.length) {
    issues.push({
      path: 'targets',
      message: `expected ${clips.length} target time(s), got ${targets.length}`,
    });
  }

  clips.forEach((clip, i) => {
    if (!Number.isFinite(clip.duration)) {
      issues.push({ path: `clips[${i}].duration`, message: 'must be a finite number' });
    } else if (clip.duration <= 0) {
      issues.push({ path: `clips[${i}].duration`, message: 'must be greater than 0' });
    }

    if (!Number.isFinite(clip.keyTime)) {
      issues.push({ path: `clips[${i}].keyTime`, message: 'must be a finite number' });
    } else if (clip.keyTime < 0) {
      issues.push({ path: `clips[${i}].keyTime`, message: 'must not be negative' });
    } else if (Number.isFinite(clip.duration) && clip.keyTime > clip.duration) {
      issues.push({
        path: `clips[${i}].keyTime`,
        message: `${clip.keyTime}s is past the clip duration (${clip.duration}s)`,
      });
    }
  });

  targets.forEach((target, i) => {
    if (!Number.isFinite(target)) {
      issues.push({ path: `targets[${i}]`, message: 'must be a finite number' });
    }
  });

  if (!Number.isFinite(audioDuration)) {
    issues.push({ path: 'audioDuration', message: 'must be a finite number' });
  } else if (audioDuration < 0) {
    issues.push({ path: 'audioDuration', message: 'must not be negative' });
  }

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
}

interface PlanAccumulator<S> {
  previousKeyPosition: number | null;
  placements: Array<PlacementPlan<S> | null>;
  skipped: SkippedClip[];
}

/**
 * Plan where every clip goes on the output timeline.
 *
 * Clips whose trim window collapses after clamping are left out of `plans`
 * and listed in `skipped`. The sequencing state still advances to their
 * target, so later clips keep their alignment.
 *
 * @throws ValidationError on empty or mismatched input, or invalid numbers
 *
 * @example
 * const { plans } = planTimeline(
 *   [{ source: 'clip1.mp4', duration: 20, keyTime: 13 }],
 *   [8],
 *   30
 * );
 * // plans[0] → { trimStart: 0, trimEnd: 14, timelineOffset: -5, ... }
 */
export function planTimeline<S>(
  clips: ReadonlyArray<ClipInput<S>>,
  targets: ReadonlyArray<TargetTime>,
  audioDuration: number
): TimelinePlan<S> {
  validateTimelineInput(clips, targets, audioDuration);

  const initial: PlanAccumulator<S> = { previousKeyPosition: null, placements: [], skipped: [] };

  const result = clips.reduce<PlanAccumulator<S>>((acc, clip, index) => {
    const target = targets[index];
    const window = solveTrimWindow(clip, target, acc.previousKeyPosition);

    if (window.trimStart >= window.trimEnd) {
      return {
        previousKeyPosition: target,
        placements: [...acc.placements, null],
        skipped: [
          ...acc.skipped,
          {
            sourceIndex: index,
            reason: `trim window collapsed (start ${window.trimStart}s ≥ end ${window.trimEnd}s)`,
          },
        ],
      };
    }

    const keyInSegment = clip.keyTime - window.trimStart;
    const placement: PlacementPlan<S> = {
      sourceIndex: index,
      source: clip.source,
      trimStart: window.trimStart,
      trimEnd: window.trimEnd,
      timelineOffset: target - keyInSegment,
    };

    return {
      previousKeyPosition: target,
      placements: [...acc.placements, placement],
      skipped: acc.skipped,
    };
  }, initial);

  const plans = result.placements.filter((p): p is PlacementPlan<S> => p !== null);

  return {
    plans,
    totalDuration: computeTotalDuration(plans, audioDuration),
    skipped: result.skipped,
  };
}

export const segmentEnd = (plan: Pick<PlacementPlan<unknown>, 'trimStart' | 'trimEnd' | 'timelineOffset'>) =>
  plan.timelineOffset + (plan.trimEnd - plan.trimStart);

export function computeTotalDuration(
  plans: ReadonlyArray<Pick<PlacementPlan<unknown>, 'trimStart' | 'trimEnd' | 'timelineOffset'>>,
  audioDuration: number
): number {
  return plans.reduce((max, plan) => Math.max(max, segmentEnd(plan)), audioDuration);
}
