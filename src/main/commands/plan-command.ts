import * as path from 'path';
import { ExportCancelledError } from '../errors';
import { createLogger } from '../logger';
import { getAudioMetadata, getVideoMetadata } from '../services/ffmpeg';
import { loadManifest, ResolvedManifest } from '../services/manifest';
import { planTimeline } from '../services/planner';
import { PlanRequest, PlanResponse } from '../../types/commands';
import { MontageClip } from '../../types/media';
import { PlacementPlan } from '../../types/timeline';

const log = createLogger('PLAN');

export interface PreparedMontage {
  manifest: ResolvedManifest;
  plan: PlanResponse;
}

const throwIfAborted = (signal: AbortSignal | undefined) => {
  if (signal?.aborted) throw new ExportCancelledError();
};

/**
 * Load the manifest, probe the song and every clip, and run the planner.
 * Clips are probed one at a time so a large montage does not start dozens
 * of ffprobe processes at once.
 *
 * @param signal - Checked after every probe; an aborted signal rejects with ExportCancelledError
 */
export async function prepareMontage(request: PlanRequest, signal?: AbortSignal): Promise<PreparedMontage> {
  const manifest = await loadManifest(request.manifestPath, { sortByNumber: request.sortByNumber });
  throwIfAborted(signal);
  log.info(`Loaded ${manifest.clips.length} clip(s) from ${request.manifestPath}`);

  const song = await getAudioMetadata(manifest.songPath);
  throwIfAborted(signal);
  log.info(`Song ${path.basename(manifest.songPath)}: ${song.duration.toFixed(3)}s`);

  const clips: MontageClip[] = [];
  for (const clip of manifest.clips) {
    const metadata = await getVideoMetadata(clip.path);
    throwIfAborted(signal);
    clips.push({
      ...metadata,
      path: clip.path,
      filename: path.basename(clip.path),
      keyTime: clip.keyTime,
    });
  }

  const timeline = planTimeline(
    clips.map((clip) => ({ source: clip.path, duration: clip.duration, keyTime: clip.keyTime })),
    manifest.beatDrops,
    song.duration
  );

  for (const skipped of timeline.skipped) {
    log.warn(`Skipping ${clips[skipped.sourceIndex].filename}: ${skipped.reason}`);
  }
  log.info(
    `Placed ${timeline.plans.length} of ${clips.length} clip(s), total ${timeline.totalDuration.toFixed(3)}s`
  );

  return {
    manifest,
    plan: {
      success: true,
      song: { path: manifest.songPath, ...song },
      clips,
      targets: manifest.beatDrops,
      timeline,
    },
  };
}

export async function buildPlan(request: PlanRequest): Promise<PlanResponse> {
  const { plan } = await prepareMontage(request);
  return plan;
}

const fmt = (seconds: number) => seconds.toFixed(3);

/**
 * Human-readable placement table, one row per placed clip.
 */
export function formatPlanTable(plan: Pick<PlanResponse, 'clips' | 'targets' | 'timeline'>): string {
  const header = ['#', 'clip', 'trim start', 'trim end', 'offset', 'key at'];
  const rows = plan.timeline.plans.map((p: PlacementPlan) => [
    String(p.sourceIndex),
    plan.clips[p.sourceIndex]?.filename ?? path.basename(p.source),
    fmt(p.trimStart),
    fmt(p.trimEnd),
    fmt(p.timelineOffset),
    fmt(plan.targets[p.sourceIndex]),
  ]);

  const widths = header.map((h, col) => Math.max(h.length, ...rows.map((r) => r[col].length)));
  const line = (cells: string[]) => cells.map((c, col) => c.padEnd(widths[col])).join('  ').trimEnd();

  const lines = [line(header), ...rows.map(line)];
  for (const skipped of plan.timeline.skipped) {
    const name = plan.clips[skipped.sourceIndex]?.filename ?? `clip ${skipped.sourceIndex}`;
    lines.push(`skipped ${skipped.sourceIndex} ${name}: ${skipped.reason}`);
  }
  lines.push(`total duration ${fmt(plan.timeline.totalDuration)}s`);
  return lines.join('\n');
}
