import ffmpeg from 'fluent-ffmpeg';
import * as fs from 'fs';
import * as path from 'path';
import { ExportCancelledError } from '../errors';
import { createLogger } from '../logger';
import { ExportResolution } from '../../types/commands';
import { PlacementPlan } from '../../types/timeline';

const log = createLogger('RENDER');

type ExportCallbacks = {
  onProgress?: (currentSeconds: number) => void;
  onStart?: (jobId: string) => void;
  onEnd?: () => void;
  onError?: (err: Error) => void;
  onCancel?: () => void;
};

export interface ExportMontageOptions {
  /** Placements from the planner; `source` is the clip's file path */
  plans: PlacementPlan<string>[];
  songPath: string;
  totalDuration: number;
  outputPath: string;
  fps: number;
  width: number;
  height: number;
  jobId?: string;
}

let activeJob: { jobId: string; cmd: ffmpeg.FfmpegCommand; outputPath: string; cancelled: boolean } | null = null;

export function getActiveJobId(): string | null {
  return activeJob?.jobId ?? null;
}

/**
 * Kill the running ffmpeg process, if any. The export promise then rejects
 * with ExportCancelledError.
 */
export function cancelActiveExport(): boolean {
  if (!activeJob) return false;
  activeJob.cancelled = true;
  try {
    activeJob.cmd.kill('SIGKILL');
  } catch (killError) {
    log.warn('Could not stop ffmpeg:', killError);
  }
  return true;
}

export function parseTimemark(t: string | undefined): number {
  if (!t) return 0;
  // formats like 00:00:12.34
  const parts = t.split(':');
  if (parts.length !== 3) return 0;
  const [hh, mm, ss] = parts;
  const seconds = parseFloat(ss);
  const total = Number(hh) * 3600 + Number(mm) * 60 + (Number.isFinite(seconds) ? seconds : 0);
  return Number.isFinite(total) ? total : 0;
}

function f(num: number): string {
  return Number(num.toFixed(6)).toString();
}

export function pickDimensions(
  resolution: ExportResolution,
  source?: { width: number; height: number } | null
): { width: number; height: number } {
  switch (resolution) {
    case '1080p':
      return { width: 1920, height: 1080 };
    case '720p':
      return { width: 1280, height: 720 };
    case 'source':
    default:
      if (source && source.width > 0 && source.height > 0) {
        // libx264 with yuv420p needs even dimensions
        return { width: source.width - (source.width % 2), height: source.height - (source.height % 2) };
      }
      return { width: 1280, height: 720 };
  }
}

export interface MontageGraph {
  inputs: string[];
  filters: string[];
  mapVideo: string;
  mapAudio: string;
  /** Segments actually drawn (those wholly before 0 are dropped) */
  placedSegments: number;
}

/**
 * Build FFmpeg inputs and filter graph for the montage.
 *
 * Every segment is drawn over a black canvas at its timeline offset; later
 * segments sit on top of earlier ones. The song is the only audio track,
 * padded with silence or cut to the total duration.
 */
export function buildMontageGraph(
  opts: Omit<ExportMontageOptions, 'outputPath' | 'jobId'>
): MontageGraph {
  const { plans, songPath, totalDuration, fps, width, height } = opts;

  // Deduplicate inputs by file path and map to input indices
  const uniquePaths: string[] = [];
  const pathToIndex = new Map<string, number>();
  const ensureInputIndex = (p: string): number => {
    const existing = pathToIndex.get(p);
    if (typeof existing === 'number') return existing;
    const idx = uniquePaths.length;
    uniquePaths.push(p);
    pathToIndex.set(p, idx);
    return idx;
  };

  const filters: string[] = [];
  filters.push(`color=c=black:s=${width}x${height}:r=${fps}:d=${f(totalDuration)}[base]`);

  let current = 'base';
  let placedSegments = 0;

  plans.forEach((plan, i) => {
    // Anything placed before 0 is cut from the front of the segment
    const lead = Math.max(0, -plan.timelineOffset);
    const trimStart = plan.trimStart + lead;
    const start = Math.max(0, plan.timelineOffset);
    if (trimStart >= plan.trimEnd) {
      log.debug(`Segment ${plan.sourceIndex} ends before the timeline starts, dropping`);
      return;
    }
    const end = start + (plan.trimEnd - trimStart);

    const idx = ensureInputIndex(plan.source);
    const seg = `seg${i}`;
    filters.push(
      `[${idx}:v]trim=start=${f(trimStart)}:end=${f(plan.trimEnd)},setpts=PTS-STARTPTS,fps=${fps},` +
        `scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
        `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:color=black,format=yuv420p,` +
        `setpts=PTS+${f(start)}/TB[${seg}]`
    );

    const next = `v${i}`;
    filters.push(
      `[${current}][${seg}]overlay=x=0:y=0:eof_action=pass:enable='between(t,${f(start)},${f(end)})'[${next}]`
    );
    current = next;
    placedSegments += 1;
  });

  filters.push(`[${current}]format=yuv420p[vout]`);

  const songIdx = ensureInputIndex(songPath);
  filters.push(`[${songIdx}:a]apad,atrim=end=${f(totalDuration)},asetpts=PTS-STARTPTS[aout]`);

  return { inputs: uniquePaths, filters, mapVideo: '[vout]', mapAudio: '[aout]', placedSegments };
}

function removePartialOutput(outputPath: string): void {
  try {
    fs.rmSync(outputPath, { force: true });
  } catch (rmError) {
    log.warn(`Could not delete partial output ${outputPath}:`, rmError);
  }
}

export function exportMontage(
  opts: ExportMontageOptions,
  cbs: ExportCallbacks = {}
): Promise<void> {
  const { outputPath, totalDuration, fps } = opts;

  if (!opts.plans.length) return Promise.reject(new Error('Nothing to render: every clip was skipped'));
  if (!(totalDuration > 0)) return Promise.reject(new Error('Nothing to render: total duration is 0'));
  if (activeJob) return Promise.reject(new Error(`Export ${activeJob.jobId} is already running`));

  const { inputs, filters, mapVideo, mapAudio, placedSegments } = buildMontageGraph(opts);
  if (placedSegments === 0) {
    return Promise.reject(new Error('Nothing to render: every segment lies before the timeline start'));
  }

  return new Promise((resolve, reject) => {
    try {
      const outDir = path.dirname(outputPath);
      if (!fs.existsSync(outDir)) {
        fs.mkdirSync(outDir, { recursive: true });
      }

      const jobId = opts.jobId ?? `render-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
      const cmd = ffmpeg();
      inputs.forEach((p) => cmd.input(p));
      log.debug('inputs', inputs);
      log.debug('filters', filters.join(';'));

      const job = { jobId, cmd, outputPath, cancelled: false };
      activeJob = job;

      cmd
        .complexFilter(filters, [mapVideo, mapAudio])
        .outputOptions(['-movflags', '+faststart', '-preset', 'medium', '-threads', '4', '-t', f(totalDuration)])
        .fps(fps)
        .videoCodec('libx264')
        .audioCodec('aac')
        .format('mp4')
        .output(outputPath)
        .on('start', (commandLine: string) => {
          log.debug('start', commandLine);
          if (cbs.onStart) cbs.onStart(jobId);
        })
        .on('stderr', (line: string) => {
          log.debug('stderr', line);
        })
        .on('progress', (p: { timemark?: string }) => {
          const seconds = parseTimemark(p.timemark);
          if (cbs.onProgress) cbs.onProgress(seconds);
        })
        .on('end', () => {
          activeJob = null;
          if (cbs.onEnd) cbs.onEnd();
          resolve();
        })
        .on('error', (err: Error) => {
          activeJob = null;
          // Detect cancel vs error
          if (job.cancelled || /SIGKILL/i.test(err.message)) {
            removePartialOutput(outputPath);
            if (cbs.onCancel) cbs.onCancel();
            reject(new ExportCancelledError());
            return;
          }
          if (cbs.onError) cbs.onError(err);
          reject(err);
        });

      // Kick off
      cmd.run();
    } catch (e) {
      activeJob = null;
      reject(e instanceof Error ? e : new Error(String(e)));
    }
  });
}
