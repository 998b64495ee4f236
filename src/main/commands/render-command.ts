import * as path from 'path';
import { AppConfig } from '../config';
import { ExportCancelledError } from '../errors';
import { createLogger } from '../logger';
import { exportMontage, pickDimensions } from '../services/export';
import { renderJobStore } from '../stores/renderJobStore';
import { RenderRequest, RenderResponse } from '../../types/commands';
import { prepareMontage, PreparedMontage } from './plan-command';

const log = createLogger('RENDER');

const cancelled = () => {
  renderJobStore.getState().cancel();
  return new ExportCancelledError();
};

/**
 * Plan the montage, then render it.
 *
 * Aborting `signal` while the media is still being probed rejects with
 * ExportCancelledError before ffmpeg starts; once ffmpeg runs, cancel it with
 * cancelActiveExport().
 */
export async function renderMontage(
  request: RenderRequest,
  config: Pick<AppConfig, 'defaultFps' | 'defaultOutput'>,
  signal?: AbortSignal
): Promise<RenderResponse> {
  let prepared: PreparedMontage;
  try {
    prepared = await prepareMontage(request, signal);
  } catch (error) {
    if (error instanceof ExportCancelledError) throw cancelled();
    throw error;
  }
  if (signal?.aborted) throw cancelled();

  const { manifest, plan } = prepared;
  const { timeline, clips } = plan;

  const outputPath = request.outputPath
    ? path.resolve(request.outputPath)
    : manifest.outputPath ?? path.resolve(config.defaultOutput);
  const fps = request.fps ?? manifest.fps ?? config.defaultFps;
  const resolution = request.resolution ?? manifest.resolution ?? 'source';

  const firstPlaced = timeline.plans[0] ? clips[timeline.plans[0].sourceIndex] : null;
  const { width, height } = pickDimensions(resolution, firstPlaced);

  const jobId = `render-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
  const store = renderJobStore.getState();
  store.startJob(jobId, timeline.totalDuration);

  log.info(`Rendering ${timeline.plans.length} segment(s) at ${width}x${height}, ${fps}fps → ${outputPath}`);

  await exportMontage(
    {
      plans: timeline.plans,
      songPath: manifest.songPath,
      totalDuration: timeline.totalDuration,
      outputPath,
      fps,
      width,
      height,
      jobId,
    },
    {
      onProgress: (seconds) => store.reportProgress(seconds),
      onEnd: () => store.complete(),
      onError: (err) => store.fail(err.message),
      onCancel: () => store.cancel(),
    }
  ).catch((error: unknown) => {
    // exportMontage rejects before any callback when it cannot start
    if (renderJobStore.getState().status === 'processing') {
      store.fail(error instanceof Error ? error.message : String(error));
    }
    throw error;
  });

  log.info(`Montage written to ${outputPath}`);

  return {
    success: true,
    outputPath,
    jobId,
    totalDuration: timeline.totalDuration,
    placedClips: timeline.plans.length,
  };
}
