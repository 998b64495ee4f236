import * as path from 'path';
import { createLogger } from '../logger';
import { probeMedia } from '../services/ffmpeg';
import { ProbeRequest, ProbeResponse } from '../../types/commands';
import { ProbedMedia } from '../../types/media';

const log = createLogger('PROBE');

export async function probeFiles(request: ProbeRequest): Promise<ProbeResponse> {
  if (request.paths.length === 0) {
    throw new Error('probe needs at least one file');
  }

  const files: ProbedMedia[] = [];
  for (const filePath of request.paths) {
    const absolute = path.resolve(filePath);
    log.debug(`Probing ${absolute}`);
    files.push(await probeMedia(absolute));
  }
  return { success: true, files };
}

export function formatProbed(file: ProbedMedia): string {
  const name = path.basename(file.path);
  if (file.kind === 'video') {
    const { duration, width, height, size } = file.metadata;
    return `${name}: video ${duration.toFixed(3)}s ${width}x${height} ${size} bytes`;
  }
  return `${name}: audio ${file.metadata.duration.toFixed(3)}s ${file.metadata.size} bytes`;
}
