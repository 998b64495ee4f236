/**
 * Montage Manifest
 *
 * A JSON file describing one montage: the song, the clips with their key
 * moments, and the beat-drop times on the output timeline.
 *
 * @example
 * {
 *   "song": "song.mp3",
 *   "clips": [{ "path": "clip1.mp4", "keyTime": 13 }, "clip2.mp4"],
 *   "keyTimes": [13, 8],
 *   "beatDrops": "8,10.5",
 *   "fps": 60
 * }
 *
 * Relative paths resolve against the manifest's own directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ManifestError, ValidationIssue } from '../errors';
import { sortClipsByNumber } from '../utils/clip-order';
import { parseTimeList } from '../utils/time-list';

const timeListSchema = z.union([z.array(z.number()), z.string()]);

const clipEntrySchema = z.union([
  z.string().min(1),
  z.object({
    path: z.string().min(1),
    keyTime: z.number().optional(),
  }),
]);

export const manifestSchema = z.object({
  song: z.string().min(1),
  clips: z.array(clipEntrySchema).min(1, 'at least one clip is required'),
  keyTimes: timeListSchema.optional(),
  beatDrops: timeListSchema,
  fps: z.number().int().positive().optional(),
  output: z.string().min(1).optional(),
  resolution: z.enum(['source', '720p', '1080p']).optional(),
});

export type Manifest = z.infer<typeof manifestSchema>;

export interface ManifestClip {
  path: string;
  keyTime: number;
}

export interface ResolvedManifest {
  songPath: string;
  clips: ManifestClip[];
  beatDrops: number[];
  fps?: number;
  outputPath?: string;
  resolution?: Manifest['resolution'];
}

export interface ResolveOptions {
  /** Order clips by the number in their filename before pairing key times */
  sortByNumber?: boolean;
}

const formatPath = (segments: ReadonlyArray<string | number>) =>
  segments.reduce<string>((acc, seg) => {
    if (typeof seg === 'number') return `${acc}[${seg}]`;
    return acc ? `${acc}.${seg}` : seg;
  }, '') || '(root)';

const toTimes = (value: number[] | string, field: string) =>
  typeof value === 'string' ? parseTimeList(value, field) : value;

/**
 * Validate a parsed manifest and turn it into absolute paths plus one key
 * time per clip.
 *
 * @throws ManifestError on schema violations or missing/extra key times
 */
export function resolveManifest(raw: unknown, baseDir: string, options: ResolveOptions = {}): ResolvedManifest {
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
    }));
    throw new ManifestError('Manifest does not match the expected format', issues);
  }
  const manifest = parsed.data;
  const resolvePath = (p: string) => path.resolve(baseDir, p);

  const entries = manifest.clips.map((entry) =>
    typeof entry === 'string' ? { path: entry, keyTime: undefined } : entry
  );
  const ordered = options.sortByNumber ? sortClipsByNumber(entries, (e) => e.path) : entries;

  const keyTimes = manifest.keyTimes === undefined ? null : toTimes(manifest.keyTimes, 'keyTimes');
  if (keyTimes && keyTimes.length !== ordered.length) {
    throw new ManifestError('Number of key times must match the number of clips', [
      { path: 'keyTimes', message: `expected ${ordered.length}, got ${keyTimes.length}` },
    ]);
  }

  const clips = ordered.map((entry, i): ManifestClip => {
    const keyTime = entry.keyTime ?? keyTimes?.[i];
    if (keyTime === undefined) {
      throw new ManifestError(`No key time for clip ${entry.path}`, [
        { path: `clips[${i}].keyTime`, message: 'set keyTime on the clip or list it in keyTimes' },
      ]);
    }
    return { path: resolvePath(entry.path), keyTime };
  });

  return {
    songPath: resolvePath(manifest.song),
    clips,
    beatDrops: toTimes(manifest.beatDrops, 'beatDrops'),
    fps: manifest.fps,
    outputPath: manifest.output === undefined ? undefined : resolvePath(manifest.output),
    resolution: manifest.resolution,
  };
}

export async function loadManifest(manifestPath: string, options: ResolveOptions = {}): Promise<ResolvedManifest> {
  let text: string;
  try {
    text = await fs.promises.readFile(manifestPath, 'utf8');
  } catch (e) {
    throw new ManifestError(
      `Could not read manifest ${manifestPath}: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ManifestError(
      `Manifest ${manifestPath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  return resolveManifest(raw, path.dirname(path.resolve(manifestPath)), options);
}
