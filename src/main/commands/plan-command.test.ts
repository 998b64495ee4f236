import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ExportCancelledError } from '../errors';
import { setLogLevel } from '../logger';

const mocks = vi.hoisted(() => ({
  getAudioMetadata: vi.fn(),
  getVideoMetadata: vi.fn(),
}));

vi.mock('../services/ffmpeg', () => ({
  getAudioMetadata: mocks.getAudioMetadata,
  getVideoMetadata: mocks.getVideoMetadata,
}));

import { buildPlan, formatPlanTable, prepareMontage } from './plan-command';

const durations: Record<string, number> = {
  'clip1.mp4': 20,
  'clip2.mp4': 15,
  'clip3.mp4': 0.5,
};

describe('buildPlan', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dropsync-plan-'));
    fs.writeFileSync(
      path.join(dir, 'montage.json'),
      JSON.stringify({
        song: 'song.mp3',
        clips: ['clip2.mp4', 'clip1.mp4'],
        keyTimes: [13, 8],
        beatDrops: '8, 10.5',
      })
    );
    fs.writeFileSync(
      path.join(dir, 'with-skip.json'),
      JSON.stringify({
        song: 'song.mp3',
        clips: [
          { path: 'clip1.mp4', keyTime: 13 },
          { path: 'clip3.mp4', keyTime: 0 },
          { path: 'clip2.mp4', keyTime: 8 },
        ],
        beatDrops: [8, 8.25, 10.5],
      })
    );
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    setLogLevel('silent');
    mocks.getAudioMetadata.mockResolvedValue({ duration: 30, size: 1000 });
    mocks.getVideoMetadata.mockImplementation(async (filePath: string) => ({
      duration: durations[path.basename(filePath)],
      width: 1280,
      height: 720,
      size: 500,
    }));
  });

  it('probes the media and places every clip', async () => {
    const plan = await buildPlan({ manifestPath: path.join(dir, 'montage.json'), sortByNumber: true });

    expect(mocks.getAudioMetadata).toHaveBeenCalledWith(path.join(dir, 'song.mp3'));
    expect(plan.clips.map((c) => c.filename)).toEqual(['clip1.mp4', 'clip2.mp4']);
    expect(plan.targets).toEqual([8, 10.5]);
    expect(plan.timeline.plans).toEqual([
      { sourceIndex: 0, source: path.join(dir, 'clip1.mp4'), trimStart: 0, trimEnd: 14, timelineOffset: -5 },
      { sourceIndex: 1, source: path.join(dir, 'clip2.mp4'), trimStart: 6.5, trimEnd: 9, timelineOffset: 9 },
    ]);
    expect(plan.timeline.totalDuration).toBe(30);

    const lines = formatPlanTable(plan).split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[1].split(/\s+/)).toEqual(['0', 'clip1.mp4', '0.000', '14.000', '-5.000', '8.000']);
    expect(lines[2].split(/\s+/)).toEqual(['1', 'clip2.mp4', '6.500', '9.000', '9.000', '10.500']);
    expect(lines[3]).toBe('total duration 30.000s');
  });

  it('lists skipped clips in the table', async () => {
    const plan = await buildPlan({ manifestPath: path.join(dir, 'with-skip.json') });

    expect(plan.timeline.skipped).toEqual([
      { sourceIndex: 1, reason: 'trim window collapsed (start 0.5s ≥ end 0.5s)' },
    ]);
    const lines = formatPlanTable(plan).split('\n');
    expect(lines[3]).toBe('skipped 1 clip3.mp4: trim window collapsed (start 0.5s ≥ end 0.5s)');
    expect(lines[4]).toBe('total duration 30.000s');
  });

  it('stops probing once the signal is aborted', async () => {
    const controller = new AbortController();
    mocks.getVideoMetadata.mockImplementation(async () => {
      controller.abort();
      return { duration: 20, width: 1280, height: 720, size: 500 };
    });

    await expect(
      prepareMontage({ manifestPath: path.join(dir, 'montage.json') }, controller.signal)
    ).rejects.toBeInstanceOf(ExportCancelledError);
    expect(mocks.getVideoMetadata).toHaveBeenCalledTimes(1);
  });

  it('fails when the beat drops do not match the clips', async () => {
    const file = path.join(dir, 'short.json');
    fs.writeFileSync(file, JSON.stringify({ song: 'song.mp3', clips: [{ path: 'clip1.mp4', keyTime: 1 }], beatDrops: [] }));

    await expect(buildPlan({ manifestPath: file })).rejects.toThrow(
      'Invalid timeline input: targets: expected 1 target time(s), got 0'
    );
  });
});
