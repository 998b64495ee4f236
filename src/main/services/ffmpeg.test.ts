import { describe, it, expect, vi, beforeEach } from 'vitest';
import { setLogLevel } from '../logger';

type ProbeCallback = (err: Error | null, data: unknown) => void;

const mocks = vi.hoisted(() => ({
  ffprobe: vi.fn<[string, ProbeCallback], void>(),
  setFfmpegPath: vi.fn(),
  setFfprobePath: vi.fn(),
}));

vi.mock('fluent-ffmpeg', () => ({
  default: {
    ffprobe: mocks.ffprobe,
    setFfmpegPath: mocks.setFfmpegPath,
    setFfprobePath: mocks.setFfprobePath,
  },
}));

vi.mock('ffprobe-static', () => ({ path: '/nonexistent/ffprobe' }));

import {
  configureFfmpeg,
  getAudioDuration,
  getAudioMetadata,
  getVideoMetadata,
  probeMedia,
  resolveBinaries,
} from './ffmpeg';

const videoProbe = {
  format: { duration: 12.5, size: 2048 },
  streams: [
    { codec_type: 'video', width: 1920, height: 1080 },
    { codec_type: 'audio', duration: '12.4' },
  ],
};

const songProbe = (streamDuration: string) => ({
  format: { duration: 31.52, size: 4096 },
  streams: [{ codec_type: 'audio', duration: streamDuration }],
});

const respondWith = (data: unknown) =>
  mocks.ffprobe.mockImplementation((_path, callback) => callback(null, data));

describe('ffmpeg service', () => {
  beforeEach(() => {
    setLogLevel('silent');
  });

  it('reads duration, resolution and size of a clip', async () => {
    respondWith(videoProbe);

    await expect(getVideoMetadata('/clips/clip1.mp4')).resolves.toEqual({
      duration: 12.5,
      width: 1920,
      height: 1080,
      size: 2048,
    });
    expect(mocks.ffprobe).toHaveBeenCalledWith('/clips/clip1.mp4', expect.any(Function));
  });

  it('rejects a file without a video stream', async () => {
    respondWith(songProbe('31.5'));

    await expect(getVideoMetadata('/music/song.mp3')).rejects.toThrow('No video stream found in /music/song.mp3');
  });

  it('prefers the audio stream duration for the song', async () => {
    respondWith(songProbe('31.5'));

    await expect(getAudioMetadata('/music/song.mp3')).resolves.toEqual({ duration: 31.5, size: 4096 });
  });

  it('falls back to the container duration when the stream has none', async () => {
    respondWith(songProbe('N/A'));

    await expect(getAudioDuration('/music/song.mp3')).resolves.toBe(31.52);
  });

  it('wraps ffprobe failures with the file path', async () => {
    mocks.ffprobe.mockImplementation((_path, callback) => callback(new Error('No such file or directory'), null));

    await expect(getAudioMetadata('/music/missing.mp3')).rejects.toThrow(
      'Failed to extract metadata from /music/missing.mp3: No such file or directory'
    );
  });

  it('classifies probed files by their streams', async () => {
    respondWith(videoProbe);
    await expect(probeMedia('/clips/clip1.mp4')).resolves.toEqual({
      path: '/clips/clip1.mp4',
      kind: 'video',
      metadata: { duration: 12.5, width: 1920, height: 1080, size: 2048 },
    });

    respondWith(songProbe('31.5'));
    await expect(probeMedia('/music/song.mp3')).resolves.toEqual({
      path: '/music/song.mp3',
      kind: 'audio',
      metadata: { duration: 31.5, size: 4096 },
    });

    respondWith({ format: { duration: 1, size: 10 }, streams: [{ codec_type: 'data' }] });
    await expect(probeMedia('/notes.bin')).rejects.toThrow('No audio or video stream found in /notes.bin');
  });
});

describe('resolveBinaries', () => {
  it('uses configured paths first', () => {
    expect(resolveBinaries({ ffmpegPath: '/opt/ffmpeg/bin/ffmpeg', ffprobePath: '/opt/ffmpeg/bin/ffprobe' })).toEqual({
      ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
      ffprobePath: '/opt/ffmpeg/bin/ffprobe',
    });
  });

  it('falls back to PATH when no bundled ffprobe exists', () => {
    expect(resolveBinaries({ ffmpegPath: null, ffprobePath: null })).toEqual({
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
    });
  });

  it('hands the resolved paths to fluent-ffmpeg', () => {
    setLogLevel('silent');
    configureFfmpeg({ ffmpegPath: '/usr/local/bin/ffmpeg', ffprobePath: null });

    expect(mocks.setFfmpegPath).toHaveBeenCalledWith('/usr/local/bin/ffmpeg');
    expect(mocks.setFfprobePath).toHaveBeenCalledWith('ffprobe');
  });
});
