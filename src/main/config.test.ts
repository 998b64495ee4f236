import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_FPS, DEFAULT_OUTPUT, loadConfig } from './config';
import { setLogLevel } from './logger';

describe('loadConfig', () => {
  beforeEach(() => {
    setLogLevel('silent');
  });

  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      ffmpegPath: null,
      ffprobePath: null,
      defaultFps: DEFAULT_FPS,
      defaultOutput: DEFAULT_OUTPUT,
      logLevel: 'info',
    });
  });

  it('reads every supported variable', () => {
    expect(
      loadConfig({
        FFMPEG_PATH: '/opt/bin/ffmpeg',
        FFPROBE_PATH: ' /opt/bin/ffprobe ',
        DROPSYNC_FPS: '30',
        DROPSYNC_OUTPUT: 'renders/out.mp4',
        LOG_LEVEL: 'DEBUG',
      })
    ).toEqual({
      ffmpegPath: '/opt/bin/ffmpeg',
      ffprobePath: '/opt/bin/ffprobe',
      defaultFps: 30,
      defaultOutput: 'renders/out.mp4',
      logLevel: 'debug',
    });
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ FFMPEG_PATH: '   ', DROPSYNC_OUTPUT: '' });
    expect(config.ffmpegPath).toBeNull();
    expect(config.defaultOutput).toBe('final_montage.mp4');
  });

  it('falls back on invalid fps and log level', () => {
    const config = loadConfig({ DROPSYNC_FPS: '29.97', LOG_LEVEL: 'verbose' });
    expect(config.defaultFps).toBe(60);
    expect(config.logLevel).toBe('info');
  });
});
