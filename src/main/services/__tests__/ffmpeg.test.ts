import { beforeEach, describe, expect, it, vi } from 'vitest';

const mocked = vi.hoisted(() => ({
  ffprobe: vi.fn(),
  getAvailableEncoders: vi.fn(),
  setFfmpegPath: vi.fn(),
  setFfprobePath: vi.fn(),
}));

vi.mock('fluent-ffmpeg', () => ({ default: mocked }));

import {
  getAvailableEncoders,
  getMediaDuration,
  getVideoSize,
  resolveBinaryPaths,
  selectEncoder,
} from '../ffmpeg';

type ProbeCallback = (err: unknown, data?: unknown) => void;

function probeReturns(data: unknown): void {
  mocked.ffprobe.mockImplementation((_file: string, cb: ProbeCallback) => cb(null, data));
}

describe('resolveBinaryPaths', () => {
  it('prefers paths from the configuration', () => {
    const lookup = vi.fn(() => null);

    expect(resolveBinaryPaths({ ffmpegPath: '/opt/ffmpeg', ffprobePath: '/opt/ffprobe' }, lookup)).toEqual({
      ffmpegPath: '/opt/ffmpeg',
      ffprobePath: '/opt/ffprobe',
    });
    expect(lookup).not.toHaveBeenCalled();
  });

  it('falls back to the command names when no bundled binary exists', () => {
    expect(resolveBinaryPaths({}, () => null)).toEqual({ ffmpegPath: 'ffmpeg', ffprobePath: 'ffprobe' });
    expect(resolveBinaryPaths({}, () => '/definitely/not/here/ffmpeg')).toEqual({
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
    });
  });

  it('uses a bundled binary that exists on disk', () => {
    const paths = resolveBinaryPaths({ ffprobePath: '/opt/ffprobe' }, (id) => (id === '@ffmpeg-installer/ffmpeg' ? process.execPath : null));

    expect(paths).toEqual({ ffmpegPath: process.execPath, ffprobePath: '/opt/ffprobe' });
  });
});

describe('probing', () => {
  beforeEach(() => {
    mocked.ffprobe.mockReset();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('reads the size of the first video stream', async () => {
    probeReturns({
      streams: [{ codec_type: 'audio' }, { codec_type: 'video', width: 1920, height: 1080 }],
      format: {},
    });

    await expect(getVideoSize('cam.mp4')).resolves.toEqual({ width: 1920, height: 1080 });
  });

  it('assumes 4K when there is no video stream', async () => {
    probeReturns({ streams: [{ codec_type: 'audio' }], format: {} });

    await expect(getVideoSize('mic.aac')).resolves.toEqual({ width: 3840, height: 2160 });
  });

  it('reads the container duration', async () => {
    probeReturns({ streams: [], format: { duration: 754.2 } });
    await expect(getMediaDuration('screen.mkv')).resolves.toBe(754.2);

    probeReturns({ streams: [], format: {} });
    await expect(getMediaDuration('screen.mkv')).resolves.toBe(0);
  });

  it('rejects when ffprobe fails', async () => {
    mocked.ffprobe.mockImplementation((_file: string, cb: ProbeCallback) => cb(new Error('No such file')));

    await expect(getVideoSize('missing.mkv')).rejects.toThrow(
      "FFmpeg failed during probe: cannot read 'missing.mkv': No such file"
    );
  });
});

describe('encoders', () => {
  it('lists the known H.264 encoders ffmpeg offers, in preference order', async () => {
    mocked.getAvailableEncoders.mockImplementation((cb: (err: Error | null, encoders: object) => void) =>
      cb(null, { mpeg4: {}, libx264: {}, h264_amf: {} })
    );

    await expect(getAvailableEncoders()).resolves.toEqual([
      { name: 'h264_amf', description: 'AMD GPU' },
      { name: 'libx264', description: 'Software (portable)' },
    ]);
  });

  it('prefers hardware encoders', () => {
    expect(
      selectEncoder([
        { name: 'libx264', description: 'Software (portable)' },
        { name: 'h264_nvenc', description: 'NVIDIA GPU' },
      ])
    ).toBe('h264_nvenc');
  });

  it('falls back to libx264 when nothing is available', () => {
    expect(selectEncoder([])).toBe('libx264');
  });

  it('takes the first entry when none is known', () => {
    expect(selectEncoder([{ name: 'h264_qsv', description: 'Intel Quick Sync' }])).toBe('h264_qsv');
  });
});
