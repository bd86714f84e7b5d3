/**
 * FFmpeg Service Module
 *
 * WHY THIS FILE EXISTS:
 * - Picks the ffmpeg/ffprobe binaries and registers them with fluent-ffmpeg
 * - Probes the demuxed streams (video size, duration)
 * - Detects which H.264 encoders the ffmpeg build offers
 *
 * DEPENDENCIES:
 * - fluent-ffmpeg: High-level FFmpeg API for Node.js
 * - @ffmpeg-installer/ffmpeg: ffmpeg binary shipped as a platform npm package
 * - ffprobe-static: Pre-bundled ffprobe binary
 */

import ffmpeg from 'fluent-ffmpeg';
import * as fs from 'fs';
import type { RecoveryConfig } from '../config';
import { FfmpegError } from '../errors';
import { DEFAULT_CANVAS, FALLBACK_ENCODER, H264_ENCODERS } from '../../types/media';
import type { EncoderInfo, VideoSize } from '../../types/media';
import { debug, warn } from '../utils/log';

export interface BinaryPaths {
  ffmpegPath: string;
  ffprobePath: string;
}

function hasPath(mod: unknown): mod is { path: string } {
  return typeof mod === 'object' && mod !== null && 'path' in mod && typeof mod.path === 'string';
}

/** Resolve a bundled binary package to its path; null when it is not installed */
function bundledBinary(id: string): string | null {
  try {
    // eslint-disable-next-line @typescript-eslint/no-var-requires
    const mod: unknown = require(id);
    return hasPath(mod) ? mod.path : null;
  } catch {
    debug('FFMPEG', `Bundled binary package '${id}' is not available`);
    return null;
  }
}

function pathIfExists(p: string | null | undefined): string | null {
  if (!p) return null;
  return fs.existsSync(p) ? p : null;
}

/**
 * Binary lookup order: explicit config, bundled package, then the bare
 * command name so the system PATH decides.
 */
export function resolveBinaryPaths(
  config: Pick<RecoveryConfig, 'ffmpegPath' | 'ffprobePath'>,
  lookup: (id: string) => string | null = bundledBinary
): BinaryPaths {
  const ffmpegPath = config.ffmpegPath ?? pathIfExists(lookup('@ffmpeg-installer/ffmpeg')) ?? 'ffmpeg';
  const ffprobePath = config.ffprobePath ?? pathIfExists(lookup('ffprobe-static')) ?? 'ffprobe';
  return { ffmpegPath, ffprobePath };
}

/**
 * Register the binaries with fluent-ffmpeg. Bundled binaries may lose their
 * execute bit when copied, so it is restored where possible.
 */
export function configureFfmpeg(config: Pick<RecoveryConfig, 'ffmpegPath' | 'ffprobePath'>): BinaryPaths {
  const paths = resolveBinaryPaths(config);

  if (process.platform !== 'win32') {
    for (const p of [paths.ffmpegPath, paths.ffprobePath]) {
      if (!fs.existsSync(p)) continue;
      try {
        fs.chmodSync(p, 0o755);
      } catch (chmodError) {
        warn('FFMPEG', 'Could not set permissions (may already be set):', chmodError);
      }
    }
  }

  ffmpeg.setFfmpegPath(paths.ffmpegPath);
  ffmpeg.setFfprobePath(paths.ffprobePath);
  debug('FFMPEG', 'FFmpeg binary path:', paths.ffmpegPath);
  debug('FFMPEG', 'FFprobe binary path:', paths.ffprobePath);
  return paths;
}

function probe(filePath: string): Promise<ffmpeg.FfprobeData> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err: unknown, metadata) => {
      if (err) {
        const message = err instanceof Error ? err.message : String(err);
        reject(new FfmpegError('probe', `cannot read '${filePath}': ${message}`));
        return;
      }
      resolve(metadata);
    });
  });
}

/**
 * Resolution of the first video stream. Falls back to 4K when the file has
 * no video stream or the stream reports no size.
 */
export async function getVideoSize(filePath: string): Promise<VideoSize> {
  const metadata = await probe(filePath);
  const videoStream = metadata.streams.find((stream) => stream.codec_type === 'video');
  if (!videoStream || !videoStream.width || !videoStream.height) {
    warn('FFMPEG', `No video size in '${filePath}', assuming ${DEFAULT_CANVAS.width}x${DEFAULT_CANVAS.height}`);
    return { ...DEFAULT_CANVAS };
  }
  return { width: videoStream.width, height: videoStream.height };
}

/** Container duration in seconds, 0 when ffprobe reports none */
export async function getMediaDuration(filePath: string): Promise<number> {
  const metadata = await probe(filePath);
  const duration = Number(metadata.format.duration);
  return Number.isFinite(duration) ? duration : 0;
}

/**
 * H.264 encoders (from the known list) that this ffmpeg build offers.
 */
export function getAvailableEncoders(): Promise<EncoderInfo[]> {
  return new Promise((resolve, reject) => {
    ffmpeg.getAvailableEncoders((err, encoders) => {
      if (err) {
        reject(new Error(`Failed to list encoders: ${err.message}`));
        return;
      }
      resolve(H264_ENCODERS.filter((e) => e.name in encoders).map((e) => ({ name: e.name, description: e.description })));
    });
  });
}

/**
 * Pick the preferred encoder: hardware first, libx264 last, libx264 when
 * nothing is available.
 */
export function selectEncoder(available: EncoderInfo[]): string {
  if (available.length === 0) return FALLBACK_ENCODER;
  for (const preferred of H264_ENCODERS) {
    if (available.some((e) => e.name === preferred.name)) return preferred.name;
  }
  return available[0].name;
}
