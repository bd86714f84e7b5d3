/**
 * Configuration
 *
 * Values come from the environment (a `.env` file in the working directory is
 * loaded by dotenv at startup). CLI flags override what is read here.
 */

import { ConfigError } from './errors';

export interface RecoveryConfig {
  /** Explicit ffmpeg binary; otherwise the bundled one, then PATH */
  ffmpegPath?: string;
  /** Explicit ffprobe binary; otherwise the bundled one, then PATH */
  ffprobePath?: string;
  /** Video encoder; auto-detected when unset */
  encoder?: string;
  videoBitrate: string;
  overlayWidth: number;
  overlayMargin: number;
  verbose: boolean;
}

export const DEFAULT_CONFIG: Readonly<RecoveryConfig> = {
  videoBitrate: '15M',
  overlayWidth: 720,
  overlayMargin: 50,
  verbose: false,
};

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readFlag(env: NodeJS.ProcessEnv, key: string): boolean {
  const raw = readString(env, key);
  return raw !== undefined && /^(1|true|yes|on)$/i.test(raw);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RecoveryConfig {
  const videoBitrate = readString(env, 'TREC_VIDEO_BITRATE') ?? DEFAULT_CONFIG.videoBitrate;
  if (!/^\d+(\.\d+)?[kKmM]?$/.test(videoBitrate)) {
    throw new ConfigError(`TREC_VIDEO_BITRATE must look like "15M" or "8000k", got "${videoBitrate}"`);
  }

  return {
    ffmpegPath: readString(env, 'FFMPEG_PATH'),
    ffprobePath: readString(env, 'FFPROBE_PATH'),
    encoder: readString(env, 'TREC_ENCODER'),
    videoBitrate,
    overlayWidth: readInteger(env, 'TREC_OVERLAY_WIDTH', DEFAULT_CONFIG.overlayWidth, 2),
    overlayMargin: readInteger(env, 'TREC_OVERLAY_MARGIN', DEFAULT_CONFIG.overlayMargin, 0),
    verbose: readFlag(env, 'TREC_VERBOSE'),
  };
}
