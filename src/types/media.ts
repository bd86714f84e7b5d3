/**
 * Media Types and Interfaces
 *
 * WHY THIS FILE EXISTS:
 * - Describes the demuxed streams a recording is rebuilt from
 * - Shared by the FFmpeg service, reconstruction and the CLI
 *
 * The container is demuxed beforehand by a lossless extraction tool, which
 * leaves one file per stream next to project.xml, e.g.:
 * - `Rec 1-stream-0-video-tscc2.mkv` (screen)
 * - `Rec 1-stream-1-video-h264.mp4` (webcam)
 * - `Rec 1-stream-2-audio-aac.aac` (microphone)
 */

/**
 * The three independently seekable source streams.
 */
export interface MediaSources {
  /** Screen capture video */
  screen: string;

  /** Webcam video, drawn picture-in-picture */
  webcam: string;

  /** Audio track */
  audio: string;
}

/** Video resolution in pixels */
export interface VideoSize {
  width: number;
  height: number;
}

/**
 * H.264 encoders the tool knows how to use, in order of preference.
 */
export const H264_ENCODERS = [
  { name: 'h264_videotoolbox', description: 'Apple Hardware (macOS/iOS)' },
  { name: 'h264_nvenc', description: 'NVIDIA GPU' },
  { name: 'h264_amf', description: 'AMD GPU' },
  { name: 'libx264', description: 'Software (portable)' },
] as const;

export type KnownEncoder = (typeof H264_ENCODERS)[number]['name'];

export interface EncoderInfo {
  name: string;
  description: string;
}

export const FALLBACK_ENCODER: KnownEncoder = 'libx264';

/** Used when the screen stream reports no video size */
export const DEFAULT_CANVAS: VideoSize = { width: 3840, height: 2160 };
