import ffmpeg from 'fluent-ffmpeg';
import * as fs from 'fs';
import * as path from 'path';
import type { ExtractionPlan, Segment } from '../../types/timeline';
import type { MediaSources, VideoSize } from '../../types/media';
import { CancelledError, FfmpegError } from '../errors';
import { debug, info, warn } from '../utils/log';

export const CONCAT_LIST_NAME = 'concat_list.txt';
const SLICE_PATTERN = /^slice_\d+\.ts$/;

export interface OverlayGeometry {
  /** Output canvas; the screen stream is scaled to it */
  canvas: VideoSize;
  /** Width of the webcam picture-in-picture, height keeps aspect */
  overlayWidth: number;
  /** Distance of the overlay from the bottom-right corner */
  overlayMargin: number;
  frameRate: number;
}

export interface ReconstructOptions extends OverlayGeometry {
  outputPath: string;
  encoder: string;
  videoBitrate: string;
  /** Directory for slices and the concat list; defaults to the output's directory */
  workDir?: string;
  /** Suppress ffmpeg's own output (only errors) */
  quiet?: boolean;
  /** Reuse slices from a previous run and only concatenate */
  restart?: boolean;
}

type ReconstructCallbacks = {
  onSegmentStart?: (segment: Segment, total: number, sliceFile: string) => void;
  onSegmentEnd?: (segment: Segment, total: number) => void;
  onConcatStart?: (outputPath: string) => void;
  onEnd?: () => void;
  onCancel?: () => void;
};

let activeJob: { label: string; cmd: ffmpeg.FfmpegCommand } | null = null;
let cancelRequested = false;

/** Stop the running ffmpeg process, if any, and abort the reconstruction */
export function cancelActiveReconstruction(): void {
  cancelRequested = true;
  if (activeJob?.cmd) {
    try {
      activeJob.cmd.kill('SIGKILL');
    } catch (e) {
      warn('EXPORT', 'Could not stop ffmpeg:', e);
    }
  }
}

function f(num: number): string {
  return Number(num.toFixed(6)).toString();
}

export function sliceFileName(index: number): string {
  return `slice_${String(index).padStart(3, '0')}.ts`;
}

/**
 * Filter graph for one slice: screen scaled to the canvas, webcam scaled to
 * the overlay width, webcam drawn in the bottom-right corner.
 */
export function buildSliceFilterGraph(geometry: OverlayGeometry): string[] {
  const { canvas, overlayWidth, overlayMargin, frameRate } = geometry;
  const fps = f(frameRate);
  return [
    `[0:v]scale=${canvas.width}:${canvas.height},fps=${fps}[v0]`,
    `[1:v]scale=${overlayWidth}:-2,fps=${fps}[v1]`,
    `[v0][v1]overlay=main_w-overlay_w-${overlayMargin}:main_h-overlay_h-${overlayMargin}[vout]`,
  ];
}

/** Concat demuxer list; single quotes in names are escaped */
export function buildConcatList(files: string[]): string {
  return files.map((file) => `file '${file.replace(/'/g, "'\\''")}'\n`).join('');
}

function windowOptions(segment: Segment): string[] {
  return ['-ss', f(segment.sourceOffsetSeconds), '-t', f(segment.durationSeconds)];
}

/**
 * ffmpeg command for one slice: the same window is cut from the screen,
 * webcam and audio streams.
 */
export function buildSliceCommand(
  segment: Segment,
  sources: MediaSources,
  options: ReconstructOptions,
  outputFile: string
): ffmpeg.FfmpegCommand {
  const window = windowOptions(segment);
  const cmd = ffmpeg()
    .input(sources.screen)
    .inputOptions(window)
    .input(sources.webcam)
    .inputOptions(window)
    .input(sources.audio)
    .inputOptions(window)
    .complexFilter(buildSliceFilterGraph(options))
    .outputOptions(['-map', '[vout]', '-map', '2:a', '-b:v', options.videoBitrate])
    .videoCodec(options.encoder)
    .audioCodec('aac')
    .output(outputFile);
  if (options.quiet) cmd.outputOptions(['-loglevel', 'error', '-hide_banner']);
  return cmd;
}

/** Stream-copy concatenation of the slices listed in `listPath` */
export function buildConcatCommand(listPath: string, outputPath: string, quiet = false): ffmpeg.FfmpegCommand {
  const cmd = ffmpeg()
    .input(listPath)
    .inputOptions(['-f', 'concat', '-safe', '0'])
    .outputOptions(['-c', 'copy'])
    .output(outputPath);
  if (quiet) cmd.outputOptions(['-loglevel', 'error', '-hide_banner']);
  return cmd;
}

function runCommand(cmd: ffmpeg.FfmpegCommand, label: string, quiet: boolean): Promise<void> {
  return new Promise((resolve, reject) => {
    cmd
      .on('start', (commandLine: string) => {
        debug('FFMPEG', '[start]', commandLine);
        activeJob = { label, cmd };
      })
      .on('stderr', (line: string) => {
        if (!quiet) debug('FFMPEG', '[stderr]', line);
      })
      .on('end', () => {
        activeJob = null;
        resolve();
      })
      .on('error', (err: Error) => {
        activeJob = null;
        const msg = String(err?.message || err);
        if (cancelRequested) {
          reject(new CancelledError());
          return;
        }
        reject(new FfmpegError(label, msg));
      });

    cmd.run();
  });
}

/**
 * Rebuild the edited video: cut every segment of the plan out of the three
 * streams (with the webcam overlay) into numbered slices, then join the
 * slices with a stream copy.
 *
 * Stops at the first failing ffmpeg run; slices written so far are left in
 * place so a later run can use `restart`.
 */
export async function reconstruct(
  plan: ExtractionPlan,
  sources: MediaSources,
  options: ReconstructOptions,
  cbs: ReconstructCallbacks = {}
): Promise<void> {
  const workDir = options.workDir ?? path.dirname(path.resolve(options.outputPath));
  const listPath = path.join(workDir, CONCAT_LIST_NAME);
  const quiet = !!options.quiet;
  const total = plan.segments.length;
  cancelRequested = false;

  try {
    if (!options.restart) {
      const sliceFiles: string[] = [];
      for (const segment of plan.segments) {
        if (cancelRequested) throw new CancelledError();
        const name = sliceFileName(segment.ordinal);
        const sliceFile = path.join(workDir, name);
        if (cbs.onSegmentStart) cbs.onSegmentStart(segment, total, name);
        info('EXPORT', `Extracting segment ${segment.ordinal + 1}/${total} --> ${name}`);
        await runCommand(buildSliceCommand(segment, sources, options, sliceFile), `segment ${segment.ordinal}`, quiet);
        sliceFiles.push(name);
        if (cbs.onSegmentEnd) cbs.onSegmentEnd(segment, total);
      }
      await fs.promises.writeFile(listPath, buildConcatList(sliceFiles), 'utf8');
    } else if (!fs.existsSync(listPath)) {
      throw new FfmpegError('concatenation', `cannot restart: ${listPath} does not exist`);
    }

    if (cancelRequested) throw new CancelledError();
    if (cbs.onConcatStart) cbs.onConcatStart(options.outputPath);
    info('EXPORT', `Final concatenation --> ${options.outputPath}`);
    await runCommand(buildConcatCommand(listPath, options.outputPath, quiet), 'concatenation', quiet);
  } catch (e) {
    if (e instanceof CancelledError && cbs.onCancel) cbs.onCancel();
    throw e;
  }

  if (cbs.onEnd) cbs.onEnd();
}

/**
 * Remove slices and the concat list from `dir`. Files that cannot be removed
 * are reported and left behind. Returns the number of files removed.
 */
export async function cleanupSlices(dir: string): Promise<number> {
  const entries = await fs.promises.readdir(dir);
  const targets = entries.filter((name) => SLICE_PATTERN.test(name) || name === CONCAT_LIST_NAME);
  if (targets.length > 0) {
    info('EXPORT', `Cleaning up ${targets.length} temporary file(s)...`);
  }

  let removed = 0;
  for (const name of targets) {
    try {
      await fs.promises.unlink(path.join(dir, name));
      removed++;
    } catch (e) {
      warn('EXPORT', `Could not delete ${name}:`, e instanceof Error ? e.message : e);
    }
  }
  return removed;
}
