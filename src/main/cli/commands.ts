import * as path from 'path';
import * as readline from 'readline/promises';
import { loadConfig } from '../config';
import type { RecoveryConfig } from '../config';
import { MissingTimelineError } from '../errors';
import { loadProjectDescriptor } from '../services/timeline-parser';
import { buildExtractionPlan } from '../services/segment-resolver';
import { renderSegmentTable, writePlanFile } from '../services/plan-output';
import { ensureWritable, resolveInputs, resolveProjectXml } from '../services/sources';
import { configureFfmpeg, getAvailableEncoders, getMediaDuration, getVideoSize, selectEncoder } from '../services/ffmpeg';
import { cancelActiveReconstruction, cleanupSlices, reconstruct } from '../services/reconstruct';
import type { CommonOptions, PlanCommandOptions, RecoverCommandOptions } from '../../types/cli';
import type { ExtractionPlan } from '../../types/timeline';
import { info, setVerbose } from '../utils/log';

export interface CommandDeps {
  loadConfig: () => RecoveryConfig;
  confirm: (question: string) => Promise<boolean>;
  now: () => number;
}

async function askOnTerminal(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === 'y';
  } finally {
    rl.close();
  }
}

export const defaultDeps: CommandDeps = {
  loadConfig: () => loadConfig(),
  confirm: askOnTerminal,
  now: () => Date.now(),
};

/** `HH:MM:SS` for a span of milliseconds */
export function formatElapsed(ms: number): string {
  const total = Math.floor(ms / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

function mmss(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.floor(totalSeconds % 60);
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

/**
 * Load project.xml, resolve it, print the segment table and write the plan
 * file when one is requested.
 */
export async function preparePlan(options: CommonOptions, projectXml: string): Promise<ExtractionPlan> {
  const timeline = await loadProjectDescriptor(projectXml);
  const plan = buildExtractionPlan(timeline, { frameRate: options.fps });

  info('PLAN', `Total segments: ${plan.segments.length}`);
  console.log(renderSegmentTable(plan));

  if (options.planFile) {
    await writePlanFile(plan, options.planFile);
    info('PLAN', `Plan written to ${options.planFile}`);
  }
  return plan;
}

export async function runPlan(options: PlanCommandOptions, deps: CommandDeps = defaultDeps): Promise<void> {
  const config = deps.loadConfig();
  setVerbose(!!options.verbose || config.verbose);
  await preparePlan(options, resolveProjectXml({ folder: options.folder, xml: options.xml }));
}

export async function runRecover(options: RecoverCommandOptions, deps: CommandDeps = defaultDeps): Promise<void> {
  const startTime = deps.now();
  const config = deps.loadConfig();
  setVerbose(!!options.verbose || config.verbose);

  const outputPath = path.resolve(options.output);
  const inputs = resolveInputs({
    folder: options.folder,
    screen: options.screen,
    webcam: options.webcam,
    audio: options.audio,
    xml: options.xml,
    output: outputPath,
  });

  await ensureWritable(outputPath, { force: options.force, confirm: deps.confirm });

  const plan = await preparePlan(options, inputs.projectXml);
  if (plan.segments.length === 0) {
    throw new MissingTimelineError('Primary track has no segments to extract');
  }

  configureFfmpeg(config);

  const canvas = await getVideoSize(inputs.sources.screen);
  const webcam = await getVideoSize(inputs.sources.webcam);
  info('FFMPEG', `Screen video size: ${canvas.width}x${canvas.height}`);
  info('FFMPEG', `Webcam video size: ${webcam.width}x${webcam.height}`);
  info('FFMPEG', `Video runtime: ${mmss(await getMediaDuration(inputs.sources.screen))}`);

  let encoder = options.encoder ?? config.encoder;
  if (encoder) {
    info('FFMPEG', `Using encoder: ${encoder}`);
  } else {
    const available = await getAvailableEncoders();
    encoder = selectEncoder(available);
    info('FFMPEG', available.length > 0 ? `Auto-detected encoder: ${encoder}` : `No encoders found, using fallback: ${encoder}`);
  }

  if (options.dryRun) {
    info('EXPORT', `Dry run: would write ${plan.segments.length} slice(s) and join them into ${outputPath}`);
    return;
  }

  const workDir = path.dirname(outputPath);
  const onSigint = () => cancelActiveReconstruction();
  process.once('SIGINT', onSigint);
  try {
    await reconstruct(plan, inputs.sources, {
      outputPath,
      workDir,
      encoder,
      videoBitrate: config.videoBitrate,
      canvas,
      overlayWidth: config.overlayWidth,
      overlayMargin: config.overlayMargin,
      frameRate: plan.frameRate,
      quiet: options.quiet,
      restart: options.restart,
    });
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  if (!options.keepSlices) {
    await cleanupSlices(workDir);
  }
  info('EXPORT', `Completed in ${formatElapsed(deps.now() - startTime)}`);
}
