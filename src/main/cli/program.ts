import { Command, InvalidArgumentError } from 'commander';
import { COMMANDS } from '../../types/cli';
import type { PlanCommandOptions, RecoverCommandOptions } from '../../types/cli';
import { wrapAction } from './handlers';
import type { CommandHandler } from './handlers';
import { runPlan, runRecover } from './commands';
import { parseFrameValue } from '../services/segment-resolver';

export interface CommandHandlers {
  plan: CommandHandler<PlanCommandOptions>;
  recover: CommandHandler<RecoverCommandOptions>;
}

export const DEFAULT_OUTPUT = 'recovered_video.mp4';

/** Commander parser for `--fps`: a positive number, rationals allowed */
export function parseFrameRateOption(value: string): number {
  const rate = parseFrameValue(value);
  if (rate === undefined || rate <= 0) {
    throw new InvalidArgumentError('Frame rate must be a positive number such as 30 or 30000/1001.');
  }
  return rate;
}

/**
 * Build the CLI. Handlers are injectable so the argument wiring can be
 * exercised without touching media.
 */
export function buildProgram(handlers: CommandHandlers = { plan: runPlan, recover: runRecover }): Command {
  const program = new Command();
  program
    .name('trec-recover')
    .description('Rebuild the edited video of a screen-recording project from its project.xml and demuxed streams.')
    .option('-f, --folder <dir>', 'folder containing the media files', '.')
    .option('-x, --xml <file>', 'project descriptor (default: the only .xml in the folder)')
    .option('--fps <rate>', 'frame rate override (default: declared in project.xml)', parseFrameRateOption)
    .option('-p, --plan-file <file>', 'also write the segment plan as JSON')
    .option('--verbose', 'print debug output');

  program
    .command(COMMANDS.PLAN, { isDefault: true })
    .description('print the segment plan reconstructed from the timeline')
    .action(wrapAction<PlanCommandOptions>(COMMANDS.PLAN, handlers.plan));

  program
    .command(COMMANDS.RECOVER)
    .description('cut the plan out of the screen, webcam and audio streams and join it')
    .option('-s, --screen <file>', 'screen recording (.mkv)')
    .option('-w, --webcam <file>', 'webcam recording (.mp4)')
    .option('-a, --audio <file>', 'audio (.aac)')
    .option('-o, --output <file>', 'output video', DEFAULT_OUTPUT)
    .option('-q, --quiet', 'suppress ffmpeg output (only show errors)')
    .option('-n, --dry-run', 'show what would be done without executing')
    .option('-r, --restart', 'reuse existing slice files and only concatenate')
    .option('-e, --encoder <name>', 'video encoder (auto-detect if not specified)')
    .option('--force', 'overwrite the output without asking')
    .option('--keep-slices', 'leave slice files in place after joining')
    .action(wrapAction<RecoverCommandOptions>(COMMANDS.RECOVER, handlers.recover));

  return program;
}
