/**
 * Command Handler Utilities
 *
 * WHY THIS FILE EXISTS:
 * - Wraps every command action with timing logs and error handling
 * - Turns failures into a structured error response and an exit code
 *   instead of an unhandled rejection
 */

import type { Command, OptionValues } from 'commander';
import { EXIT_CODES } from '../../types/cli';
import type { CommandErrorResponse, CommandName } from '../../types/cli';
import { RecoveryError } from '../errors';
import { debug, error as logError, isVerbose } from '../utils/log';

export type CommandHandler<T> = (options: T) => Promise<void>;

export function toErrorResponse(err: unknown): CommandErrorResponse {
  if (err instanceof RecoveryError) {
    return { success: false, error: err.message, code: err.code };
  }
  return {
    success: false,
    error: err instanceof Error ? err.message : 'Unknown error occurred',
    code: 'UNEXPECTED',
    details: err instanceof Error ? err.stack : String(err),
  };
}

export function exitCodeFor(err: unknown): number {
  return err instanceof RecoveryError ? EXIT_CODES.RECOVERY_ERROR : EXIT_CODES.UNEXPECTED;
}

/**
 * Adapt a typed handler to a commander action.
 *
 * @example
 * program.command('plan').action(wrapAction<PlanCommandOptions>('plan', runPlan));
 */
export function wrapAction<T extends OptionValues>(
  name: CommandName,
  handler: CommandHandler<T>
): (this: Command) => Promise<void> {
  return async function (this: Command) {
    const startTime = Date.now();
    const options = this.optsWithGlobals<T>();
    debug('CLI', `Running '${name}'`, options);

    try {
      await handler(options);
      debug('CLI', `'${name}' completed successfully (${Date.now() - startTime}ms)`);
    } catch (err) {
      const response = toErrorResponse(err);
      logError('CLI', `'${name}' failed: ${response.error}`);
      if (isVerbose() || response.code === 'UNEXPECTED') {
        console.error(JSON.stringify(response, null, 2));
      }
      process.exitCode = exitCodeFor(err);
    }
  };
}
