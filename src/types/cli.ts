/**
 * CLI Command Types
 *
 * WHY THIS FILE EXISTS:
 * - Names every command and the options it receives from commander
 * - Defines the structured error response printed when a command fails
 */

export const COMMANDS = {
  /** Parse the project and print (optionally save) the segment plan */
  PLAN: 'plan',

  /** Build the plan, then cut and join the streams into the output video */
  RECOVER: 'recover',
} as const;

export type CommandName = (typeof COMMANDS)[keyof typeof COMMANDS];

/** Options shared by every command */
export type CommonOptions = {
  folder: string;
  xml?: string;
  /** Frame rate override; replaces the one declared in project.xml */
  fps?: number;
  planFile?: string;
  verbose?: boolean;
};

export type PlanCommandOptions = CommonOptions;

export type RecoverCommandOptions = CommonOptions & {
  screen?: string;
  webcam?: string;
  audio?: string;
  output: string;
  quiet?: boolean;
  dryRun?: boolean;
  restart?: boolean;
  encoder?: string;
  force?: boolean;
  keepSlices?: boolean;
};

/**
 * Printed (as JSON, on stderr) when a command fails
 */
export interface CommandErrorResponse {
  success: false;
  error: string;
  /** RecoveryError code, or UNEXPECTED */
  code: string;
  details?: string;
}

export const EXIT_CODES = {
  OK: 0,
  /** A RecoveryError: bad input, bad descriptor, ffmpeg failure */
  RECOVERY_ERROR: 1,
  /** Anything else */
  UNEXPECTED: 2,
} as const;
