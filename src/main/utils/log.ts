/**
 * Console logging with subsystem tags, e.g. `[TIMELINE] Parsed 12 nodes`.
 * Debug lines are dropped unless verbose mode is on.
 */

export type LogTag = 'TIMELINE' | 'PLAN' | 'FFMPEG' | 'EXPORT' | 'CLI';

let verbose = false;

export function setVerbose(on: boolean): void {
  verbose = on;
}

export function isVerbose(): boolean {
  return verbose;
}

export function debug(tag: LogTag, ...args: unknown[]): void {
  if (!verbose) return;
  console.debug(`[${tag}]`, ...args);
}

export function info(tag: LogTag, ...args: unknown[]): void {
  console.log(`[${tag}]`, ...args);
}

export function warn(tag: LogTag, ...args: unknown[]): void {
  console.warn(`[${tag}]`, ...args);
}

export function error(tag: LogTag, ...args: unknown[]): void {
  console.error(`[${tag}]`, ...args);
}
