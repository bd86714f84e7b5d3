/**
 * Recovery Errors
 *
 * Every failure the tool can report on purpose is a RecoveryError with a
 * stable `code`. Anything else reaching the CLI is treated as unexpected.
 */

import type { NodeRef } from '../types/timeline';

export type RecoveryErrorCode =
  | 'DESCRIPTOR_PARSE'
  | 'MISSING_TIMELINE'
  | 'UNKNOWN_FRAME_RATE'
  | 'MALFORMED_NODE'
  | 'INVALID_SEGMENT'
  | 'INVALID_CONFIG'
  | 'MISSING_INPUT'
  | 'OUTPUT_EXISTS'
  | 'FFMPEG_FAILED'
  | 'CANCELLED';

export class RecoveryError extends Error {
  readonly code: RecoveryErrorCode;

  constructor(code: RecoveryErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Formats a node for messages: `#3 <StitchedMedia id="12">` */
export function describeNode(node: NodeRef): string {
  const id = node.id !== undefined ? ` id="${node.id}"` : '';
  return `#${node.index} <${node.tag}${id}>`;
}

export class DescriptorParseError extends RecoveryError {
  constructor(details: string) {
    super('DESCRIPTOR_PARSE', `Project descriptor is not valid XML: ${details}`);
  }
}

export class MissingTimelineError extends RecoveryError {
  constructor(message = 'Project descriptor has no primary track (Timeline > GenericMixer > Tracks > GenericTrack with Medias)') {
    super('MISSING_TIMELINE', message);
  }
}

export class UnknownFrameRateError extends RecoveryError {
  readonly declared?: string;

  constructor(declared?: string) {
    super(
      'UNKNOWN_FRAME_RATE',
      declared === undefined
        ? 'No frame rate is declared on the primary track or any enclosing element (editRate/frameRate)'
        : `Declared frame rate "${declared}" is not a positive number`
    );
    this.declared = declared;
  }
}

export class MalformedNodeError extends RecoveryError {
  readonly node: NodeRef;
  readonly attribute: string;

  constructor(node: NodeRef, attribute: string, value?: string) {
    super(
      'MALFORMED_NODE',
      value === undefined
        ? `Node ${describeNode(node)} is missing required attribute "${attribute}"`
        : `Node ${describeNode(node)} has non-numeric ${attribute}="${value}"`
    );
    this.node = node;
    this.attribute = attribute;
  }
}

export class InvalidSegmentError extends RecoveryError {
  readonly node: NodeRef;

  constructor(node: NodeRef, mediaStart: number) {
    super('INVALID_SEGMENT', `Node ${describeNode(node)} has negative mediaStart (${mediaStart})`);
    this.node = node;
  }
}

export class ConfigError extends RecoveryError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

export class MissingInputError extends RecoveryError {
  readonly input: string;

  constructor(input: string, folder: string, givenPath?: string) {
    super(
      'MISSING_INPUT',
      givenPath !== undefined
        ? `The ${input} file '${givenPath}' does not exist`
        : `No ${input} file given and none could be found in ${folder}`
    );
    this.input = input;
  }
}

export class OutputExistsError extends RecoveryError {
  constructor(outputPath: string) {
    super('OUTPUT_EXISTS', `Output '${outputPath}' already exists; not overwriting`);
  }
}

export class FfmpegError extends RecoveryError {
  readonly stage: string;

  constructor(stage: string, details: string) {
    super('FFMPEG_FAILED', `FFmpeg failed during ${stage}: ${details}`);
    this.stage = stage;
  }
}

export class CancelledError extends RecoveryError {
  constructor() {
    super('CANCELLED', 'Reconstruction cancelled');
  }
}
