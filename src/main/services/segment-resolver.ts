/**
 * Segment Resolver
 *
 * Turns the classified nodes of the primary track into the ordered list of
 * (offset, duration) segments that reproduce the edited output.
 *
 * Both clip kinds are read through the same accessor: a StitchedMedia's
 * container-level mediaStart/mediaDuration are used as declared.
 * Segments keep track order; nothing is merged, deduplicated or sorted.
 */

import type {
  ExtractionPlan,
  NodeRef,
  ParsedTimeline,
  ResolveOptions,
  Segment,
  TimelineNode,
  MediaTiming,
} from '../../types/timeline';
import { InvalidSegmentError, MalformedNodeError, UnknownFrameRateError, describeNode } from '../errors';
import { debug } from '../utils/log';

const DECIMAL = /^-?\d+(\.\d+)?$/;

/**
 * Parse a frame value such as "300", "1032/1" or "30000/1001".
 * Only plain decimals are accepted on either side of the slash; hex, binary
 * and exponent notation are rejected. Returns undefined for anything else.
 */
export function parseFrameValue(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const parts = raw.split('/').map((part) => part.trim());
  if (parts.length > 2 || !parts.every((part) => DECIMAL.test(part))) return undefined;

  const num = Number(parts[0]);
  const den = parts.length === 2 ? Number(parts[1]) : 1;
  if (den === 0) return undefined;
  return num / den;
}

/** Shared accessor for either clip kind */
export function getMediaTiming(node: TimelineNode): Pick<MediaTiming, 'mediaStart' | 'mediaDuration'> {
  return { mediaStart: node.timing.mediaStart, mediaDuration: node.timing.mediaDuration };
}

function toRef(node: TimelineNode): NodeRef {
  return node.id !== undefined ? { index: node.index, tag: node.tag, id: node.id } : { index: node.index, tag: node.tag };
}

/**
 * Decide the frame rate: an explicit override wins, otherwise the value
 * declared in the descriptor. There is no default.
 */
export function resolveFrameRate(declared: string | undefined, override?: number): number {
  if (override !== undefined) {
    if (!Number.isFinite(override) || override <= 0) {
      throw new UnknownFrameRateError(String(override));
    }
    return override;
  }
  if (declared === undefined) {
    throw new UnknownFrameRateError();
  }
  const rate = parseFrameValue(declared);
  if (rate === undefined || rate <= 0) {
    throw new UnknownFrameRateError(declared);
  }
  return rate;
}

function requireFrames(node: TimelineNode, attribute: 'mediaStart' | 'mediaDuration', raw: string | undefined): number {
  if (raw === undefined) {
    throw new MalformedNodeError(toRef(node), attribute);
  }
  const value = parseFrameValue(raw);
  if (value === undefined) {
    throw new MalformedNodeError(toRef(node), attribute, raw);
  }
  return value;
}

export interface ResolvedSegments {
  frameRate: number;
  segments: Segment[];
  skipped: NodeRef[];
}

/**
 * Resolve classified nodes into segments.
 *
 * Throws before returning anything when a node is malformed or has a
 * negative offset. Nodes with a non-positive duration are dropped and the
 * remaining segments are numbered 0..N-1.
 */
export function resolveSegments(timeline: ParsedTimeline, options: ResolveOptions = {}): ResolvedSegments {
  const frameRate = resolveFrameRate(timeline.declaredFrameRate, options.frameRate);

  const segments: Segment[] = [];
  const skipped: NodeRef[] = [];

  for (const node of timeline.nodes) {
    const timing = getMediaTiming(node);
    const mediaStart = requireFrames(node, 'mediaStart', timing.mediaStart);
    const mediaDuration = requireFrames(node, 'mediaDuration', timing.mediaDuration);

    if (mediaStart < 0) {
      throw new InvalidSegmentError(toRef(node), mediaStart);
    }

    if (mediaDuration <= 0) {
      debug('TIMELINE', `Dropping zero-length node ${describeNode(toRef(node))} (mediaDuration=${timing.mediaDuration})`);
      skipped.push(toRef(node));
      continue;
    }

    const timelineStart = parseFrameValue(node.timing.start);
    const segment: Segment = {
      ordinal: segments.length,
      sourceOffsetSeconds: mediaStart / frameRate,
      durationSeconds: mediaDuration / frameRate,
      sourceOffsetFrames: mediaStart,
      durationFrames: mediaDuration,
      kind: node.kind,
      source: toRef(node),
    };
    if (timelineStart !== undefined) segment.timelineStartFrames = timelineStart;
    segments.push(segment);
  }

  return { frameRate, segments, skipped };
}

/**
 * Resolve a parsed timeline into a complete extraction plan.
 */
export function buildExtractionPlan(timeline: ParsedTimeline, options: ResolveOptions = {}): ExtractionPlan {
  const { frameRate, segments, skipped } = resolveSegments(timeline, options);
  const totalDurationSeconds = segments.reduce((acc, s) => acc + s.durationSeconds, 0);
  debug('PLAN', `${segments.length} segment(s) at ${frameRate} fps, ${skipped.length} dropped`);
  return { frameRate, segments, totalDurationSeconds, skipped };
}
