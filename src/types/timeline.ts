/**
 * Timeline Types and Interfaces
 *
 * WHY THIS FILE EXISTS:
 * - Defines the data structures read out of a recording's project.xml
 * - Describes the resolved segment plan handed to the reconstruction stage
 */

/**
 * Element tags of the track children that reference source media.
 * Every other top-level child (callouts, markers, captions, audio companions)
 * is not a segment source.
 */
export const NODE_TAGS = {
  /** Direct screen clip: a span of the original recording */
  ATOMIC: 'ScreenVMFile',
  /** Stitched media: the aggregate of several internal cuts */
  COMPOSITE: 'StitchedMedia',
} as const;

export type TimelineNodeKind = 'atomic' | 'composite';

/**
 * Raw timing attributes exactly as declared on the element.
 * Values are frame counts, possibly written as rationals ("1032/1").
 * Absent attributes stay undefined; the resolver decides what that means.
 */
export interface MediaTiming {
  mediaStart?: string;
  mediaDuration?: string;
  /** Position on the timeline (informational only) */
  start?: string;
}

interface TimelineNodeBase {
  /** Position among the track's direct children (0-based, before filtering) */
  index: number;

  /** Element tag, e.g. "ScreenVMFile" */
  tag: string;

  /** The element's `id` attribute when present */
  id?: string;

  timing: MediaTiming;
}

export interface AtomicClip extends TimelineNodeBase {
  kind: 'atomic';
}

/**
 * A stitched container. Its own timing is the net effect of the edits inside
 * it; `childCount` is informational and nothing reads the children's timing.
 */
export interface CompositeClip extends TimelineNodeBase {
  kind: 'composite';
  childCount: number;
}

export type TimelineNode = AtomicClip | CompositeClip;

/** Identifies a node in diagnostics */
export interface NodeRef {
  index: number;
  tag: string;
  id?: string;
}

/**
 * Result of the parse/classify pass over the primary track.
 */
export interface ParsedTimeline {
  /** Index of the primary GenericTrack among the mixer's tracks */
  trackIndex: number;

  /** Frame rate attribute found on the track or its nearest ancestor */
  declaredFrameRate?: string;

  /** Classified segment sources in playback order */
  nodes: TimelineNode[];

  /** Tags of top-level children that are not segment sources */
  ignoredTags: string[];
}

/**
 * Segment
 *
 * One extraction instruction in final playback order. Seconds are derived
 * from the frame values with the plan's frame rate.
 */
export interface Segment {
  /** Contiguous 0..N-1 after degenerate nodes are dropped */
  ordinal: number;

  sourceOffsetSeconds: number;
  durationSeconds: number;

  sourceOffsetFrames: number;
  durationFrames: number;

  /** Timeline position in frames, when the element declares one */
  timelineStartFrames?: number;

  kind: TimelineNodeKind;

  /** The node this segment was resolved from */
  source: NodeRef;
}

/**
 * ExtractionPlan
 *
 * The complete, validated output of resolution.
 */
export interface ExtractionPlan {
  frameRate: number;
  segments: Segment[];
  totalDurationSeconds: number;
  /** Degenerate (non-positive duration) nodes that were dropped */
  skipped: NodeRef[];
}

export interface ResolveOptions {
  /** Replaces the frame rate declared in the descriptor */
  frameRate?: number;
}
