/**
 * Timeline Parser
 *
 * WHY THIS FILE EXISTS:
 * - Locates the primary track inside a recording's project.xml
 * - Classifies the track's top-level children into atomic and composite clips
 *
 * Only the direct children of the track's <Medias> element are examined.
 * A StitchedMedia already carries the aggregate timing of the cuts it holds,
 * so its children are counted but never read.
 */

import * as fs from 'fs';
import { MissingTimelineError } from '../errors';
import { NODE_TAGS } from '../../types/timeline';
import type { ParsedTimeline, TimelineNode, MediaTiming } from '../../types/timeline';
import { attr, ancestors, childElements, childrenByTag, firstChildByTag, parseXml } from '../utils/xml';
import { debug } from '../utils/log';

const FRAME_RATE_ATTRIBUTES = ['editRate', 'frameRate'] as const;

export interface PrimaryTrack {
  track: Element;
  medias: Element;
  trackIndex: number;
}

/**
 * Find the primary track: the first GenericTrack under
 * Timeline > GenericMixer > Tracks that has a Medias child.
 */
export function findPrimaryTrack(doc: Document): PrimaryTrack {
  const timelines = doc.getElementsByTagName('Timeline');
  for (let t = 0; t < timelines.length; t++) {
    const timeline = timelines.item(t);
    if (!timeline) continue;
    for (const mixer of childrenByTag(timeline, 'GenericMixer')) {
      for (const tracks of childrenByTag(mixer, 'Tracks')) {
        const candidates = childrenByTag(tracks, 'GenericTrack');
        for (let i = 0; i < candidates.length; i++) {
          const medias = firstChildByTag(candidates[i], 'Medias');
          if (medias) {
            return { track: candidates[i], medias, trackIndex: i };
          }
        }
      }
    }
  }
  throw new MissingTimelineError();
}

/**
 * Frame rate declared on the track itself or the nearest enclosing element.
 * Returns the raw attribute text; validation happens during resolution.
 */
export function findDeclaredFrameRate(track: Element): string | undefined {
  for (const el of [track, ...ancestors(track)]) {
    for (const name of FRAME_RATE_ATTRIBUTES) {
      const value = attr(el, name);
      if (value !== undefined) return value;
    }
  }
  return undefined;
}

function readTiming(el: Element): MediaTiming {
  return {
    mediaStart: attr(el, 'mediaStart'),
    mediaDuration: attr(el, 'mediaDuration'),
    start: attr(el, 'start'),
  };
}

/**
 * Classify a single track child. Returns null for children that are not
 * segment sources (markers, callouts, captions, audio companions...).
 */
export function classifyNode(el: Element, index: number): TimelineNode | null {
  const base = { index, tag: el.tagName, id: attr(el, 'id'), timing: readTiming(el) };
  switch (el.tagName) {
    case NODE_TAGS.ATOMIC:
      return { ...base, kind: 'atomic' };
    case NODE_TAGS.COMPOSITE:
      return { ...base, kind: 'composite', childCount: childElements(el).length };
    default:
      return null;
  }
}

/**
 * Parse a project descriptor (raw XML text or an already parsed Document)
 * into the classified nodes of its primary track.
 *
 * @throws DescriptorParseError when the text is not XML
 * @throws MissingTimelineError when no primary track exists
 */
export function parseTimeline(input: string | Document): ParsedTimeline {
  const doc = typeof input === 'string' ? parseXml(input) : input;
  const { track, medias, trackIndex } = findPrimaryTrack(doc);

  const nodes: TimelineNode[] = [];
  const ignoredTags: string[] = [];

  childElements(medias).forEach((el, index) => {
    const node = classifyNode(el, index);
    if (node) {
      nodes.push(node);
    } else {
      ignoredTags.push(el.tagName);
    }
  });

  debug('TIMELINE', `Primary track #${trackIndex}: ${nodes.length} clip(s), ${ignoredTags.length} ignored child(ren)`);

  return {
    trackIndex,
    declaredFrameRate: findDeclaredFrameRate(track),
    nodes,
    ignoredTags,
  };
}

/**
 * Read and parse a project.xml file from disk.
 */
export async function loadProjectDescriptor(filePath: string): Promise<ParsedTimeline> {
  const xml = await fs.promises.readFile(filePath, 'utf8');
  return parseTimeline(xml);
}
