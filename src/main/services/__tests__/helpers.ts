import type { ParsedTimeline, TimelineNode } from '../../../types/timeline';

type AttrValue = string | number | undefined;

/** Build an element string; undefined attributes are left out */
export function element(tag: string, attrs: Record<string, AttrValue> = {}, inner = ''): string {
  const rendered = Object.entries(attrs)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([k, v]) => ` ${k}="${v}"`)
    .join('');
  return inner ? `<${tag}${rendered}>${inner}</${tag}>` : `<${tag}${rendered}/>`;
}

export function screenClip(mediaStart: AttrValue, mediaDuration: AttrValue, extra: Record<string, AttrValue> = {}): string {
  return element('ScreenVMFile', { ...extra, mediaStart, mediaDuration });
}

export function stitched(
  mediaStart: AttrValue,
  mediaDuration: AttrValue,
  inner = '',
  extra: Record<string, AttrValue> = {}
): string {
  return element('StitchedMedia', { ...extra, mediaStart, mediaDuration }, inner);
}

export interface ProjectOptions {
  /** Frame rate on the <Project> element; null leaves it out */
  projectRate?: string | null;
  /** Frame rate on the primary <GenericTrack> */
  trackRate?: string;
  /** Tracks before the primary one (raw XML) */
  leadingTracks?: string[];
  /** Tracks after the primary one (raw XML) */
  trailingTracks?: string[];
}

/**
 * A minimal project.xml with the children of the primary track's <Medias>.
 */
export function projectXml(medias: string[], opts: ProjectOptions = {}): string {
  const { projectRate = '30', trackRate, leadingTracks = [], trailingTracks = [] } = opts;
  const primary = element('GenericTrack', { editRate: trackRate }, `<Medias>${medias.join('\n')}</Medias>`);
  const tracks = [...leadingTracks, primary, ...trailingTracks].join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<Project_Data>
  ${element('Project', { width: 3840, height: 2160, editRate: projectRate ?? undefined }, `
    <Timeline>
      <GenericMixer>
        <Tracks>
${tracks}
        </Tracks>
      </GenericMixer>
    </Timeline>`)}
</Project_Data>`;
}

/** Build a parsed timeline directly, without XML */
export function timeline(nodes: TimelineNode[], declaredFrameRate: string | undefined = '30'): ParsedTimeline {
  return { trackIndex: 0, declaredFrameRate, nodes, ignoredTags: [] };
}

export function atomic(index: number, mediaStart?: string, mediaDuration?: string): TimelineNode {
  return { kind: 'atomic', index, tag: 'ScreenVMFile', timing: { mediaStart, mediaDuration } };
}

export function composite(index: number, mediaStart?: string, mediaDuration?: string, id?: string): TimelineNode {
  return { kind: 'composite', index, tag: 'StitchedMedia', id, childCount: 0, timing: { mediaStart, mediaDuration } };
}
