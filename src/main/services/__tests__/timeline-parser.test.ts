import { describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseTimeline, loadProjectDescriptor, findDeclaredFrameRate, findPrimaryTrack } from '../timeline-parser';
import { DescriptorParseError, MissingTimelineError } from '../../errors';
import { parseXml } from '../../utils/xml';
import { element, projectXml, screenClip, stitched } from './helpers';

describe('parseTimeline - classification', () => {
  it('classifies screen clips as atomic and stitched media as composite', () => {
    const parsed = parseTimeline(projectXml([screenClip(0, 300), stitched(450, 150)]));

    expect(parsed.nodes.map((n) => n.kind)).toEqual(['atomic', 'composite']);
    expect(parsed.nodes.map((n) => n.tag)).toEqual(['ScreenVMFile', 'StitchedMedia']);
    expect(parsed.nodes[1].timing).toEqual({ mediaStart: '450', mediaDuration: '150', start: undefined });
  });

  it('skips children that are not segment sources and keeps their tags', () => {
    const parsed = parseTimeline(
      projectXml([element('Callout', { start: 0 }), screenClip(0, 300), element('AMFile', { mediaStart: 0, mediaDuration: 300 }), stitched(450, 150)])
    );

    expect(parsed.nodes).toHaveLength(2);
    expect(parsed.ignoredTags).toEqual(['Callout', 'AMFile']);
  });

  it('records each node at its position among all track children', () => {
    const parsed = parseTimeline(projectXml([element('Callout'), screenClip(0, 30), element('Marker'), stitched(60, 30)]));

    expect(parsed.nodes.map((n) => n.index)).toEqual([1, 3]);
  });

  it('reads id and timeline start attributes', () => {
    const parsed = parseTimeline(projectXml([screenClip('1032/1', '90/1', { id: 17, start: '300/1' })]));

    expect(parsed.nodes[0]).toMatchObject({
      id: '17',
      timing: { mediaStart: '1032/1', mediaDuration: '90/1', start: '300/1' },
    });
  });

  it('keeps the declared timing of a composite and only counts its children', () => {
    const inner = `${screenClip(10, 20)}${screenClip(100, 30)}`;
    const parsed = parseTimeline(projectXml([stitched(450, 150, inner)]));

    expect(parsed.nodes).toHaveLength(1);
    expect(parsed.nodes[0]).toMatchObject({
      kind: 'composite',
      childCount: 2,
      timing: { mediaStart: '450', mediaDuration: '150' },
    });
  });

  it('carries missing attributes as undefined instead of failing', () => {
    const parsed = parseTimeline(projectXml([screenClip(undefined, 300)]));

    expect(parsed.nodes[0].timing.mediaStart).toBeUndefined();
    expect(parsed.nodes[0].timing.mediaDuration).toBe('300');
  });

  it('accepts an already parsed document', () => {
    const doc = parseXml(projectXml([screenClip(0, 300)]));

    expect(parseTimeline(doc).nodes).toHaveLength(1);
  });
});

describe('parseTimeline - primary track', () => {
  it('uses only the first track that has media', () => {
    const second = element('GenericTrack', {}, `<Medias>${screenClip(900, 30)}</Medias>`);
    const parsed = parseTimeline(projectXml([screenClip(0, 300)], { trailingTracks: [second] }));

    expect(parsed.trackIndex).toBe(0);
    expect(parsed.nodes).toHaveLength(1);
    expect(parsed.nodes[0].timing.mediaStart).toBe('0');
  });

  it('passes over tracks without a Medias element', () => {
    const parsed = parseTimeline(projectXml([screenClip(0, 300)], { leadingTracks: ['<GenericTrack/>'] }));

    expect(parsed.trackIndex).toBe(1);
    expect(parsed.nodes).toHaveLength(1);
  });

  it('returns no nodes for an empty primary track', () => {
    const parsed = parseTimeline(projectXml([]));

    expect(parsed.nodes).toEqual([]);
  });

  it('fails with MissingTimelineError when there is no track', () => {
    const xml = '<Project_Data><Project editRate="30"><Timeline><GenericMixer><Tracks/></GenericMixer></Timeline></Project></Project_Data>';

    expect(() => parseTimeline(xml)).toThrow(MissingTimelineError);
  });

  it('ignores GenericTrack elements outside Timeline > GenericMixer > Tracks', () => {
    const xml = `<Project_Data><Library><GenericTrack><Medias>${screenClip(0, 30)}</Medias></GenericTrack></Library></Project_Data>`;

    expect(() => parseTimeline(xml)).toThrow(MissingTimelineError);
  });

  it('fails with DescriptorParseError for an empty document', () => {
    expect(() => parseTimeline('')).toThrow(DescriptorParseError);
  });

  it('fails with DescriptorParseError for a repeated attribute', () => {
    const xml = projectXml(['<ScreenVMFile mediaStart="0" mediaStart="30" mediaDuration="300"/>']);

    expect(() => parseTimeline(xml)).toThrow(DescriptorParseError);
  });

  it('fails with DescriptorParseError when an end tag does not match', () => {
    const xml = '<Project editRate="30"><Timeline><GenericMixer><Tracks><GenericTrack><Medias></GenericTrack></Tracks></GenericMixer></Timeline></Project>';

    expect(() => parseTimeline(xml)).toThrow(DescriptorParseError);
  });
});

describe('findDeclaredFrameRate', () => {
  it('reads the frame rate from the project element', () => {
    const { track } = findPrimaryTrack(parseXml(projectXml([screenClip(0, 30)], { projectRate: '30' })));

    expect(findDeclaredFrameRate(track)).toBe('30');
  });

  it('prefers the track over enclosing elements', () => {
    const { track } = findPrimaryTrack(parseXml(projectXml([screenClip(0, 30)], { projectRate: '30', trackRate: '25' })));

    expect(findDeclaredFrameRate(track)).toBe('25');
  });

  it('accepts the frameRate attribute name', () => {
    const xml = `<Project frameRate="30000/1001"><Timeline><GenericMixer><Tracks><GenericTrack><Medias/></GenericTrack></Tracks></GenericMixer></Timeline></Project>`;

    expect(parseTimeline(xml).declaredFrameRate).toBe('30000/1001');
  });

  it('is undefined when nothing declares a frame rate', () => {
    expect(parseTimeline(projectXml([screenClip(0, 30)], { projectRate: null })).declaredFrameRate).toBeUndefined();
  });
});

describe('loadProjectDescriptor', () => {
  it('reads and parses a project.xml file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'trec-parser-'));
    const file = path.join(dir, 'project.xml');
    fs.writeFileSync(file, projectXml([screenClip(0, 300), stitched(450, 150)]), 'utf8');

    const parsed = await loadProjectDescriptor(file);

    expect(parsed.nodes).toHaveLength(2);
    expect(parsed.declaredFrameRate).toBe('30');
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
