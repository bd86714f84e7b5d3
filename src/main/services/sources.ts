import * as fs from 'fs';
import * as path from 'path';
import type { MediaSources } from '../../types/media';
import { MissingInputError, OutputExistsError } from '../errors';

/** Extensions the demuxer gives each stream */
export const SOURCE_EXTENSIONS = {
  screen: '.mkv',
  webcam: '.mp4',
  audio: '.aac',
  project: '.xml',
} as const;

export interface SourceSelection {
  folder: string;
  screen?: string;
  webcam?: string;
  audio?: string;
  xml?: string;
  /** The output is excluded from discovery (it may itself be an .mp4) */
  output?: string;
}

export interface ResolvedInputs {
  sources: MediaSources;
  projectXml: string;
}

/**
 * The single file in `folder` with the given extension. Undefined when there
 * is none, or more than one and the choice would be a guess.
 */
export function findDefaultFile(folder: string, extension: string, exclude: string[] = []): string | undefined {
  if (!fs.existsSync(folder)) return undefined;
  const excluded = new Set(exclude.map((p) => path.resolve(p)));
  const files = fs
    .readdirSync(folder, { withFileTypes: true })
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === extension)
    .map((entry) => path.join(folder, entry.name))
    .filter((p) => !excluded.has(path.resolve(p)));
  return files.length === 1 ? files[0] : undefined;
}

function pick(selection: SourceSelection, explicit: string | undefined, input: keyof typeof SOURCE_EXTENSIONS): string {
  if (explicit) {
    const resolved = path.isAbsolute(explicit) ? explicit : path.join(selection.folder, explicit);
    if (!fs.existsSync(resolved)) throw new MissingInputError(input, selection.folder, resolved);
    return resolved;
  }
  const exclude = selection.output ? [selection.output] : [];
  const found = findDefaultFile(selection.folder, SOURCE_EXTENSIONS[input], exclude);
  if (!found) throw new MissingInputError(input, selection.folder);
  return found;
}

/** Only the project descriptor, for commands that never touch media */
export function resolveProjectXml(selection: SourceSelection): string {
  return pick(selection, selection.xml, 'project');
}

/**
 * Explicit paths (relative ones are taken from `folder`) or, failing that,
 * the one file of the matching extension in `folder`.
 */
export function resolveInputs(selection: SourceSelection): ResolvedInputs {
  return {
    sources: {
      screen: pick(selection, selection.screen, 'screen'),
      webcam: pick(selection, selection.webcam, 'webcam'),
      audio: pick(selection, selection.audio, 'audio'),
    },
    projectXml: resolveProjectXml(selection),
  };
}

/**
 * Make sure writing `outputPath` is allowed: it does not exist, `force` is
 * set, or `confirm` agrees to overwrite it.
 */
export async function ensureWritable(
  outputPath: string,
  opts: { force?: boolean; confirm?: (question: string) => Promise<boolean> } = {}
): Promise<void> {
  if (!fs.existsSync(outputPath) || opts.force) return;
  const ok = opts.confirm ? await opts.confirm(`File '${outputPath}' already exists. Overwrite? (y/n): `) : false;
  if (!ok) throw new OutputExistsError(outputPath);
}
