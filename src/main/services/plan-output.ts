/**
 * Human- and machine-readable views of an extraction plan.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ExtractionPlan } from '../../types/timeline';

export const PLAN_FILE_VERSION = 1;

/** Frames to `MM:SS`, seconds rounded to the nearest whole second */
export function formatTimecode(frames: number | undefined, frameRate: number): string {
  if (frames === undefined) return '--:--';
  const total = Math.round(frames / frameRate);
  const minutes = Math.floor(total / 60);
  const seconds = total - minutes * 60;
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(minutes)}:${pad(seconds)}`;
}

function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
  return [line(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(line)];
}

/**
 * Segment table followed by the total duration, e.g.
 *
 *     timelineStart  In point  Out point  duration  type
 *     -------------  --------  ---------  --------  ------------
 *     00:00          00:00     00:10      00:10     ScreenVMFile
 *     Total duration: 00:10
 */
export function renderSegmentTable(plan: ExtractionPlan): string {
  const fps = plan.frameRate;
  const rows = plan.segments.map((s) => [
    formatTimecode(s.timelineStartFrames, fps),
    formatTimecode(s.sourceOffsetFrames, fps),
    formatTimecode(s.sourceOffsetFrames + s.durationFrames, fps),
    formatTimecode(s.durationFrames, fps),
    s.source.tag,
  ]);
  const totalFrames = plan.segments.reduce((acc, s) => acc + s.durationFrames, 0);
  const lines = renderTable(['timelineStart', 'In point', 'Out point', 'duration', 'type'], rows);
  lines.push(`Total duration: ${formatTimecode(totalFrames, fps)}`);
  return lines.join('\n');
}

export function serializePlan(plan: ExtractionPlan): string {
  const doc = {
    version: PLAN_FILE_VERSION,
    frameRate: plan.frameRate,
    totalDurationSeconds: plan.totalDurationSeconds,
    skipped: plan.skipped,
    segments: plan.segments,
  };
  return `${JSON.stringify(doc, null, 2)}\n`;
}

export async function writePlanFile(plan: ExtractionPlan, filePath: string): Promise<void> {
  const outDir = path.dirname(filePath);
  if (!fs.existsSync(outDir)) {
    fs.mkdirSync(outDir, { recursive: true });
  }
  await fs.promises.writeFile(filePath, serializePlan(plan), 'utf8');
}
