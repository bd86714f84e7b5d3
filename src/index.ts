export * from './types/timeline';
export * from './types/media';
export * from './main/errors';
export { parseTimeline, classifyNode, loadProjectDescriptor, findPrimaryTrack } from './main/services/timeline-parser';
export {
  resolveSegments,
  buildExtractionPlan,
  resolveFrameRate,
  parseFrameValue,
  getMediaTiming,
} from './main/services/segment-resolver';
export { renderSegmentTable, serializePlan, writePlanFile, formatTimecode } from './main/services/plan-output';
export { reconstruct, cleanupSlices, cancelActiveReconstruction } from './main/services/reconstruct';
export type { ReconstructOptions, OverlayGeometry } from './main/services/reconstruct';
export { loadConfig } from './main/config';
export type { RecoveryConfig } from './main/config';
