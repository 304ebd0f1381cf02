// ---------------------------------------------------------------------------
// Fusion: barrel export
// ---------------------------------------------------------------------------

export {
  DEFAULT_GRID_DENSITY,
  roundHalfAwayFromZero,
  gridCell,
  cellKey,
  gridKey,
  type GridCell,
  type GridKey,
} from './grid-key.js';

export {
  DEFAULT_FUSION_OPTIONS,
  type CapturedFrame,
  type FusionOptions,
  type FusionResult,
  type RejectionCounts,
  type SkipReason,
} from './frame.js';

export { fuseFrame } from './frame-fuser.js';
