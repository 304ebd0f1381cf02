// ---------------------------------------------------------------------------
// Store: barrel export
// ---------------------------------------------------------------------------

export { PointStore, selectPreview, DEFAULT_PREVIEW_STRIDE } from './point-store.js';
export { PointCloud } from './point-cloud.js';
