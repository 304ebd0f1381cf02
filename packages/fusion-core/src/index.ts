// ---------------------------------------------------------------------------
// @depthfuse/fusion-core: Depth Frame to Point Cloud Fusion
// ---------------------------------------------------------------------------

// Infrastructure: vector/matrix utilities, vertices, orientations
export * from './types.js';

// Strided plane access and buffer locking
export * from './planes/index.js';

// YCbCr decoding
export * from './color/index.js';

// Camera-to-world transforms
export * from './camera/index.js';

// Grid keys and the per-frame fusion pass
export * from './fusion/index.js';

// Deduplicated storage and its serialising owner
export * from './store/index.js';

// PLY output
export * from './export/index.js';
