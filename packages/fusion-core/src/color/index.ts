// ---------------------------------------------------------------------------
// Color: barrel export
// ---------------------------------------------------------------------------

export { decodeYCbCr, sampleColor } from './ycbcr.js';
