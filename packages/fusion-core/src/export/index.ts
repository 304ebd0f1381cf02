// ---------------------------------------------------------------------------
// Export: barrel export
// ---------------------------------------------------------------------------

export {
  renderPly,
  exportPly,
  formatFloat32,
  PlyExportError,
  PLY_FILE_NAME,
  type PlyExportFailure,
} from './ply.js';
