// ---------------------------------------------------------------------------
// Export: ASCII PLY
// ---------------------------------------------------------------------------

import type { Vertex } from '../types.js';

/** Why a snapshot could not be written. */
export type PlyExportFailure = 'non-finite-position' | 'color-out-of-range';

export class PlyExportError extends Error {
  constructor(
    public readonly reason: PlyExportFailure,
    public readonly vertexIndex: number,
  ) {
    super(`Cannot export point cloud: ${reason} at vertex ${vertexIndex}`);
    this.name = 'PlyExportError';
  }
}

/** File name offered to clients downloading an export. */
export const PLY_FILE_NAME = 'exported.ply';

function plyHeader(count: number): string {
  return [
    'ply',
    'format ascii 1.0',
    `element vertex ${count}`,
    'property float x',
    'property float y',
    'property float z',
    'property uchar red',
    'property uchar green',
    'property uchar blue',
    'property uchar alpha',
    'end_header',
  ].join('\n');
}

function colorByte(channel: number, index: number): number {
  if (!(channel >= 0 && channel <= 1)) {
    throw new PlyExportError('color-out-of-range', index);
  }
  return Math.trunc(channel * 255);
}

/**
 * Shortest decimal that reads back as the same 32-bit float, so the text
 * matches the `property float` declarations. `null` when the value does not
 * fit a float32.
 */
export function formatFloat32(value: number): string | null {
  const f = Math.fround(value);
  if (!Number.isFinite(f)) return null;
  for (let precision = 1; precision < 9; precision++) {
    const candidate = Number(f.toPrecision(precision));
    if (Math.fround(candidate) === f) return String(candidate);
  }
  return String(Number(f.toPrecision(9)));
}

/**
 * Render vertices as ASCII PLY text: the header, then one
 * `x y z red green blue alpha` line per vertex, newline-separated with no
 * trailing newline. The header's vertex count is `vertices.length`.
 *
 * @throws PlyExportError if any value cannot be written; nothing is returned
 *         in that case.
 */
export function renderPly(vertices: readonly Vertex[]): string {
  const lines: string[] = [plyHeader(vertices.length)];

  for (let i = 0; i < vertices.length; i++) {
    const { position: p, color: c } = vertices[i]!;
    const x = formatFloat32(p.x);
    const y = formatFloat32(p.y);
    const z = formatFloat32(p.z);
    if (x === null || y === null || z === null) {
      throw new PlyExportError('non-finite-position', i);
    }
    const line = `${x} ${y} ${z} ${colorByte(c.r, i)} ${colorByte(c.g, i)} ${colorByte(c.b, i)} ${colorByte(c.a, i)}`;
    lines.push(line);
  }

  return lines.join('\n');
}

/** `renderPly` encoded as ASCII bytes, the body of a `.ply` download. */
export function exportPly(vertices: readonly Vertex[]): Uint8Array {
  return new TextEncoder().encode(renderPly(vertices));
}
