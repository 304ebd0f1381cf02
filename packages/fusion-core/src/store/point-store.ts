// ---------------------------------------------------------------------------
// Store: Deduplicated Point Store
// ---------------------------------------------------------------------------

import type { Vertex } from '../types.js';
import type { GridKey } from '../fusion/grid-key.js';

/**
 * Grid key to vertex map. Insert-if-absent only: a stored vertex is never
 * replaced, and entries leave only through `clear()`.
 *
 * Not synchronised on its own; `PointCloud` is the single owner that
 * serialises access.
 */
export class PointStore {
  private readonly vertices = new Map<GridKey, Vertex>();

  has(key: GridKey): boolean {
    return this.vertices.has(key);
  }

  get(key: GridKey): Vertex | undefined {
    return this.vertices.get(key);
  }

  /** Store `vertex` under `key` unless the cell is taken. Returns whether it was stored. */
  insertIfAbsent(key: GridKey, vertex: Vertex): boolean {
    if (this.vertices.has(key)) return false;
    this.vertices.set(key, vertex);
    return true;
  }

  clear(): void {
    this.vertices.clear();
  }

  count(): number {
    return this.vertices.size;
  }

  /** Copy of the current vertices. Vertices are frozen, so sharing them is safe. */
  snapshot(): Vertex[] {
    return Array.from(this.vertices.values());
  }
}

/** Default viewer stride: one point in ten. */
export const DEFAULT_PREVIEW_STRIDE = 10;

/**
 * Thin a snapshot for display: keeps indices `i` with `i % stride === stride - 1`.
 * A stride of 1 keeps everything.
 */
export function selectPreview(vertices: readonly Vertex[], stride: number = DEFAULT_PREVIEW_STRIDE): Vertex[] {
  if (!Number.isInteger(stride) || stride < 1) {
    throw new RangeError(`Preview stride must be a positive integer, got ${stride}`);
  }
  if (stride === 1) return vertices.slice();
  const out: Vertex[] = [];
  for (let i = stride - 1; i < vertices.length; i += stride) {
    out.push(vertices[i]!);
  }
  return out;
}
