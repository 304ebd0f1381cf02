// ---------------------------------------------------------------------------
// Planes: Lockable Pixel Buffers
// ---------------------------------------------------------------------------
// A capture buffer holds one or more image planes that may only be read while
// the buffer is read-locked. Locks are counted and must be balanced;
// `LockScope` pairs every acquisition with a release on all exit paths.
// ---------------------------------------------------------------------------

/** Sample layout of a plane. */
export type PlaneFormat = 'float32' | 'uint8' | 'cbcr8';

/** Bytes per sample for each plane format. */
export const PLANE_ELEMENT_SIZE: Readonly<Record<PlaneFormat, number>> = {
  float32: 4,
  uint8: 1,
  cbcr8: 2,
};

/** One packed image plane inside a byte buffer. */
export interface PlaneDescriptor {
  /** Backing bytes. The plane starts at `byteOffset` within this view. */
  data: Uint8Array;
  byteOffset: number;
  /** Samples per row. */
  width: number;
  /** Number of rows. */
  height: number;
  /** Row stride in bytes; may exceed `width * elementSize` (row padding). */
  bytesPerRow: number;
  format: PlaneFormat;
}

/** Raised when a buffer's planes are touched without holding a read lock. */
export class BufferNotLockedError extends Error {
  constructor() {
    super('Pixel buffer planes are only readable while the buffer is read-locked');
    this.name = 'BufferNotLockedError';
  }
}

/**
 * A frame buffer whose planes are only readable while read-locked.
 *
 * `lockReadOnly()` fails (returns null) when the buffer has no base plane,
 * in which case no lock is held.
 */
export class PixelBuffer {
  private lockCount = 0;

  constructor(private readonly planes: readonly PlaneDescriptor[]) {}

  /** Number of outstanding read locks. */
  get locks(): number {
    return this.lockCount;
  }

  get planeCount(): number {
    return this.planes.length;
  }

  /** Acquire a read lock and return the planes, or null if there is nothing to read. */
  lockReadOnly(): readonly PlaneDescriptor[] | null {
    if (this.planes.length === 0) return null;
    this.lockCount++;
    return this.planes;
  }

  /** Release one read lock. */
  unlock(): void {
    if (this.lockCount === 0) {
      throw new BufferNotLockedError();
    }
    this.lockCount--;
  }

  /** Read a plane. Requires a held lock. */
  plane(index: number): PlaneDescriptor | undefined {
    if (this.lockCount === 0) {
      throw new BufferNotLockedError();
    }
    return this.planes[index];
  }
}

/**
 * Scoped read-lock acquisition.
 *
 *     const scope = new LockScope();
 *     try {
 *       const planes = scope.acquire(buffer);
 *       if (!planes) return;
 *       ...
 *     } finally {
 *       scope.releaseAll();
 *     }
 *
 * Buffers are released in reverse acquisition order.
 */
export class LockScope {
  private readonly held: PixelBuffer[] = [];

  /** Lock `buffer` and remember it for release. Null when the lock could not be taken. */
  acquire(buffer: PixelBuffer): readonly PlaneDescriptor[] | null {
    const planes = buffer.lockReadOnly();
    if (planes === null) return null;
    this.held.push(buffer);
    return planes;
  }

  /** Number of locks this scope still holds. */
  get size(): number {
    return this.held.length;
  }

  releaseAll(): void {
    while (this.held.length > 0) {
      const buffer = this.held.pop();
      buffer?.unlock();
    }
  }
}

/**
 * Run `fn` with `buffer` read-locked. Returns null without calling `fn` when
 * the lock cannot be taken.
 */
export function withReadLock<T>(
  buffer: PixelBuffer,
  fn: (planes: readonly PlaneDescriptor[]) => T,
): T | null {
  const scope = new LockScope();
  try {
    const planes = scope.acquire(buffer);
    if (planes === null) return null;
    return fn(planes);
  } finally {
    scope.releaseAll();
  }
}
