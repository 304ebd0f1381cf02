// ---------------------------------------------------------------------------
// Store: Point Cloud Owner
// ---------------------------------------------------------------------------
// Single owner of a PointStore. Every operation is queued on one promise
// chain and runs alone, in submission order, so a read observes the store
// either fully before or fully after any fusion pass or clear.
// ---------------------------------------------------------------------------

import type { Vertex } from '../types.js';
import { fuseFrame } from '../fusion/frame-fuser.js';
import { DEFAULT_FUSION_OPTIONS } from '../fusion/frame.js';
import type { CapturedFrame, FusionOptions, FusionResult } from '../fusion/frame.js';
import { PointStore, selectPreview } from './point-store.js';

export class PointCloud {
  private readonly store = new PointStore();
  private tail: Promise<void> = Promise.resolve();
  private readonly options: FusionOptions;

  constructor(options: Partial<FusionOptions> = {}) {
    this.options = { ...DEFAULT_FUSION_OPTIONS, ...options };
  }

  /** Options every fusion pass runs with. */
  get fusionOptions(): Readonly<FusionOptions> {
    return this.options;
  }

  /**
   * Queue `task` behind everything submitted so far. A failing task rejects
   * only its own promise; later tasks still run.
   */
  private enqueue<T>(task: () => T): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Fuse one frame into the cloud. */
  process(frame: CapturedFrame): Promise<FusionResult> {
    return this.enqueue(() => fuseFrame(frame, this.store, this.options));
  }

  /** Remove every vertex. The next pass starts from an empty cloud. */
  clear(): Promise<void> {
    return this.enqueue(() => this.store.clear());
  }

  count(): Promise<number> {
    return this.enqueue(() => this.store.count());
  }

  /** Consistent copy of all vertices; later mutations do not affect it. */
  snapshot(): Promise<Vertex[]> {
    return this.enqueue(() => this.store.snapshot());
  }

  /** Every `stride`-th vertex of a consistent snapshot. */
  preview(stride: number): Promise<Vertex[]> {
    return this.enqueue(() => selectPreview(this.store.snapshot(), stride));
  }
}
