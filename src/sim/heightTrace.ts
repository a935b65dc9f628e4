/** One recorded tick: sim time and the sphere's state after the step. */
export type HeightSample = {
  t: number;
  height: number;
  velocity: number;
};

export type TraceSummary = {
  samples: number;
  minHeight: number;
  maxHeight: number;
  /** Mean height over the most recent samples. */
  settledHeight: number;
  finalVelocity: number;
};

/**
 * Fixed-capacity ring of the most recent ticks. Once full, each push
 * overwrites the oldest sample.
 */
export class HeightTrace {
  readonly capacity: number;
  private readonly ring: HeightSample[] = [];
  private next = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`HeightTrace capacity must be a positive integer (got ${capacity})`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.ring.length;
  }

  push(sample: HeightSample): void {
    if (this.ring.length < this.capacity) {
      this.ring.push(sample);
    } else {
      this.ring[this.next] = sample;
    }
    this.next = (this.next + 1) % this.capacity;
  }

  /** Retained samples, oldest first. */
  samples(): HeightSample[] {
    if (this.ring.length < this.capacity) return this.ring.slice();
    return this.ring.slice(this.next).concat(this.ring.slice(0, this.next));
  }

  latest(): HeightSample | null {
    if (this.ring.length === 0) return null;
    return this.ring[(this.next - 1 + this.capacity) % this.capacity];
  }

  /**
   * Min/max over everything retained; settled height averages the last
   * `settleSamples` heights. Null when nothing has been recorded.
   */
  summary(settleSamples: number): TraceSummary | null {
    const ordered = this.samples();
    const last = ordered[ordered.length - 1];
    if (last === undefined) return null;

    let minHeight = Infinity;
    let maxHeight = -Infinity;
    for (const s of ordered) {
      if (s.height < minHeight) minHeight = s.height;
      if (s.height > maxHeight) maxHeight = s.height;
    }

    const tail = ordered.slice(-Math.max(1, Math.floor(settleSamples)));
    const settledHeight = tail.reduce((sum, s) => sum + s.height, 0) / tail.length;

    return {
      samples: ordered.length,
      minHeight,
      maxHeight,
      settledHeight,
      finalVelocity: last.velocity,
    };
  }
}
