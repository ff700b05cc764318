import type { SpeedStatistics } from '@simtrace/domain';

/**
 * Single-pass mean/variance (Welford), with min/max. `merge` folds two
 * accumulators together (Chan et al.), so partial results combine without
 * revisiting samples.
 */
export class OnlineStats {
  private n = 0;
  private mean = 0;
  private m2 = 0;
  private min = Number.POSITIVE_INFINITY;
  private max = Number.NEGATIVE_INFINITY;

  get count(): number {
    return this.n;
  }

  push(value: number): void {
    this.n++;
    const delta = value - this.mean;
    this.mean += delta / this.n;
    this.m2 += delta * (value - this.mean);
    if (value < this.min) this.min = value;
    if (value > this.max) this.max = value;
  }

  merge(other: OnlineStats): void {
    if (other.n === 0) return;
    if (this.n === 0) {
      this.n = other.n;
      this.mean = other.mean;
      this.m2 = other.m2;
      this.min = other.min;
      this.max = other.max;
      return;
    }
    const total = this.n + other.n;
    const delta = other.mean - this.mean;
    this.mean += (delta * other.n) / total;
    this.m2 += other.m2 + (delta * delta * this.n * other.n) / total;
    this.n = total;
    this.min = Math.min(this.min, other.min);
    this.max = Math.max(this.max, other.max);
  }

  /** Null when nothing was pushed: "no data", not zero. */
  summary(): SpeedStatistics | null {
    if (this.n === 0) return null;
    const variance = this.m2 / this.n;
    return {
      count: this.n,
      min: this.min,
      max: this.max,
      mean: this.mean,
      variance,
      stdDev: Math.sqrt(variance),
    };
  }
}
