import type { FleetTimeSeriesBucket } from '@simtrace/domain';

/** Absorbs float error in `ts / width` for widths such as 0.1 s. */
const INDEX_EPSILON = 1e-9;

interface OpenBucket {
  index: number;
  samples: number;
  speedSum: number;
  vehicles: Set<string>;
  chargingStarts: number;
}

/**
 * Fixed-width time buckets over the correlated stream. Input arrives in time
 * order, so only the current bucket is open; gaps are filled with empty buckets.
 */
export class FleetTimeSeries {
  private readonly closed: FleetTimeSeriesBucket[] = [];
  private current: OpenBucket | null = null;

  constructor(private readonly bucketSec: number) {
    if (!(bucketSec > 0)) throw new RangeError(`bucket width must be positive, got ${bucketSec}`);
  }

  recordSample(ts: number, vehicleId: string, speed: number): void {
    const bucket = this.bucketAt(ts);
    bucket.samples++;
    bucket.speedSum += speed;
    bucket.vehicles.add(vehicleId);
  }

  recordChargingStart(ts: number): void {
    this.bucketAt(ts).chargingStarts++;
  }

  finish(): FleetTimeSeriesBucket[] {
    if (this.current) {
      this.closed.push(this.toBucket(this.current));
      this.current = null;
    }
    return [...this.closed];
  }

  private bucketAt(ts: number): OpenBucket {
    const index = Math.floor(ts / this.bucketSec + INDEX_EPSILON);
    if (this.current && this.current.index === index) return this.current;

    if (this.current) {
      this.closed.push(this.toBucket(this.current));
      for (let gap = this.current.index + 1; gap < index; gap++) {
        this.closed.push(this.toBucket(emptyBucket(gap)));
      }
    }
    this.current = emptyBucket(index);
    return this.current;
  }

  private toBucket(open: OpenBucket): FleetTimeSeriesBucket {
    return {
      bucketStartTs: open.index * this.bucketSec,
      sampleCount: open.samples,
      activeVehicles: open.vehicles.size,
      meanSpeed: open.samples > 0 ? open.speedSum / open.samples : null,
      chargingSessionsStarted: open.chargingStarts,
    };
  }
}

function emptyBucket(index: number): OpenBucket {
  return { index, samples: 0, speedSum: 0, vehicles: new Set(), chargingStarts: 0 };
}
