import {
  StreamCorruptError,
  recordOrderKey,
  type BatteryState,
  type ChargingEvent,
  type StreamKind,
  type TelemetryRecordByStream,
  type TripSummary,
  type VehicleSample,
} from '@simtrace/domain';
import type { RunContext } from '../pipeline/run-context.js';
import { MinHeap } from './min-heap.js';

// ---------------------------------------------------------------------------
// Correlated output
// ---------------------------------------------------------------------------

export type CorrelatedRecord =
  | { readonly type: 'sample'; readonly at: number; readonly record: VehicleSample }
  | { readonly type: 'battery'; readonly at: number; readonly record: BatteryState; readonly correlated: boolean }
  | { readonly type: 'trip'; readonly at: number; readonly record: TripSummary; readonly correlated: boolean }
  | {
      readonly type: 'charging_start';
      readonly at: number;
      readonly record: ChargingEvent;
      readonly correlated: boolean;
      /** Last state of charge seen for the vehicle at or before the session start. */
      readonly socAtStart: number | null;
    }
  | { readonly type: 'charging_end'; readonly at: number; readonly record: ChargingEvent };

export type CorrelationInputs = {
  readonly [K in StreamKind]?: AsyncIterable<TelemetryRecordByStream[K]>;
};

/**
 * Emission rank at equal timestamps. Stream heads: position 0, battery 1,
 * charging start 3, trip open 5. Interval closes: charging end 2, trip 4.
 * A trip close evicts its vehicle, so everything the vehicle reports at the
 * arrival instant ranks before it.
 */
const HEAD_RANK: Readonly<Record<StreamKind, number>> = { vehicle: 0, battery: 1, charging: 3, trip: 5 };
const CHARGING_END_RANK = 2;
const TRIP_CLOSE_RANK = 4;

type PendingClose =
  | { at: number; rank: number; seq: number; kind: 'trip'; record: TripSummary }
  | { at: number; rank: number; seq: number; kind: 'charging'; record: ChargingEvent };

interface VehicleWindow {
  sawSample: boolean;
  openTrips: number;
  lastSoc: number | null;
  reported: Set<Exclude<StreamKind, 'vehicle'>>;
}

// ---------------------------------------------------------------------------
// Stream cursor — one look-ahead record per stream
// ---------------------------------------------------------------------------

class StreamCursor<K extends StreamKind> {
  head: TelemetryRecordByStream[K] | null = null;
  private lastKey = Number.NEGATIVE_INFINITY;
  private finished = false;

  constructor(
    readonly kind: K,
    private readonly iterator: AsyncIterator<TelemetryRecordByStream[K]>,
  ) {}

  get live(): boolean {
    return this.head !== null;
  }

  get headKey(): number {
    return this.head === null ? Number.POSITIVE_INFINITY : recordOrderKey(this.head);
  }

  async advance(): Promise<void> {
    this.head = null;
    if (this.finished) return;

    const next = await this.iterator.next();
    if (next.done) {
      this.finished = true;
      return;
    }

    const key = recordOrderKey(next.value);
    if (key < this.lastKey) {
      throw new StreamCorruptError(
        this.kind,
        `out-of-order record at t=${key} after t=${this.lastKey}; the stream must be time-sorted`,
      );
    }
    this.lastKey = key;
    this.head = next.value;
  }

  async release(): Promise<void> {
    this.head = null;
    if (this.finished) return;
    this.finished = true;
    await this.iterator.return?.();
  }
}

type AnyCursor = { [K in StreamKind]: StreamCursor<K> }[StreamKind];

// ---------------------------------------------------------------------------
// CorrelationIndex
// ---------------------------------------------------------------------------

/**
 * CorrelationIndex
 *
 * Streaming k-way merge of the four telemetry streams into one sequence whose
 * `at` timestamps never decrease. The watermark is the smallest head key over
 * the live streams; interval records (trips, charging sessions) are opened at
 * their start and held in a heap until the watermark passes their end.
 *
 * Memory is bounded by the active set: a vehicle enters on its first record
 * and leaves when its trip close is emitted. By then every record of that
 * vehicle at or before the arrival time has been emitted, because a trip
 * close ranks after samples and charging starts of the same instant.
 */
export class CorrelationIndex {
  private readonly cursors: AnyCursor[];
  private readonly pending = new MinHeap<PendingClose>(
    (a, b) => a.at - b.at || a.rank - b.rank || a.seq - b.seq,
  );
  private readonly active = new Map<string, VehicleWindow>();
  private seq = 0;
  private started = false;

  constructor(
    inputs: CorrelationInputs,
    private readonly context: RunContext,
  ) {
    const cursors: AnyCursor[] = [];
    if (inputs.vehicle) cursors.push(new StreamCursor('vehicle', inputs.vehicle[Symbol.asyncIterator]()));
    if (inputs.battery) cursors.push(new StreamCursor('battery', inputs.battery[Symbol.asyncIterator]()));
    if (inputs.trip) cursors.push(new StreamCursor('trip', inputs.trip[Symbol.asyncIterator]()));
    if (inputs.charging) cursors.push(new StreamCursor('charging', inputs.charging[Symbol.asyncIterator]()));
    this.cursors = cursors;
  }

  get activeVehicleCount(): number {
    return this.active.size;
  }

  get openIntervalCount(): number {
    return this.pending.size;
  }

  async *correlate(): AsyncGenerator<CorrelatedRecord, void, undefined> {
    if (this.started) throw new Error('correlation index can only be iterated once');
    this.started = true;

    try {
      for (const cursor of this.cursors) {
        await cursor.advance();
      }

      for (;;) {
        const cursor = this.nextCursor();
        const close = this.pending.peek();

        if (close && (!cursor || close.at < cursor.headKey ||
          (close.at === cursor.headKey && close.rank < HEAD_RANK[cursor.kind]))) {
          this.pending.pop();
          yield this.emitClose(close);
          continue;
        }
        if (!cursor) break;

        const emitted = await this.consumeHead(cursor);
        if (emitted) yield emitted;
      }
    } finally {
      for (const cursor of this.cursors) {
        await cursor.release();
      }
    }
  }

  /** Vehicle ids still holding an open window, in id order. */
  activeVehicles(): string[] {
    return [...this.active.keys()].sort();
  }

  private nextCursor(): AnyCursor | null {
    let best: AnyCursor | null = null;
    for (const cursor of this.cursors) {
      if (!cursor.live) continue;
      if (
        best === null ||
        cursor.headKey < best.headKey ||
        (cursor.headKey === best.headKey && HEAD_RANK[cursor.kind] < HEAD_RANK[best.kind])
      ) {
        best = cursor;
      }
    }
    return best;
  }

  private async consumeHead(cursor: AnyCursor): Promise<CorrelatedRecord | null> {
    switch (cursor.kind) {
      case 'vehicle': {
        const record = cursor.head;
        await cursor.advance();
        if (!record) return null;
        this.windowFor(record.vehicleId).sawSample = true;
        return { type: 'sample', at: record.ts, record };
      }
      case 'battery': {
        const record = cursor.head;
        await cursor.advance();
        if (!record) return null;
        const window = this.windowFor(record.vehicleId);
        window.lastSoc = record.stateOfCharge;
        const correlated = this.checkCorrelation(record.vehicleId, window, 'battery', record.ts);
        return { type: 'battery', at: record.ts, record, correlated };
      }
      case 'trip': {
        const record = cursor.head;
        await cursor.advance();
        if (!record) return null;
        this.windowFor(record.vehicleId).openTrips++;
        this.pending.push({ at: record.arrivalTs, rank: TRIP_CLOSE_RANK, seq: this.seq++, kind: 'trip', record });
        return null;
      }
      case 'charging': {
        const record = cursor.head;
        await cursor.advance();
        if (!record) return null;
        const window = this.windowFor(record.vehicleId);
        const correlated = this.checkCorrelation(record.vehicleId, window, 'charging', record.startTs);
        this.pending.push({ at: record.endTs, rank: CHARGING_END_RANK, seq: this.seq++, kind: 'charging', record });
        return { type: 'charging_start', at: record.startTs, record, correlated, socAtStart: window.lastSoc };
      }
    }
  }

  private emitClose(close: PendingClose): CorrelatedRecord {
    if (close.kind === 'charging') {
      return { type: 'charging_end', at: close.at, record: close.record };
    }

    const { vehicleId } = close.record;
    const window = this.windowFor(vehicleId);
    const correlated = this.checkCorrelation(vehicleId, window, 'trip', close.at);

    window.openTrips = Math.max(0, window.openTrips - 1);
    if (window.openTrips === 0) this.active.delete(vehicleId);
    return { type: 'trip', at: close.at, record: close.record, correlated };
  }

  private windowFor(vehicleId: string): VehicleWindow {
    let window = this.active.get(vehicleId);
    if (!window) {
      window = { sawSample: false, openTrips: 0, lastSoc: null, reported: new Set() };
      this.active.set(vehicleId, window);
      this.context.observeActiveVehicles(this.active.size);
    }
    return window;
  }

  /** Registers one MissingCorrelation per window and stream when no position sample was seen. */
  private checkCorrelation(
    vehicleId: string,
    window: VehicleWindow,
    stream: Exclude<StreamKind, 'vehicle'>,
    ts: number,
  ): boolean {
    if (window.sawSample) return true;
    if (!window.reported.has(stream)) {
      window.reported.add(stream);
      this.context.recordMissingCorrelation({ vehicleId, stream, ts });
    }
    return false;
  }
}
