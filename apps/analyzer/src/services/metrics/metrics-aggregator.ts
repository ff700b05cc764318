import type {
  BatteryState,
  EnergyStatistics,
  FinalizationCause,
  FleetSummary,
  FleetTimeSeriesBucket,
  TripFigures,
  TripSummary,
  VehicleAggregate,
  VehicleSample,
  VehicleTypeSummary,
} from '@simtrace/domain';
import type { CorrelatedRecord } from '../correlation/correlation-index.js';
import type { RunContext } from '../pipeline/run-context.js';
import type { StationUtilizationTracker } from '../stations/station-utilization-tracker.js';
import { FleetTimeSeries } from './fleet-time-series.js';
import { OnlineStats } from './online-stats.js';

export interface MetricsAggregatorOptions {
  /** Below this speed (m/s) the interval to the next sample counts as dwell time. */
  stoppedSpeedThreshold: number;
  timeSeriesBucketSec: number;
}

const UNKNOWN_TYPE = 'unknown';

interface BatteryAccumulator {
  count: number;
  initialSoc: number;
  finalSoc: number;
  minSoc: number;
  lastRemainingWh: number;
  consumedFromDrops: number;
  rechargedWh: number;
  consumedCounter: number | null;
  regeneratedCounter: number | null;
}

interface VehicleState {
  readonly vehicleId: string;
  readonly episode: number;
  vehicleType: string | null;
  readonly speed: OnlineStats;
  firstSeenTs: number | null;
  lastSeenTs: number | null;
  lastSample: VehicleSample | null;
  pathDistance: number;
  odometer: number | null;
  dwellTime: number;
  battery: BatteryAccumulator | null;
  chargingSessionCount: number;
  chargingEnergyWh: number;
  chargingDuration: number;
  missingCorrelation: boolean;
}

interface TypeAccumulator {
  readonly vehicles: Set<string>;
  readonly speed: OnlineStats;
  totalDistance: number;
  totalWaitingTime: number;
}

/**
 * MetricsAggregator
 *
 * Consumes the correlated stream and keeps one open aggregate per active
 * vehicle. A trip summary finalizes its vehicle's aggregate; whatever is
 * still open when the stream ends is finalized by `finish()`. Finalized
 * aggregates are frozen and handed out exactly once.
 */
export class MetricsAggregator {
  private readonly open = new Map<string, VehicleState>();
  private readonly episodes = new Map<string, number>();
  private readonly finalizedKeys = new Set<string>();
  private readonly fleetSpeed = new OnlineStats();
  private readonly types = new Map<string, TypeAccumulator>();
  private readonly timeSeries: FleetTimeSeries;

  private aggregateCount = 0;
  private completedTrips = 0;
  private totalDistance = 0;
  private totalTripDuration = 0;
  private totalWaitingTime = 0;
  private energyConsumedWh = 0;
  private energyRegeneratedWh = 0;
  private chargingEnergyWh = 0;
  private firstTs: number | null = null;
  private lastTs: number | null = null;

  constructor(
    private readonly context: RunContext,
    private readonly stations: StationUtilizationTracker,
    private readonly options: MetricsAggregatorOptions,
  ) {
    this.timeSeries = new FleetTimeSeries(options.timeSeriesBucketSec);
  }

  get openAggregateCount(): number {
    return this.open.size;
  }

  /** Returns the finalized aggregate when the record completes a vehicle's trip. */
  consume(item: CorrelatedRecord): VehicleAggregate | null {
    if (this.firstTs === null) this.firstTs = item.at;
    this.lastTs = item.at;

    switch (item.type) {
      case 'sample':
        this.onSample(item.record);
        return null;
      case 'battery':
        this.onBattery(item.record, item.correlated);
        return null;
      case 'charging_start': {
        const state = this.stateFor(item.record.vehicleId);
        state.chargingSessionCount++;
        state.chargingEnergyWh += item.record.energyDeliveredWh;
        state.chargingDuration += item.record.endTs - item.record.startTs;
        if (!item.correlated) state.missingCorrelation = true;
        this.timeSeries.recordChargingStart(item.at);
        this.stations.sessionStarted(item.record, item.socAtStart);
        return null;
      }
      case 'charging_end':
        this.stations.sessionEnded(item.record);
        return null;
      case 'trip': {
        const state = this.stateFor(item.record.vehicleId);
        if (!item.correlated) state.missingCorrelation = true;
        return this.finalize(state, 'trip_summary', item.record);
      }
    }
  }

  /** Finalize every aggregate still open, in vehicle-id order. */
  finish(): VehicleAggregate[] {
    const remaining = [...this.open.values()].sort((a, b) => compareIds(a.vehicleId, b.vehicleId));
    return remaining.map((state) => this.finalize(state, 'end_of_input', null));
  }

  fleetSummary(): FleetSummary {
    const consumed = this.energyConsumedWh;
    const regenerated = this.energyRegeneratedWh;
    return {
      vehicleCount: this.episodes.size + [...this.open.keys()].filter((id) => !this.episodes.has(id)).length,
      aggregateCount: this.aggregateCount,
      completedTrips: this.completedTrips,
      totalDistance: this.totalDistance,
      totalTripDuration: this.totalTripDuration,
      meanTripDuration: this.completedTrips > 0 ? this.totalTripDuration / this.completedTrips : null,
      totalWaitingTime: this.totalWaitingTime,
      speed: this.fleetSpeed.summary(),
      energyConsumedWh: consumed,
      energyRegeneratedWh: regenerated,
      netEnergyWh: consumed - regenerated,
      regenerationRatio: consumed > 0 ? regenerated / consumed : null,
      chargingEnergyWh: this.chargingEnergyWh,
      firstTs: this.firstTs,
      lastTs: this.lastTs,
    };
  }

  vehicleTypeSummaries(): VehicleTypeSummary[] {
    return [...this.types.entries()]
      .sort(([a], [b]) => compareIds(a, b))
      .map(([vehicleType, acc]) => {
        const speed = acc.speed.summary();
        return {
          vehicleType,
          vehicleCount: acc.vehicles.size,
          sampleCount: acc.speed.count,
          meanSpeed: speed?.mean ?? null,
          maxSpeed: speed?.max ?? null,
          totalDistance: acc.totalDistance,
          totalWaitingTime: acc.totalWaitingTime,
        };
      });
  }

  timeSeriesBuckets(): FleetTimeSeriesBucket[] {
    return this.timeSeries.finish();
  }

  // ── per-record updates ─────────────────────────────────────────────────────

  private onSample(sample: VehicleSample): void {
    const state = this.stateFor(sample.vehicleId);
    const previous = state.lastSample;

    state.speed.push(sample.speed);
    this.fleetSpeed.push(sample.speed);
    this.timeSeries.recordSample(sample.ts, sample.vehicleId, sample.speed);

    if (state.firstSeenTs === null) state.firstSeenTs = sample.ts;
    state.lastSeenTs = sample.ts;
    if (state.vehicleType === null && sample.vehicleType) state.vehicleType = sample.vehicleType;
    if (sample.distanceTraveled !== undefined) state.odometer = sample.distanceTraveled;

    if (previous) {
      state.pathDistance += Math.hypot(sample.x - previous.x, sample.y - previous.y);
      if (previous.speed < this.options.stoppedSpeedThreshold) {
        state.dwellTime += sample.ts - previous.ts;
      }
    }
    state.lastSample = sample;
  }

  private onBattery(battery: BatteryState, correlated: boolean): void {
    const state = this.stateFor(battery.vehicleId);
    if (!correlated) state.missingCorrelation = true;

    const acc = state.battery;
    if (!acc) {
      state.battery = {
        count: 1,
        initialSoc: battery.stateOfCharge,
        finalSoc: battery.stateOfCharge,
        minSoc: battery.stateOfCharge,
        lastRemainingWh: battery.remainingEnergyWh,
        consumedFromDrops: 0,
        rechargedWh: 0,
        consumedCounter: battery.totalEnergyConsumedWh ?? null,
        regeneratedCounter: battery.totalEnergyRegeneratedWh ?? null,
      };
      return;
    }

    acc.count++;
    acc.finalSoc = battery.stateOfCharge;
    acc.minSoc = Math.min(acc.minSoc, battery.stateOfCharge);
    const drop = acc.lastRemainingWh - battery.remainingEnergyWh;
    if (drop > 0) acc.consumedFromDrops += drop;
    else acc.rechargedWh -= drop;
    acc.lastRemainingWh = battery.remainingEnergyWh;
    if (battery.totalEnergyConsumedWh !== undefined) {
      acc.consumedCounter = Math.max(acc.consumedCounter ?? 0, battery.totalEnergyConsumedWh);
    }
    if (battery.totalEnergyRegeneratedWh !== undefined) {
      acc.regeneratedCounter = Math.max(acc.regeneratedCounter ?? 0, battery.totalEnergyRegeneratedWh);
    }
  }

  // ── lifecycle ──────────────────────────────────────────────────────────────

  private stateFor(vehicleId: string): VehicleState {
    let state = this.open.get(vehicleId);
    if (!state) {
      state = {
        vehicleId,
        episode: (this.episodes.get(vehicleId) ?? 0) + 1,
        vehicleType: null,
        speed: new OnlineStats(),
        firstSeenTs: null,
        lastSeenTs: null,
        lastSample: null,
        pathDistance: 0,
        odometer: null,
        dwellTime: 0,
        battery: null,
        chargingSessionCount: 0,
        chargingEnergyWh: 0,
        chargingDuration: 0,
        missingCorrelation: false,
      };
      this.open.set(vehicleId, state);
      this.context.observeOpenAggregates(this.open.size);
    }
    return state;
  }

  private finalize(state: VehicleState, cause: FinalizationCause, trip: TripSummary | null): VehicleAggregate {
    const key = `${state.vehicleId}#${state.episode}`;
    if (this.finalizedKeys.has(key)) {
      throw new Error(`vehicle ${state.vehicleId} episode ${state.episode} finalized twice`);
    }
    this.finalizedKeys.add(key);
    this.open.delete(state.vehicleId);
    this.episodes.set(state.vehicleId, state.episode);

    const distance = trip?.distance ?? state.odometer ?? state.pathDistance;
    const energy = state.battery ? energyStatistics(state.battery, distance) : null;
    const vehicleType = state.vehicleType ?? trip?.vehicleType ?? null;
    const speed = state.speed.summary();

    const aggregate: VehicleAggregate = Object.freeze({
      vehicleId: state.vehicleId,
      episode: state.episode,
      vehicleType,
      sampleCount: state.speed.count,
      speed: speed ? Object.freeze(speed) : null,
      firstSeenTs: state.firstSeenTs,
      lastSeenTs: state.lastSeenTs,
      pathDistance: state.pathDistance,
      distance,
      dwellTime: state.dwellTime,
      energy: energy ? Object.freeze(energy) : null,
      chargingSessionCount: state.chargingSessionCount,
      chargingEnergyWh: state.chargingEnergyWh,
      chargingDuration: state.chargingDuration,
      trip: trip ? Object.freeze(tripFigures(trip)) : null,
      finalizedBy: cause,
      missingCorrelation: state.missingCorrelation,
    });

    this.aggregateCount++;
    this.totalDistance += distance;
    this.chargingEnergyWh += state.chargingEnergyWh;
    if (energy) {
      this.energyConsumedWh += energy.consumedWh;
      this.energyRegeneratedWh += energy.regeneratedWh;
    }
    if (trip) {
      this.completedTrips++;
      this.totalTripDuration += trip.duration;
      this.totalWaitingTime += trip.waitingTime;
    }

    const typeKey = vehicleType ?? UNKNOWN_TYPE;
    let typeAcc = this.types.get(typeKey);
    if (!typeAcc) {
      typeAcc = { vehicles: new Set(), speed: new OnlineStats(), totalDistance: 0, totalWaitingTime: 0 };
      this.types.set(typeKey, typeAcc);
    }
    typeAcc.vehicles.add(state.vehicleId);
    typeAcc.speed.merge(state.speed);
    typeAcc.totalDistance += distance;
    typeAcc.totalWaitingTime += trip?.waitingTime ?? 0;

    return aggregate;
  }
}

function energyStatistics(acc: BatteryAccumulator, distance: number): EnergyStatistics {
  const consumedWh = acc.consumedCounter ?? acc.consumedFromDrops;
  const regeneratedWh = acc.regeneratedCounter ?? 0;
  const netEnergyWh = consumedWh - regeneratedWh;
  return {
    batterySampleCount: acc.count,
    initialSoc: acc.initialSoc,
    finalSoc: acc.finalSoc,
    minSoc: acc.minSoc,
    consumedWh,
    regeneratedWh,
    netEnergyWh,
    rechargedWh: acc.rechargedWh,
    energyPerKmWh: distance > 0 ? netEnergyWh / (distance / 1000) : null,
    regenerationRatio: consumedWh > 0 ? regeneratedWh / consumedWh : null,
  };
}

function tripFigures(trip: TripSummary): TripFigures {
  return {
    departTs: trip.departTs,
    arrivalTs: trip.arrivalTs,
    distance: trip.distance,
    duration: trip.duration,
    waitingTime: trip.waitingTime,
    averageSpeed: trip.duration > 0 ? trip.distance / trip.duration : null,
    maxSpeed: trip.maxSpeed ?? null,
  };
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
