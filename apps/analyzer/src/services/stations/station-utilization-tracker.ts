import type { ChargingEvent, StationAggregate } from '@simtrace/domain';
import type { RunContext } from '../pipeline/run-context.js';

const log = {
  warn: (msg: string, extra?: Record<string, unknown>) =>
    console.warn(`[station-tracker] ${msg}`, extra ? JSON.stringify(extra) : ''),
};

interface StationState {
  readonly stationId: string;
  /** Sessions currently occupying the station, in start order. */
  readonly open: ChargingEvent[];
  readonly vehicles: Set<string>;
  sessionCount: number;
  totalEnergyWh: number;
  sessionDuration: number;
  occupiedDuration: number;
  busySince: number | null;
  overlapCount: number;
  peakConcurrency: number;
  firstSessionStartTs: number | null;
  lastSessionEndTs: number | null;
  socSum: number;
  socCount: number;
}

/**
 * StationUtilizationTracker
 *
 * Occupancy and throughput per charging station, fed session starts and ends
 * in time order. A start while `capacity` sessions are already open is an
 * OverlapAnomaly: recorded, never corrected.
 */
export class StationUtilizationTracker {
  private readonly stations = new Map<string, StationState>();

  constructor(
    private readonly context: RunContext,
    private readonly capacity = 1,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`station capacity must be a positive integer, got ${capacity}`);
    }
  }

  get stationCount(): number {
    return this.stations.size;
  }

  sessionStarted(event: ChargingEvent, socAtStart: number | null): void {
    const state = this.stateFor(event.stationId);

    if (state.open.length >= this.capacity) {
      state.overlapCount++;
      const vehicleIds = [...state.open.map((s) => s.vehicleId), event.vehicleId];
      this.context.recordOverlap({
        stationId: event.stationId,
        ts: event.startTs,
        concurrency: state.open.length + 1,
        capacity: this.capacity,
        vehicleIds,
      });
      log.warn('concurrent sessions exceed capacity', {
        stationId: event.stationId,
        ts: event.startTs,
        vehicleIds,
      });
    }

    if (state.open.length === 0) state.busySince = event.startTs;
    state.open.push(event);
    state.vehicles.add(event.vehicleId);
    state.sessionCount++;
    state.totalEnergyWh += event.energyDeliveredWh;
    state.sessionDuration += event.endTs - event.startTs;
    state.peakConcurrency = Math.max(state.peakConcurrency, state.open.length);
    if (state.firstSessionStartTs === null) state.firstSessionStartTs = event.startTs;
    if (socAtStart !== null) {
      state.socSum += socAtStart;
      state.socCount++;
    }
  }

  sessionEnded(event: ChargingEvent): void {
    const state = this.stations.get(event.stationId);
    if (!state) return;
    const index = state.open.indexOf(event);
    if (index === -1) return;

    state.open.splice(index, 1);
    state.lastSessionEndTs = Math.max(state.lastSessionEndTs ?? event.endTs, event.endTs);
    if (state.open.length === 0 && state.busySince !== null) {
      state.occupiedDuration += event.endTs - state.busySince;
      state.busySince = null;
    }
  }

  /** Close sessions still open at their own end time and emit one aggregate per station, by id. */
  finish(): StationAggregate[] {
    for (const state of this.stations.values()) {
      const remaining = [...state.open].sort((a, b) => a.endTs - b.endTs);
      for (const event of remaining) this.sessionEnded(event);
    }
    return [...this.stations.values()]
      .sort((a, b) => (a.stationId < b.stationId ? -1 : a.stationId > b.stationId ? 1 : 0))
      .map(toAggregate);
  }

  private stateFor(stationId: string): StationState {
    let state = this.stations.get(stationId);
    if (!state) {
      state = {
        stationId,
        open: [],
        vehicles: new Set(),
        sessionCount: 0,
        totalEnergyWh: 0,
        sessionDuration: 0,
        occupiedDuration: 0,
        busySince: null,
        overlapCount: 0,
        peakConcurrency: 0,
        firstSessionStartTs: null,
        lastSessionEndTs: null,
        socSum: 0,
        socCount: 0,
      };
      this.stations.set(stationId, state);
    }
    return state;
  }
}

function toAggregate(state: StationState): StationAggregate {
  const window =
    state.firstSessionStartTs !== null && state.lastSessionEndTs !== null
      ? state.lastSessionEndTs - state.firstSessionStartTs
      : 0;

  return Object.freeze({
    stationId: state.stationId,
    sessionCount: state.sessionCount,
    totalEnergyWh: state.totalEnergyWh,
    occupiedDuration: state.occupiedDuration,
    sessionDuration: state.sessionDuration,
    overlapCount: state.overlapCount,
    peakConcurrency: state.peakConcurrency,
    firstSessionStartTs: state.firstSessionStartTs,
    lastSessionEndTs: state.lastSessionEndTs,
    averagePowerW: state.sessionDuration > 0 ? (state.totalEnergyWh * 3600) / state.sessionDuration : null,
    throughputPerHour: window > 0 ? (state.sessionCount * 3600) / window : null,
    averageSocAtStart: state.socCount > 0 ? state.socSum / state.socCount : null,
    vehicleIds: Object.freeze([...state.vehicles].sort()),
  });
}
