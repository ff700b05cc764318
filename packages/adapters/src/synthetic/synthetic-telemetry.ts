import { SeededRng } from './seeded-rng.js';

export interface SyntheticFleetOptions {
  vehicleCount: number;
  /** Seconds between consecutive departures. */
  departInterval: number;
  minTripDuration: number;
  maxTripDuration: number;
  seed?: number;
  /** Battery sample period in seconds; 0 disables the battery stream. */
  batteryEvery?: number;
  /** Number of charging stations; 0 disables charging sessions. */
  chargingStations?: number;
  chargeDuration?: number;
}

export interface SyntheticTrip {
  readonly index: number;
  readonly vehicleId: string;
  readonly vehicleType: string;
  readonly departTs: number;
  readonly arrivalTs: number;
  readonly cruiseSpeed: number;
}

const BATTERY_CAPACITY_WH = 50_000;
const CONSUMPTION_WH_PER_M = 0.15;
const CHARGE_POWER_WH_PER_SEC = 5;

function fmt(n: number): string {
  return String(Math.round(n * 1000) / 1000);
}

/**
 * Deterministic fleet of vehicles departing at a fixed interval, each driving
 * one trip at constant cruise speed. Every stream is produced lazily, in the
 * order the simulator would write it, so arbitrarily long runs can be fed to
 * the engine without materialising them.
 */
export class SyntheticFleet {
  readonly trips: readonly SyntheticTrip[];
  private readonly batteryEvery: number;
  private readonly chargingStations: number;
  private readonly chargeDuration: number;

  constructor(private readonly options: SyntheticFleetOptions) {
    const seed = options.seed ?? 42;
    this.batteryEvery = options.batteryEvery ?? 0;
    this.chargingStations = options.chargingStations ?? 0;
    this.chargeDuration = options.chargeDuration ?? 5;

    const trips: SyntheticTrip[] = [];
    for (let i = 0; i < options.vehicleCount; i++) {
      const rng = new SeededRng(seed * 7919 + i);
      const departTs = i * options.departInterval;
      trips.push({
        index: i,
        vehicleId: `veh-${String(i).padStart(5, '0')}`,
        vehicleType: i % 2 === 0 ? 'ev_car' : 'ev_bus',
        departTs,
        arrivalTs: departTs + rng.nextInt(options.minTripDuration, options.maxTripDuration),
        cruiseSpeed: Math.round(rng.nextFloat(8, 16) * 10) / 10,
      });
    }
    this.trips = trips;
  }

  get horizon(): number {
    return this.trips.reduce((max, trip) => Math.max(max, trip.arrivalTs), 0);
  }

  speedAt(trip: SyntheticTrip, ts: number): number {
    return ts === trip.departTs ? 0 : trip.cruiseSpeed;
  }

  positionAt(trip: SyntheticTrip, ts: number): number {
    return trip.cruiseSpeed * (ts - trip.departTs);
  }

  /** Largest number of trips whose [depart, arrival] interval contains a common instant. */
  maxConcurrentTrips(): number {
    const edges: Array<{ ts: number; delta: number }> = [];
    for (const trip of this.trips) {
      edges.push({ ts: trip.departTs, delta: 1 }, { ts: trip.arrivalTs, delta: -1 });
    }
    // Intervals are closed: at equal times, arrivals count after departures.
    edges.sort((a, b) => a.ts - b.ts || b.delta - a.delta);
    let open = 0;
    let peak = 0;
    for (const edge of edges) {
      open += edge.delta;
      peak = Math.max(peak, open);
    }
    return peak;
  }

  private *activeTripsAt(ts: number): Generator<SyntheticTrip> {
    const { departInterval, maxTripDuration } = this.options;
    const first = Math.max(0, Math.ceil((ts - maxTripDuration) / departInterval));
    const last = Math.min(this.trips.length - 1, Math.floor(ts / departInterval));
    for (let i = first; i <= last; i++) {
      const trip = this.trips[i];
      if (trip && trip.departTs <= ts && ts <= trip.arrivalTs) yield trip;
    }
  }

  *vehicleLines(): Generator<string> {
    yield 'timestep_sec,vehicle_id,vehicle_type,speed_ms,x_position_m,y_position_m,distance_traveled_m';
    const horizon = this.horizon;
    for (let ts = 0; ts <= horizon; ts++) {
      for (const trip of this.activeTripsAt(ts)) {
        const x = this.positionAt(trip, ts);
        yield [
          fmt(ts),
          trip.vehicleId,
          trip.vehicleType,
          fmt(this.speedAt(trip, ts)),
          fmt(x),
          fmt(trip.index * 10),
          fmt(x),
        ].join(',');
      }
    }
  }

  *batteryLines(): Generator<string> {
    yield 'timestep_sec,vehicle_id,actualBatteryCapacity_Wh,maximumBatteryCapacity_Wh,totalEnergyConsumed_Wh';
    if (this.batteryEvery <= 0) return;
    const horizon = this.horizon;
    for (let ts = 0; ts <= horizon; ts++) {
      for (const trip of this.activeTripsAt(ts)) {
        if ((ts - trip.departTs) % this.batteryEvery !== 0) continue;
        const consumed = CONSUMPTION_WH_PER_M * this.positionAt(trip, ts);
        yield [
          fmt(ts),
          trip.vehicleId,
          fmt(BATTERY_CAPACITY_WH - consumed),
          fmt(BATTERY_CAPACITY_WH),
          fmt(consumed),
        ].join(',');
      }
    }
  }

  *tripLines(): Generator<string> {
    yield 'vehicle_id,vehicle_type,depart_sec,arrival_sec,route_length_m,duration_sec,waiting_time_sec';
    for (const trip of this.trips) {
      const duration = trip.arrivalTs - trip.departTs;
      yield [
        trip.vehicleId,
        trip.vehicleType,
        fmt(trip.departTs),
        fmt(trip.arrivalTs),
        fmt(this.positionAt(trip, trip.arrivalTs)),
        fmt(duration),
        '0',
      ].join(',');
    }
  }

  *chargingLines(): Generator<string> {
    yield 'station_id,vehicle_id,start_sec,end_sec,energy_delivered_Wh';
    if (this.chargingStations <= 0) return;
    for (const trip of this.trips) {
      const startTs = trip.departTs + 1;
      const endTs = startTs + this.chargeDuration;
      if (endTs > trip.arrivalTs) continue;
      yield [
        `CS-${trip.index % this.chargingStations}`,
        trip.vehicleId,
        fmt(startTs),
        fmt(endTs),
        fmt(this.chargeDuration * CHARGE_POWER_WH_PER_SEC),
      ].join(',');
    }
  }
}
