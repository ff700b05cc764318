import type {
  BatteryState,
  ChargingEvent,
  StreamKind,
  TelemetryRecordByStream,
  TelemetryStreamPort,
  TripSummary,
  VehicleSample,
} from '@simtrace/domain';
import type {
  RawBatteryRow,
  RawChargingRow,
  RawRowByStream,
  RawTripRow,
  RawVehicleRow,
} from '@simtrace/adapters';

export function normalizeVehicleRow(row: RawVehicleRow): VehicleSample {
  return {
    kind: 'vehicle_sample',
    vehicleId: row.vehicle_id,
    ts: row.timestep_sec,
    x: row.x_position_m,
    y: row.y_position_m,
    speed: row.speed_ms,
    acceleration: row.acceleration_ms2,
    vehicleType: row.vehicle_type,
    lane: row.lane,
    angle: row.angle_deg,
    distanceTraveled: row.distance_traveled_m,
    waitingTime: row.waiting_time_sec,
  };
}

/**
 * State of charge comes from actual/maximum capacity when the maximum is
 * known, otherwise from the reported percentage.
 */
export function normalizeBatteryRow(row: RawBatteryRow): BatteryState {
  const max = row.maximumBatteryCapacity_Wh;
  const soc =
    max !== undefined && max > 0
      ? Math.min(1, row.actualBatteryCapacity_Wh / max)
      : (row.battery_soc_percent ?? 0) / 100;
  const station = row.chargingStationId;

  return {
    kind: 'battery_state',
    vehicleId: row.vehicle_id,
    ts: row.timestep_sec,
    remainingEnergyWh: row.actualBatteryCapacity_Wh,
    stateOfCharge: soc,
    maxCapacityWh: max,
    totalEnergyConsumedWh: row.totalEnergyConsumed_Wh,
    totalEnergyRegeneratedWh: row.totalEnergyRegenerated_Wh,
    chargingStationId: station === undefined || station.toUpperCase() === 'NULL' ? undefined : station,
  };
}

export function normalizeTripRow(row: RawTripRow): TripSummary {
  return {
    kind: 'trip_summary',
    vehicleId: row.vehicle_id,
    vehicleType: row.vehicle_type,
    departTs: row.depart_sec,
    arrivalTs: row.arrival_sec,
    distance: row.route_length_m,
    duration: row.duration_sec ?? row.arrival_sec - row.depart_sec,
    waitingTime: row.waiting_time_sec ?? 0,
    maxSpeed: row.max_speed_ms,
  };
}

export function normalizeChargingRow(row: RawChargingRow): ChargingEvent {
  return {
    kind: 'charging_event',
    stationId: row.station_id,
    vehicleId: row.vehicle_id,
    startTs: row.start_sec,
    endTs: row.end_sec,
    energyDeliveredWh: row.energy_delivered_Wh,
  };
}

type Normalizer<K extends StreamKind> = (row: RawRowByStream[K]) => TelemetryRecordByStream[K];

const NORMALIZERS: { [K in StreamKind]: Normalizer<K> } = {
  vehicle: normalizeVehicleRow,
  battery: normalizeBatteryRow,
  trip: normalizeTripRow,
  charging: normalizeChargingRow,
};

export function normalizeRecord<K extends StreamKind>(kind: K, row: RawRowByStream[K]): TelemetryRecordByStream[K] {
  const normalize: Normalizer<K> = NORMALIZERS[kind];
  return normalize(row);
}

/** Lazily map a reader's raw rows onto domain records. */
export async function* normalizeStream<K extends StreamKind>(
  kind: K,
  reader: TelemetryStreamPort<RawRowByStream[K]>,
): AsyncGenerator<TelemetryRecordByStream[K], void, undefined> {
  for await (const row of reader.records()) {
    yield normalizeRecord(kind, row);
  }
}
