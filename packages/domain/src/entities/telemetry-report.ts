import type { SpeedStatistics, VehicleAggregate } from './vehicle-aggregate.js';
import type { StationAggregate } from './station-aggregate.js';
import type { RunDiagnostics } from './diagnostics.js';
import type { StreamKind } from './telemetry-record.js';

export interface VehicleTypeSummary {
  readonly vehicleType: string;
  readonly vehicleCount: number;
  readonly sampleCount: number;
  readonly meanSpeed: number | null;
  readonly maxSpeed: number | null;
  readonly totalDistance: number;
  readonly totalWaitingTime: number;
}

export interface FleetSummary {
  readonly vehicleCount: number;
  readonly aggregateCount: number;
  readonly completedTrips: number;
  readonly totalDistance: number;
  readonly totalTripDuration: number;
  readonly meanTripDuration: number | null;
  readonly totalWaitingTime: number;
  readonly speed: SpeedStatistics | null;
  readonly energyConsumedWh: number;
  readonly energyRegeneratedWh: number;
  readonly netEnergyWh: number;
  readonly regenerationRatio: number | null;
  readonly chargingEnergyWh: number;
  readonly firstTs: number | null;
  readonly lastTs: number | null;
}

export interface FleetTimeSeriesBucket {
  readonly bucketStartTs: number;
  readonly sampleCount: number;
  readonly activeVehicles: number;
  readonly meanSpeed: number | null;
  readonly chargingSessionsStarted: number;
}

export type ReportFormat = 'text' | 'json';

export interface TelemetryReport {
  readonly generatedAt: string;
  readonly inputs: Readonly<Record<StreamKind, string | null>>;
  readonly fleet: FleetSummary;
  readonly vehicleTypes: readonly VehicleTypeSummary[];
  readonly vehicles: readonly VehicleAggregate[];
  readonly stations: readonly StationAggregate[];
  readonly timeSeries: readonly FleetTimeSeriesBucket[];
  readonly diagnostics: RunDiagnostics;
}
