import type {
  FleetSummary,
  FleetTimeSeriesBucket,
  ReportFormat,
  RunDiagnostics,
  StationAggregate,
  StreamLocations,
  TelemetryReport,
  VehicleAggregate,
  VehicleTypeSummary,
} from '@simtrace/domain';
import { renderTextReport } from './text-report.renderer.js';

export interface ReportParts {
  inputs: StreamLocations;
  fleet: FleetSummary;
  vehicleTypes: readonly VehicleTypeSummary[];
  vehicles: readonly VehicleAggregate[];
  stations: readonly StationAggregate[];
  timeSeries: readonly FleetTimeSeriesBucket[];
  diagnostics: RunDiagnostics;
  generatedAt?: Date;
}

/** Collect the final aggregates into one report, vehicles ordered by id then episode. */
export function assembleReport(parts: ReportParts): TelemetryReport {
  const vehicles = [...parts.vehicles].sort(
    (a, b) => (a.vehicleId < b.vehicleId ? -1 : a.vehicleId > b.vehicleId ? 1 : a.episode - b.episode),
  );
  const stations = [...parts.stations].sort((a, b) =>
    a.stationId < b.stationId ? -1 : a.stationId > b.stationId ? 1 : 0,
  );

  return {
    generatedAt: (parts.generatedAt ?? new Date()).toISOString(),
    inputs: parts.inputs,
    fleet: parts.fleet,
    vehicleTypes: parts.vehicleTypes,
    vehicles,
    stations,
    timeSeries: parts.timeSeries,
    diagnostics: parts.diagnostics,
  };
}

export function renderReport(report: TelemetryReport, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(report, null, 2);
    case 'text':
      return renderTextReport(report);
  }
}
