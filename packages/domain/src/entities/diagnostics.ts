import type { StreamKind } from './telemetry-record.js';

export interface MalformedExample {
  readonly line: number;
  readonly reason: string;
}

export interface StreamDiagnostics {
  readonly stream: StreamKind;
  readonly source: string | null;
  readonly recordsRead: number;
  readonly recordsAccepted: number;
  readonly malformedCount: number;
  readonly malformedExamples: readonly MalformedExample[];
}

/** A vehicle seen in some stream but not (yet) in the position/speed stream. */
export interface MissingCorrelation {
  readonly type: 'MissingCorrelation';
  readonly vehicleId: string;
  readonly stream: Exclude<StreamKind, 'vehicle'>;
  readonly ts: number;
}

/** Concurrency at a station beyond its modelled capacity. */
export interface OverlapAnomaly {
  readonly type: 'OverlapAnomaly';
  readonly stationId: string;
  readonly ts: number;
  readonly concurrency: number;
  readonly capacity: number;
  readonly vehicleIds: readonly string[];
}

export interface RunDiagnostics {
  readonly streams: readonly StreamDiagnostics[];
  readonly missingCorrelations: readonly MissingCorrelation[];
  readonly vehiclesWithMissingCorrelation: number;
  readonly overlapAnomalies: readonly OverlapAnomaly[];
  readonly peakActiveVehicles: number;
  readonly peakOpenAggregates: number;
  readonly caveats: readonly string[];
}
