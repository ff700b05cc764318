import type { StreamKind } from '../../entities/telemetry-record.js';
import type { ReportFormat, TelemetryReport } from '../../entities/telemetry-report.js';

// ---------------------------------------------------------------------------
// Analysis request
// ---------------------------------------------------------------------------

export type StreamLocations = Readonly<Record<StreamKind, string | null>>;

export interface AnalysisSettings {
  /** Per-stream malformed-record threshold; exceeding it corrupts the stream. */
  maxMalformedRecords: number;
  timeSeriesBucketSec: number;
  stationCapacity: number;
  stoppedSpeedThreshold: number;
}

export interface AnalysisRequest {
  streams: StreamLocations;
  settings: AnalysisSettings;
  report: { path: string; format: ReportFormat };
  signal?: AbortSignal;
}

export interface AnalysisResult {
  report: TelemetryReport;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface TelemetryAnalysisPort {
  analyze(request: AnalysisRequest): Promise<AnalysisResult>;
}
