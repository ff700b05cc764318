import type { ReportFormat, TelemetryReport } from '../../entities/telemetry-report.js';

export interface ReportSinkPort {
  readonly destination: string;
  readonly format: ReportFormat;
  write(report: TelemetryReport): Promise<void>;
}
