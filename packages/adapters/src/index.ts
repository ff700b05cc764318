// ─── CSV Stream Readers ───────────────────────────────────────────────────────
export { splitCsvLine, stripBom, toRow } from './csv/csv-line.js';
export {
  CsvStreamReader,
  openCsvFile,
  csvFromLines,
  type CsvStreamReaderOptions,
  type LineSource,
  type TelemetryCsvReader,
} from './csv/csv-stream-reader.js';
export {
  ROW_SCHEMAS,
  REQUIRED_COLUMNS,
  describeIssues,
  type RawVehicleRow,
  type RawBatteryRow,
  type RawTripRow,
  type RawChargingRow,
  type RawRowByStream,
  type RowSchema,
} from './csv/row-schemas.js';

// ─── Report Sink ──────────────────────────────────────────────────────────────
export { FileReportSink, STDOUT_DESTINATION, type ReportRenderer } from './fs/file-report-sink.js';

// ─── Synthetic Telemetry ──────────────────────────────────────────────────────
export { SeededRng } from './synthetic/seeded-rng.js';
export {
  SyntheticFleet,
  type SyntheticFleetOptions,
  type SyntheticTrip,
} from './synthetic/synthetic-telemetry.js';
