// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/vehicle-sample.js';
export * from './entities/battery-state.js';
export * from './entities/trip-summary.js';
export * from './entities/charging-event.js';
export * from './entities/telemetry-record.js';
export * from './entities/vehicle-aggregate.js';
export * from './entities/station-aggregate.js';
export * from './entities/diagnostics.js';
export * from './entities/telemetry-report.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/telemetry-errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-analysis.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/telemetry-stream.port.js';
export * from './ports/outbound/report-sink.port.js';
