import type { VehicleSample } from './vehicle-sample.js';
import type { BatteryState } from './battery-state.js';
import type { TripSummary } from './trip-summary.js';
import type { ChargingEvent } from './charging-event.js';

export type StreamKind = 'vehicle' | 'battery' | 'trip' | 'charging';

/** Fixed stream order: position/speed, battery, trip, charging. */
export const STREAM_KINDS: readonly StreamKind[] = ['vehicle', 'battery', 'trip', 'charging'];

export type TelemetryRecord = VehicleSample | BatteryState | TripSummary | ChargingEvent;

export interface TelemetryRecordByStream {
  vehicle: VehicleSample;
  battery: BatteryState;
  trip: TripSummary;
  charging: ChargingEvent;
}

/**
 * Ordering key of a record inside its own stream. Interval records
 * (trips, charging sessions) are ordered by their start.
 */
export function recordOrderKey(record: TelemetryRecord): number {
  switch (record.kind) {
    case 'vehicle_sample':
    case 'battery_state':
      return record.ts;
    case 'trip_summary':
      return record.departTs;
    case 'charging_event':
      return record.startTs;
  }
}

export function streamOf(record: TelemetryRecord): StreamKind {
  switch (record.kind) {
    case 'vehicle_sample':
      return 'vehicle';
    case 'battery_state':
      return 'battery';
    case 'trip_summary':
      return 'trip';
    case 'charging_event':
      return 'charging';
  }
}
