import { csvFromLines, type CsvStreamReaderOptions, type LineSource } from '@simtrace/adapters';
import type { AnalysisSettings } from '@simtrace/domain';
import type { TelemetryStreams } from '../analysis-pipeline.js';

export const SETTINGS: AnalysisSettings = {
  maxMalformedRecords: 10,
  timeSeriesBucketSec: 5,
  stationCapacity: 1,
  stoppedSpeedThreshold: 0.1,
};

export const GENERATED_AT = new Date('2026-01-01T00:00:00.000Z');

export const VEHICLE_HEADER = 'timestep_sec,vehicle_id,speed_ms,x_position_m,y_position_m';
export const BATTERY_HEADER = 'timestep_sec,vehicle_id,actualBatteryCapacity_Wh,maximumBatteryCapacity_Wh';
export const TRIP_HEADER = 'vehicle_id,depart_sec,arrival_sec,route_length_m';
export const CHARGING_HEADER = 'station_id,vehicle_id,start_sec,end_sec,energy_delivered_Wh';

/**
 * Three vehicles on the position stream (V1 with a completed trip, V2 charging
 * at S1, V3 passing by) and V4, which only ever shows up on the battery stream.
 */
export const SCENARIO = {
  vehicle: [
    VEHICLE_HEADER,
    '0,V1,0,0,0',
    '1,V1,10,10,0',
    '2,V1,20,30,0',
    '3,V2,0,100,0',
    '4,V3,5,0,0',
    '5,V2,0,100,0',
    '8,V2,0,100,0',
  ],
  battery: [BATTERY_HEADER, '6,V4,40000,50000'],
  trip: [TRIP_HEADER, 'V1,0,2,30'],
  charging: [CHARGING_HEADER, 'S1,V2,5,8,12'],
} as const;

export interface ScenarioLines {
  vehicle: LineSource;
  battery?: LineSource;
  trip?: LineSource;
  charging?: LineSource;
}

export function streamsFrom(lines: ScenarioLines, options: CsvStreamReaderOptions): TelemetryStreams {
  return {
    vehicle: csvFromLines('vehicle', lines.vehicle, options),
    battery: lines.battery && csvFromLines('battery', lines.battery, options),
    trip: lines.trip && csvFromLines('trip', lines.trip, options),
    charging: lines.charging && csvFromLines('charging', lines.charging, options),
  };
}
