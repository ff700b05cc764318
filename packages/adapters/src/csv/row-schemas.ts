import { z } from 'zod';
import type { StreamKind } from '@simtrace/domain';

// ---------------------------------------------------------------------------
// Field parsers — every CSV cell arrives as a string
// ---------------------------------------------------------------------------

function toFiniteNumber(value: string, ctx: z.RefinementCtx): number {
  const n = Number(value);
  if (!Number.isFinite(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${value}"` });
    return z.NEVER;
  }
  return n;
}

const requiredNumber = z
  .string({ required_error: 'missing' })
  .trim()
  .min(1, 'missing')
  .transform(toFiniteNumber);

const optionalNumber = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === '') return undefined;
    return toFiniteNumber(value.trim(), ctx);
  });

const nonNegative = requiredNumber.pipe(z.number().min(0, 'must be >= 0'));
const optionalNonNegative = optionalNumber.pipe(z.number().min(0, 'must be >= 0').optional());

const requiredText = z.string({ required_error: 'missing' }).trim().min(1, 'missing');

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

// ---------------------------------------------------------------------------
// Stream schemas — column names follow the simulation exporter's CSV output
// ---------------------------------------------------------------------------

export const vehicleRowSchema = z.object({
  timestep_sec: requiredNumber,
  vehicle_id: requiredText,
  speed_ms: nonNegative,
  x_position_m: requiredNumber,
  y_position_m: requiredNumber,
  acceleration_ms2: optionalNumber,
  vehicle_type: optionalText,
  lane: optionalText,
  angle_deg: optionalNumber,
  distance_traveled_m: optionalNonNegative,
  waiting_time_sec: optionalNonNegative,
});

export const batteryRowSchema = z
  .object({
    timestep_sec: requiredNumber,
    vehicle_id: requiredText,
    actualBatteryCapacity_Wh: nonNegative,
    maximumBatteryCapacity_Wh: optionalNonNegative,
    battery_soc_percent: optionalNumber.pipe(
      z.number().min(0, 'must be >= 0').max(100, 'must be <= 100').optional(),
    ),
    totalEnergyConsumed_Wh: optionalNonNegative,
    totalEnergyRegenerated_Wh: optionalNonNegative,
    chargingStationId: optionalText,
  })
  .superRefine((row, ctx) => {
    const hasCapacity = row.maximumBatteryCapacity_Wh !== undefined && row.maximumBatteryCapacity_Wh > 0;
    if (!hasCapacity && row.battery_soc_percent === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['battery_soc_percent'],
        message: 'state of charge needs battery_soc_percent or a positive maximumBatteryCapacity_Wh',
      });
    }
  });

export const tripRowSchema = z
  .object({
    vehicle_id: requiredText,
    vehicle_type: optionalText,
    depart_sec: requiredNumber,
    arrival_sec: requiredNumber,
    route_length_m: nonNegative,
    duration_sec: optionalNonNegative,
    waiting_time_sec: optionalNonNegative,
    max_speed_ms: optionalNonNegative,
  })
  .superRefine((row, ctx) => {
    if (row.arrival_sec < row.depart_sec) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['arrival_sec'],
        message: `arrival ${row.arrival_sec} before departure ${row.depart_sec}`,
      });
    }
  });

export const chargingRowSchema = z
  .object({
    station_id: requiredText,
    vehicle_id: requiredText,
    start_sec: requiredNumber,
    end_sec: requiredNumber,
    energy_delivered_Wh: nonNegative,
  })
  .superRefine((row, ctx) => {
    if (row.end_sec < row.start_sec) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_sec'],
        message: `end ${row.end_sec} before start ${row.start_sec}`,
      });
    }
  });

export type RawVehicleRow = z.output<typeof vehicleRowSchema>;
export type RawBatteryRow = z.output<typeof batteryRowSchema>;
export type RawTripRow = z.output<typeof tripRowSchema>;
export type RawChargingRow = z.output<typeof chargingRowSchema>;

export interface RawRowByStream {
  vehicle: RawVehicleRow;
  battery: RawBatteryRow;
  trip: RawTripRow;
  charging: RawChargingRow;
}

export type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const ROW_SCHEMAS: { [K in StreamKind]: RowSchema<RawRowByStream[K]> } = {
  vehicle: vehicleRowSchema,
  battery: batteryRowSchema,
  trip: tripRowSchema,
  charging: chargingRowSchema,
};

/** Columns a header must name for the stream to be readable at all. */
export const REQUIRED_COLUMNS: Readonly<Record<StreamKind, readonly string[]>> = {
  vehicle: ['timestep_sec', 'vehicle_id', 'speed_ms', 'x_position_m', 'y_position_m'],
  battery: ['timestep_sec', 'vehicle_id', 'actualBatteryCapacity_Wh'],
  trip: ['vehicle_id', 'depart_sec', 'arrival_sec', 'route_length_m'],
  charging: ['station_id', 'vehicle_id', 'start_sec', 'end_sec', 'energy_delivered_Wh'],
};

/** Flatten zod issues into one line: `field: message; field: message`. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
