/** Emitted exactly once per vehicle, at trip completion. */
export interface TripSummary {
  readonly kind: 'trip_summary';
  readonly vehicleId: string;
  readonly vehicleType?: string;
  readonly departTs: number;
  readonly arrivalTs: number;
  readonly distance: number; // metres
  readonly duration: number; // seconds
  readonly waitingTime: number;
  readonly maxSpeed?: number;
}
