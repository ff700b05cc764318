export interface SpeedStatistics {
  readonly count: number;
  readonly min: number;
  readonly max: number;
  readonly mean: number;
  /** Population variance. */
  readonly variance: number;
  readonly stdDev: number;
}

export interface EnergyStatistics {
  readonly batterySampleCount: number;
  readonly initialSoc: number;
  readonly finalSoc: number;
  readonly minSoc: number;
  readonly consumedWh: number;
  readonly regeneratedWh: number;
  readonly netEnergyWh: number;
  readonly rechargedWh: number;
  readonly energyPerKmWh: number | null;
  readonly regenerationRatio: number | null;
}

export interface TripFigures {
  readonly departTs: number;
  readonly arrivalTs: number;
  readonly distance: number;
  readonly duration: number;
  readonly waitingTime: number;
  readonly averageSpeed: number | null;
  readonly maxSpeed: number | null;
}

export type FinalizationCause = 'trip_summary' | 'end_of_input';

/**
 * Per-vehicle statistics for one episode (one open window of a vehicle id).
 * `speed` and `energy` are null when the vehicle had no matching samples,
 * which is distinct from a true zero.
 */
export interface VehicleAggregate {
  readonly vehicleId: string;
  readonly episode: number;
  readonly vehicleType: string | null;
  readonly sampleCount: number;
  readonly speed: SpeedStatistics | null;
  readonly firstSeenTs: number | null;
  readonly lastSeenTs: number | null;
  readonly pathDistance: number;
  readonly distance: number;
  readonly dwellTime: number;
  readonly energy: EnergyStatistics | null;
  readonly chargingSessionCount: number;
  readonly chargingEnergyWh: number;
  readonly chargingDuration: number;
  readonly trip: TripFigures | null;
  readonly finalizedBy: FinalizationCause;
  readonly missingCorrelation: boolean;
}
