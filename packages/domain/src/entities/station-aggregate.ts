export interface StationAggregate {
  readonly stationId: string;
  readonly sessionCount: number;
  readonly totalEnergyWh: number;
  /** Time during which at least one vehicle occupied the station. */
  readonly occupiedDuration: number;
  /** Sum of individual session lengths. */
  readonly sessionDuration: number;
  readonly overlapCount: number;
  readonly peakConcurrency: number;
  readonly firstSessionStartTs: number | null;
  readonly lastSessionEndTs: number | null;
  readonly averagePowerW: number | null;
  readonly throughputPerHour: number | null;
  readonly averageSocAtStart: number | null;
  readonly vehicleIds: readonly string[];
}
