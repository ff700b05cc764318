export interface BatteryState {
  readonly kind: 'battery_state';
  readonly vehicleId: string;
  readonly ts: number;
  readonly remainingEnergyWh: number;
  /** Fraction in [0, 1]. */
  readonly stateOfCharge: number;
  readonly maxCapacityWh?: number;
  readonly totalEnergyConsumedWh?: number;
  readonly totalEnergyRegeneratedWh?: number;
  readonly chargingStationId?: string;
}
