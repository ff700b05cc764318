/** One charging session at a station: an interval, not a point sample. */
export interface ChargingEvent {
  readonly kind: 'charging_event';
  readonly stationId: string;
  readonly vehicleId: string;
  readonly startTs: number;
  readonly endTs: number;
  readonly energyDeliveredWh: number;
}
