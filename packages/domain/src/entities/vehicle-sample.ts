/** One position/speed sample, produced once per simulation step per active vehicle. */
export interface VehicleSample {
  readonly kind: 'vehicle_sample';
  readonly vehicleId: string;
  readonly ts: number; // simulation seconds
  readonly x: number;
  readonly y: number;
  readonly speed: number; // m/s
  readonly acceleration?: number;
  readonly vehicleType?: string;
  readonly lane?: string;
  readonly angle?: number;
  /** Cumulative odometer reported by the simulator, metres. */
  readonly distanceTraveled?: number;
  readonly waitingTime?: number;
}
