// Vehicle types a sensor can report

export const VEHICLE_TYPES = ['car', 'motorcycle', 'bus'] as const;

export type VehicleType = (typeof VEHICLE_TYPES)[number];

export function isVehicleType(label: string): label is VehicleType {
  return VEHICLE_TYPES.some((type) => type === label);
}
