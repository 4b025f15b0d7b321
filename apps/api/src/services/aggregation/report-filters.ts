import { isVehicleType } from '@traffic-counter/domain';
import type {
  AggregatedReport,
  LocationCounts,
  ReportFilters,
  VehicleType,
} from '@traffic-counter/domain';

export function filterByLocation(report: AggregatedReport, location: string): LocationCounts[] {
  return report.filter((entry) => entry.location === location);
}

/**
 * Narrows every entry to a single vehicle type. Entries are kept even when
 * nothing is left (an unknown vehicle name yields `data: {}`).
 */
export function filterByVehicle(report: AggregatedReport, vehicle: string): LocationCounts[] {
  return report.map((entry) => {
    const data: Partial<Record<VehicleType, number>> = {};
    if (isVehicleType(vehicle)) {
      const count = entry.data[vehicle];
      if (count !== undefined) data[vehicle] = count;
    }
    return { location: entry.location, data };
  });
}

/** Location filter first, then vehicle filter. */
export function applyReportFilters(
  report: AggregatedReport,
  filters: ReportFilters,
): LocationCounts[] {
  let result: LocationCounts[] = [...report];
  if (filters.location !== undefined) result = filterByLocation(result, filters.location);
  if (filters.vehicle !== undefined) result = filterByVehicle(result, filters.vehicle);
  return result;
}
