import { describe, it, expect } from '@jest/globals';
import type { AggregatedReport } from '@traffic-counter/domain';
import { applyReportFilters, filterByLocation, filterByVehicle } from '../report-filters.js';

const report: AggregatedReport = [
  { location: 'A', data: { car: 4, motorcycle: 0, bus: 2 } },
  { location: 'B', data: { car: 1, motorcycle: 1, bus: 0 } },
];

describe('filterByLocation', () => {
  it('keeps only the matching location', () => {
    expect(filterByLocation(report, 'A')).toEqual([
      { location: 'A', data: { car: 4, motorcycle: 0, bus: 2 } },
    ]);
  });

  it('returns nothing for an unknown location', () => {
    expect(filterByLocation(report, 'C')).toEqual([]);
  });
});

describe('filterByVehicle', () => {
  it('narrows each entry to one vehicle type', () => {
    expect(filterByVehicle(report, 'car')).toEqual([
      { location: 'A', data: { car: 4 } },
      { location: 'B', data: { car: 1 } },
    ]);
  });

  it('keeps zero counts', () => {
    expect(filterByVehicle(report, 'motorcycle')).toEqual([
      { location: 'A', data: { motorcycle: 0 } },
      { location: 'B', data: { motorcycle: 1 } },
    ]);
  });

  it('keeps entries with an empty map for an unknown vehicle', () => {
    expect(filterByVehicle(report, 'truck')).toEqual([
      { location: 'A', data: {} },
      { location: 'B', data: {} },
    ]);
  });

  it('does not mutate the input report', () => {
    filterByVehicle(report, 'bus');
    expect(report[0]?.data).toEqual({ car: 4, motorcycle: 0, bus: 2 });
  });
});

describe('applyReportFilters', () => {
  it('returns the whole report without filters', () => {
    expect(applyReportFilters(report, {})).toEqual(report);
  });

  it('applies location then vehicle', () => {
    expect(applyReportFilters(report, { location: 'B', vehicle: 'bus' })).toEqual([
      { location: 'B', data: { bus: 0 } },
    ]);
  });
});
