import type { AggregatedReport } from '../../entities/location-counts.js';

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

export interface ReportFilters {
  location?: string;
  vehicle?: string;
}

// ---------------------------------------------------------------------------
// Query outcome: a query either collects every location or runs out of time
// ---------------------------------------------------------------------------

export interface QueryComplete {
  status: 'complete';
  queryId: string;
  report: AggregatedReport;
}

export interface QueryTimedOut {
  status: 'timed_out';
  queryId: string;
  /** Locations that had not replied when the deadline passed */
  pending: string[];
  elapsedMs: number;
}

export type QueryOutcome = QueryComplete | QueryTimedOut;

// ---------------------------------------------------------------------------
// Inbound port
// ---------------------------------------------------------------------------

export interface TrafficQueryPort {
  listLocations(): string[];
  queryReport(filters: ReportFilters): Promise<QueryOutcome>;
}
