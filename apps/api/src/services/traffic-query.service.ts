import type { QueryOutcome, ReportFilters, TrafficQueryPort } from '@traffic-counter/domain';
import type { AggregatorRegistry } from './aggregation/aggregator-registry.js';
import type { QueryCoordinator } from './aggregation/query-coordinator.js';
import { applyReportFilters } from './aggregation/report-filters.js';

export class TrafficQueryService implements TrafficQueryPort {
  constructor(
    private readonly registry: AggregatorRegistry,
    private readonly coordinator: QueryCoordinator,
  ) {}

  listLocations(): string[] {
    return this.registry.listLocations();
  }

  /** Collects every location, then filters. A timed-out outcome passes through untouched. */
  async queryReport(filters: ReportFilters): Promise<QueryOutcome> {
    const outcome = await this.coordinator.collect();
    if (outcome.status !== 'complete') return outcome;
    return { ...outcome, report: applyReportFilters(outcome.report, filters) };
  }
}
