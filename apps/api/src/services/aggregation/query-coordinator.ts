import { v4 as uuidv4 } from 'uuid';
import type {
  CountMap,
  LocationAggregatorPort,
  LocationCounts,
  QueryOutcome,
} from '@traffic-counter/domain';

export const DEFAULT_QUERY_TIMEOUT_MS = 5_000;

type QueryState = 'collecting' | 'complete' | 'timed_out';

export interface AggregatorSource {
  allAggregators(): LocationAggregatorPort[];
}

export interface QueryCoordinatorOptions {
  timeoutMs?: number;
}

function byLocation(a: LocationCounts, b: LocationCounts): number {
  if (a.location < b.location) return -1;
  return a.location > b.location ? 1 : 0;
}

/** Asks for a snapshot now; a synchronous throw becomes a rejected reply. */
function requestSnapshot(aggregator: LocationAggregatorPort): Promise<CountMap> {
  try {
    return aggregator.snapshot();
  } catch (err) {
    return Promise.reject(err);
  }
}

/**
 * Fans a snapshot request out to every registered aggregator and joins the
 * replies into one report. Each `collect()` call is an independent run with
 * its own deadline; concurrent queries share nothing but the registry.
 */
export class QueryCoordinator {
  private readonly timeoutMs: number;

  constructor(
    private readonly source: AggregatorSource,
    options: QueryCoordinatorOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
  }

  collect(): Promise<QueryOutcome> {
    const queryId = uuidv4();
    const aggregators = this.source.allAggregators();
    const startedAt = Date.now();

    if (aggregators.length === 0) {
      return Promise.resolve<QueryOutcome>({ status: 'complete', queryId, report: [] });
    }

    return new Promise<QueryOutcome>((resolve) => {
      const replies = new Map<string, CountMap>();
      let state: QueryState = 'collecting';

      const timer = setTimeout(() => {
        if (state !== 'collecting') return;
        state = 'timed_out';
        const pending = aggregators
          .map((aggregator) => aggregator.location)
          .filter((location) => !replies.has(location))
          .sort();
        const elapsedMs = Date.now() - startedAt;
        console.warn(
          `[query] ${queryId} timed out after ${elapsedMs}ms, ${pending.length}/${aggregators.length} location(s) pending`,
        );
        resolve({ status: 'timed_out', queryId, pending, elapsedMs });
      }, this.timeoutMs);

      for (const aggregator of aggregators) {
        void requestSnapshot(aggregator).then(
          (counts) => {
            if (state !== 'collecting') return;
            replies.set(aggregator.location, counts);
            if (replies.size < aggregators.length) return;

            state = 'complete';
            clearTimeout(timer);
            const report = [...replies].map(([location, data]) => ({ location, data })).sort(byLocation);
            resolve({ status: 'complete', queryId, report });
          },
          // A failed reply counts as no reply: the deadline reports the location as pending.
          (err: unknown) => {
            console.error(`[query] ${queryId} snapshot failed for ${aggregator.location}`, err);
          },
        );
      }
    });
  }
}
