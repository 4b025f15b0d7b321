export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly code: string = 'http_error',
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** A query ran past its deadline before every location replied. */
export class QueryTimeoutError extends HttpError {
  constructor(
    readonly queryId: string,
    readonly pending: string[],
  ) {
    super(504, `query ${queryId} timed out waiting for ${pending.length} location(s)`, 'query_timeout');
    this.name = 'QueryTimeoutError';
  }
}
