import { ContextResponse } from '../context-request';
import { LogContext } from '../log-context';
import { LogRecord, LogRecordFilter } from '../log-record';

/** Extra record field rendered by the ACCESS format. */
export const RESPONSE_TIME_MS_FIELD = 'response_time_ms';

/**
 * Response time of the current request.
 *
 * The slot holds the request start (epoch ms); records and the response
 * carry the elapsed milliseconds instead.
 */
export class ResponseTimeContext extends LogContext<number | null> {
  constructor(private readonly clock: () => number = Date.now) {
    super('response_time', null);
  }

  extractFromRequest(): number {
    return this.clock();
  }

  /**
   * Elapsed milliseconds since the request started, or "-" outside a request.
   */
  elapsed(): string {
    const startedAt = this.get();
    return startedAt === null ? '-' : String(this.clock() - startedAt);
  }

  override prepareResponse(response: ContextResponse): void {
    response.setHeader('X-Response-Time', `${this.elapsed()}ms`);
  }

  override createFilter(): LogRecordFilter {
    return {
      filter: (record: LogRecord): boolean => {
        const elapsed = this.elapsed();
        record[this.contextVarName] = elapsed;
        record[RESPONSE_TIME_MS_FIELD] = elapsed;
        return true;
      },
    };
  }
}
