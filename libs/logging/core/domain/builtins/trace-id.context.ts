import { randomUUID } from 'crypto';
import { ContextRequest, ContextResponse } from '../context-request';
import { LogContext } from '../log-context';

/**
 * Trace ID for distributed tracing. The same header is read on the way in
 * and written on the way out.
 */
export class TraceIdContext extends LogContext {
  constructor(public readonly headerName: string = 'X-Trace-Id') {
    super('trace_id', '-');
  }

  extractFromRequest(request: ContextRequest): string {
    return request.header(this.headerName.toLowerCase()) || randomUUID();
  }

  override prepareResponse(response: ContextResponse, value: string): void {
    response.setHeader(this.headerName, value);
  }
}
