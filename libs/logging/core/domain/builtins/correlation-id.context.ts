import { randomUUID } from 'crypto';
import { ContextRequest, ContextResponse } from '../context-request';
import { LogContext } from '../log-context';

/**
 * Correlation ID for tracking related requests across services.
 */
export class CorrelationIdContext extends LogContext {
  constructor() {
    super('correlation_id', '-');
  }

  extractFromRequest(request: ContextRequest): string {
    return request.header('x-correlation-id') || randomUUID();
  }

  override prepareResponse(response: ContextResponse, value: string): void {
    response.setHeader('X-Correlation-Id', value);
  }
}
