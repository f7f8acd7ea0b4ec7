import { randomUUID } from 'crypto';
import { ContextRequest, ContextResponse } from '../context-request';
import { LogContext } from '../log-context';

export class RequestIdContext extends LogContext {
  constructor() {
    super('request_id', '-');
  }

  extractFromRequest(request: ContextRequest): string {
    return request.header('x-request-id') || randomUUID();
  }

  override prepareResponse(response: ContextResponse, value: string): void {
    response.setHeader('X-Request-Id', value);
  }
}
