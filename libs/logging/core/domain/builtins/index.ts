import { LogContextClass } from '../log-context';
import { CorrelationIdContext } from './correlation-id.context';
import { RequestIdContext } from './request-id.context';
import { ResponseTimeContext } from './response-time.context';
import { TraceIdContext } from './trace-id.context';
import { UserIdContext } from './user-id.context';

export { CorrelationIdContext } from './correlation-id.context';
export { RequestIdContext } from './request-id.context';
export { ResponseTimeContext, RESPONSE_TIME_MS_FIELD } from './response-time.context';
export { TraceIdContext } from './trace-id.context';
export { UserIdContext, USER_ID_ATTRIBUTE } from './user-id.context';

/**
 * Builtin log contexts resolvable by name, e.g. from `LOG_CONTEXTS`.
 * A name must map to exactly one class to be registered.
 */
export type BuiltinLogContextTable = Readonly<
  Record<string, readonly LogContextClass[]>
>;

export const BUILTIN_LOG_CONTEXTS: BuiltinLogContextTable = {
  correlation_id: [CorrelationIdContext],
  request_id: [RequestIdContext],
  trace_id: [TraceIdContext],
  user_id: [UserIdContext],
  response_time: [ResponseTimeContext],
};
