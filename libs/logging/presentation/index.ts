export { AccessLogInterceptor } from "./access-log.interceptor";
export { ContextLoggerService } from "./context-logger.service";
export { ContextMiddleware } from "./context.middleware";
export { toContextRequest, toContextResponse } from "./express-request";
export { LogContextInterceptor } from "./log-context.interceptor";
