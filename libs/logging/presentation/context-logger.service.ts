import { Injectable, LoggerService } from "@nestjs/common";
import { LogRecord } from "@logging/domain";
import { LogBackendPort } from "@logging/out-ports";
import {
  FRAMEWORK_ERROR_LOGGER,
  FRAMEWORK_LOGGER,
  LogLevel,
} from "@logging/value-objects";

/**
 * ContextLoggerService - Routes Nest's Logger into the configured backend.
 *
 * Use with `app.useLogger(app.get(ContextLoggerService))`. Errors go to
 * "nest.error"; everything else to "nest.<context>".
 */
@Injectable()
export class ContextLoggerService implements LoggerService {
  constructor(private readonly backend: LogBackendPort) {}

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.INFO, message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.ERROR, message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.ERROR, message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.WARN, message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.DEBUG, message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write(LogLevel.VERBOSE, message, optionalParams);
  }

  private write(level: LogLevel, message: unknown, params: unknown[]): void {
    // Nest appends the logger context as the last string parameter.
    const last = params[params.length - 1];
    const context =
      typeof last === "string" && params.length > 0 ? last : undefined;
    const rest = context === undefined ? params : params.slice(0, -1);

    const fields: LogRecord = { context: context ?? "-" };
    const isError = level === LogLevel.ERROR;
    if (isError && typeof rest[0] === "string") {
      fields.stack = rest[0];
    }

    const loggerName = isError
      ? FRAMEWORK_ERROR_LOGGER
      : context
        ? `${FRAMEWORK_LOGGER}.${context}`
        : FRAMEWORK_LOGGER;

    this.backend.write(loggerName, level, formatMessage(message), fields);
  }
}

function formatMessage(message: unknown): string {
  if (typeof message === "string") return message;
  if (message instanceof Error) return message.message;
  if (typeof message === "object" && message !== null) {
    return JSON.stringify(message);
  }
  return String(message);
}
