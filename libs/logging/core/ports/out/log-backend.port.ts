import { LoggingConfigDocument, LogRecord } from "@logging/domain";
import { LogLevel } from "@logging/value-objects";

/**
 * LogBackendPort - Outbound port to the process-wide logging backend.
 *
 * The configurator only produces a document; applying it, and writing
 * records through the result, is the backend's job.
 */
export abstract class LogBackendPort {
  /**
   * Replace the active configuration with `document`.
   * Throws InvalidLogConfigError when the document cannot be applied.
   */
  abstract applyConfig(document: LoggingConfigDocument): void;

  /**
   * Route runtime warnings (process "warning" events) to the log.
   */
  abstract captureWarnings(capture: boolean): void;

  abstract write(
    loggerName: string,
    level: LogLevel,
    message: string,
    fields?: LogRecord,
  ): void;
}
