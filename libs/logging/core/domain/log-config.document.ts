import { ConfigMapping } from '@logging/utils';
import { LogRecordFilterFactory } from './log-record';

/**
 * Logging configuration document.
 *
 * Keys follow the operator-facing YAML vocabulary (snake_case). The merged
 * document may carry anything a custom file or a programmatic override put
 * in it, so it is handled as a plain mapping; the types below describe the
 * generated baseline and what the backend understands.
 */
export type LoggingConfigDocument = ConfigMapping;

export type FormatterConfig = {
  format: string;
};

export type FilterConfig =
  | { factory: LogRecordFilterFactory }
  /** Passes records whose logger name is `name` or one of its children */
  | { name: string };

export type HandlerClass = 'console' | 'file' | 'stream';

export type HandlerConfig = {
  class: HandlerClass;
  formatter?: string;
  level?: string;
  filters?: string[];
  /** Consumed by the auto-filter pass */
  auto_filters?: boolean;
  /** Consumed by the auto-filter pass */
  exclude_filters?: string[];
  /** `file` handlers */
  filename?: string;
};

export type LoggerConfig = {
  level?: string;
  handlers: string[];
  propagate?: boolean;
};

export type BaseLoggingConfig = {
  version: number;
  disable_existing_loggers: boolean;
  formatters: Record<string, FormatterConfig>;
  filters: Record<string, FilterConfig>;
  handlers: Record<string, HandlerConfig>;
  loggers: Record<string, LoggerConfig>;
  root: Omit<LoggerConfig, 'propagate'>;
};
