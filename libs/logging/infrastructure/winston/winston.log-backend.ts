import { Injectable, OnModuleDestroy } from "@nestjs/common";
import { AsyncResource } from "async_hooks";
import { Writable } from "stream";
import * as winston from "winston";
import Transport from "winston-transport";
import {
  isLogRecordFilter,
  LoggingConfigDocument,
  LogRecord,
  LogRecordFilter,
} from "@logging/domain";
import { InvalidLogConfigError } from "@logging/exceptions";
import { LogBackendPort } from "@logging/out-ports";
import {
  ConfigMapping,
  getMapping,
  isMapping,
  renderTemplate,
  toStringList,
} from "@logging/utils";
import {
  LOG_LEVEL_PRIORITIES,
  LogLevel,
  parseLogLevel,
} from "@logging/value-objects";

export const WARNINGS_LOGGER = "node.warnings";

const DEFAULT_TEMPLATE = "%(message)s";
const FALLBACK_TEMPLATE = "[%(asctime)s][%(levelname)s][%(name)s]: %(message)s";

/** Runs a callback in the async context of the `write` call. */
type WriterScope = <R>(fn: () => R) => R;

const WRITER_SCOPE = Symbol("writerScope");

const runInline: WriterScope = (fn) => fn();

interface ActiveConfig {
  root: winston.Logger;
  loggers: Map<string, winston.Logger>;
}

/**
 * WinstonLogBackend - Applies logging config documents to winston.
 *
 * - each handler becomes a winston transport whose format runs the
 *   handler's filters, then renders its formatter's `%(field)s` template
 * - each `loggers` entry (and root) becomes a winston logger writing to its
 *   own handlers plus, unless `propagate: false`, its parent's
 *
 * Logger names are dotted; a name without its own entry resolves to its
 * nearest configured ancestor, then root.
 */
@Injectable()
export class WinstonLogBackend extends LogBackendPort implements OnModuleDestroy {
  private active: ActiveConfig = {
    root: this.createFallbackRoot(),
    loggers: new Map(),
  };
  private readonly disabled = new Set<string>();
  private capturingWarnings = false;

  private readonly onWarning = (warning: Error): void => {
    this.write(WARNINGS_LOGGER, LogLevel.WARN, `${warning.name}: ${warning.message}`);
  };

  override applyConfig(document: LoggingConfigDocument): void {
    const formatters = this.buildFormatters(getMapping(document, "formatters"));
    const filters = this.buildFilters(getMapping(document, "filters"));
    const transports = this.buildTransports(
      getMapping(document, "handlers"),
      formatters,
      filters,
    );
    let next: ActiveConfig;
    try {
      next = this.buildLoggers(document, transports);
    } catch (error) {
      closeTransports(transports.values());
      throw error;
    }

    if (document.disable_existing_loggers === true) {
      for (const name of this.active.loggers.keys()) {
        if (!next.loggers.has(name)) this.disabled.add(name);
      }
    }
    for (const name of next.loggers.keys()) {
      this.disabled.delete(name);
    }

    this.dispose(this.active);
    this.active = next;
  }

  override captureWarnings(capture: boolean): void {
    if (capture === this.capturingWarnings) return;

    if (capture) {
      process.on("warning", this.onWarning);
    } else {
      process.off("warning", this.onWarning);
    }
    this.capturingWarnings = capture;
  }

  override write(
    loggerName: string,
    level: LogLevel,
    message: string,
    fields: LogRecord = {},
  ): void {
    if (this.disabled.has(loggerName)) return;

    const logger = this.resolveLogger(loggerName);
    if (!isEnabled(logger, level)) return;

    const info = {
      ...fields,
      level,
      message,
      name: loggerName,
      [WRITER_SCOPE]: AsyncResource.bind(runInline),
    };
    logger.log(info);
  }

  onModuleDestroy(): void {
    this.captureWarnings(false);
    this.dispose(this.active);
    this.active = { root: this.createFallbackRoot(), loggers: new Map() };
  }

  private resolveLogger(name: string): winston.Logger {
    for (let current = name; current; current = parentName(current)) {
      const logger = this.active.loggers.get(current);
      if (logger) return logger;
    }
    return this.active.root;
  }

  private buildFormatters(section: ConfigMapping | undefined): Map<string, string> {
    const formatters = new Map<string, string>();
    for (const [name, entry] of Object.entries(section ?? {})) {
      const format = isMapping(entry) ? entry.format : undefined;
      if (typeof format !== "string") {
        throw new InvalidLogConfigError(
          `Formatter '${name}' must define a string 'format'`,
        );
      }
      formatters.set(name, format);
    }
    return formatters;
  }

  private buildFilters(
    section: ConfigMapping | undefined,
  ): Map<string, LogRecordFilter> {
    const filters = new Map<string, LogRecordFilter>();
    for (const [name, entry] of Object.entries(section ?? {})) {
      if (!isMapping(entry)) {
        throw new InvalidLogConfigError(`Filter '${name}' must be a mapping`);
      }

      if (typeof entry.factory === "function") {
        const instance: unknown = entry.factory();
        if (!isLogRecordFilter(instance)) {
          throw new InvalidLogConfigError(
            `Filter factory '${name}' did not return a filter`,
          );
        }
        filters.set(name, instance);
      } else {
        filters.set(
          name,
          loggerNameFilter(typeof entry.name === "string" ? entry.name : ""),
        );
      }
    }
    return filters;
  }

  private buildTransports(
    section: ConfigMapping | undefined,
    formatters: Map<string, string>,
    filters: Map<string, LogRecordFilter>,
  ): Map<string, Transport> {
    const transports = new Map<string, Transport>();
    try {
      for (const [name, entry] of Object.entries(section ?? {})) {
        if (!isMapping(entry)) {
          throw new InvalidLogConfigError(`Handler '${name}' must be a mapping`);
        }
        transports.set(name, this.createTransport(name, entry, formatters, filters));
      }
    } catch (error) {
      closeTransports(transports.values());
      throw error;
    }
    return transports;
  }

  protected createTransport(
    name: string,
    handler: ConfigMapping,
    formatters: Map<string, string>,
    filters: Map<string, LogRecordFilter>,
  ): Transport {
    let template = DEFAULT_TEMPLATE;
    if (handler.formatter !== undefined) {
      const formatter =
        typeof handler.formatter === "string"
          ? formatters.get(handler.formatter)
          : undefined;
      if (formatter === undefined) {
        throw new InvalidLogConfigError(
          `Handler '${name}' references unknown formatter '${String(handler.formatter)}'`,
        );
      }
      template = formatter;
    }

    const handlerFilters = toStringList(handler.filters).map((filterName) => {
      const filter = filters.get(filterName);
      if (!filter) {
        throw new InvalidLogConfigError(
          `Handler '${name}' references unknown filter '${filterName}'`,
        );
      }
      return filter;
    });

    const options = {
      level: parseLogLevel(handler.level) ?? LogLevel.DEBUG,
      format: winston.format.combine(
        applyFilters(handlerFilters),
        renderRecord(template),
      ),
    };

    switch (handler.class) {
      case "console":
        return new winston.transports.Console(options);
      case "file":
        if (typeof handler.filename !== "string") {
          throw new InvalidLogConfigError(
            `File handler '${name}' must define a 'filename'`,
          );
        }
        return new winston.transports.File({
          ...options,
          filename: handler.filename,
        });
      case "stream":
        if (!(handler.stream instanceof Writable)) {
          throw new InvalidLogConfigError(
            `Stream handler '${name}' must define a writable 'stream'`,
          );
        }
        return new winston.transports.Stream({
          ...options,
          stream: handler.stream,
        });
      default:
        throw new InvalidLogConfigError(
          `Handler '${name}' has unknown class '${String(handler.class)}'`,
        );
    }
  }

  private buildLoggers(
    document: LoggingConfigDocument,
    transports: Map<string, Transport>,
  ): ActiveConfig {
    const handlersOf = (owner: string, entry: ConfigMapping): Transport[] =>
      toStringList(entry.handlers).map((handlerName) => {
        const transport = transports.get(handlerName);
        if (!transport) {
          throw new InvalidLogConfigError(
            `Logger '${owner}' references unknown handler '${handlerName}'`,
          );
        }
        return transport;
      });

    const rootEntry = getMapping(document, "root") ?? {};
    const rootLevel = parseLogLevel(rootEntry.level) ?? LogLevel.WARN;
    const rootTransports = handlersOf("root", rootEntry);

    const entries = new Map<string, ConfigMapping>();
    for (const [name, entry] of Object.entries(
      getMapping(document, "loggers") ?? {},
    )) {
      if (!isMapping(entry)) {
        throw new InvalidLogConfigError(`Logger '${name}' must be a mapping`);
      }
      entries.set(name, entry);
    }

    // Effective transports: own handlers, then the parent's unless propagate is false.
    const effective = new Map<string, Transport[]>();
    const resolve = (name: string): Transport[] => {
      const cached = effective.get(name);
      if (cached) return cached;

      const entry = entries.get(name) ?? {};
      const own = handlersOf(name, entry);
      let inherited: Transport[] = [];
      if (entry.propagate !== false) {
        let parent = parentName(name);
        while (parent && !entries.has(parent)) parent = parentName(parent);
        inherited = parent ? resolve(parent) : rootTransports;
      }

      const result = [...new Set([...own, ...inherited])];
      effective.set(name, result);
      return result;
    };

    const loggers = new Map<string, winston.Logger>();
    for (const [name, entry] of entries) {
      loggers.set(
        name,
        createLogger(parseLogLevel(entry.level) ?? rootLevel, resolve(name)),
      );
    }

    return { root: createLogger(rootLevel, rootTransports), loggers };
  }

  private createFallbackRoot(): winston.Logger {
    return createLogger(LogLevel.WARN, [
      new winston.transports.Console({ format: renderRecord(FALLBACK_TEMPLATE) }),
    ]);
  }

  private dispose(config: ActiveConfig): void {
    for (const logger of [config.root, ...config.loggers.values()]) {
      logger.clear();
      logger.close();
    }
  }
}

/**
 * Release transports of a document that could not be applied.
 */
function closeTransports(transports: Iterable<Transport>): void {
  for (const transport of transports) {
    transport.close?.();
  }
}

function parentName(name: string): string {
  const index = name.lastIndexOf(".");
  return index === -1 ? "" : name.slice(0, index);
}

function createLogger(level: LogLevel, transports: Transport[]): winston.Logger {
  return winston.createLogger({
    levels: LOG_LEVEL_PRIORITIES,
    level,
    format: winston.format.timestamp(),
    transports,
    silent: transports.length === 0,
    exitOnError: false,
  });
}

/**
 * Logger-level threshold. Transports only fall back to the logger level
 * when they have none of their own, and every configured handler has one.
 */
function isEnabled(logger: winston.Logger, level: LogLevel): boolean {
  const threshold = parseLogLevel(logger.level) ?? LogLevel.WARN;
  return LOG_LEVEL_PRIORITIES[level] <= LOG_LEVEL_PRIORITIES[threshold];
}

/**
 * Passes records whose logger name is `prefix` or one of its children.
 */
function loggerNameFilter(prefix: string): LogRecordFilter {
  return {
    filter: (record: LogRecord): boolean => {
      if (!prefix) return true;
      const name = typeof record.name === "string" ? record.name : "";
      return name === prefix || name.startsWith(`${prefix}.`);
    },
  };
}

function isWriterScope(value: unknown): value is WriterScope {
  return typeof value === "function";
}

/**
 * Context filters read async-local state, while winston may flush a
 * buffered record later from another async context.
 */
function applyFilters(filters: LogRecordFilter[]): winston.Logform.Format {
  return winston.format((info) => {
    const scope: unknown = Reflect.get(info, WRITER_SCOPE);
    const run = isWriterScope(scope) ? scope : runInline;
    return run(() => filters.every((filter) => filter.filter(info)))
      ? info
      : false;
  })();
}

function renderRecord(template: string): winston.Logform.Format {
  return winston.format.printf((info) =>
    renderTemplate(template, {
      ...info,
      asctime: info.timestamp,
      levelname: info.level.toUpperCase(),
    }),
  );
}
