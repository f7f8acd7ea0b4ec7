import { Inject, Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { parse } from "yaml";
import loggingConfig, { LoggingSettings } from "@config/utils/logging.config";
import {
  BaseLoggingConfig,
  LoggingConfigDocument,
  RESPONSE_TIME_MS_FIELD,
} from "@logging/domain";
import { InvalidConfigFileError } from "@logging/exceptions";
import {
  ConfigureOptions,
  LogConfigurationUseCase,
} from "@logging/in-ports";
import { LogBackendPort } from "@logging/out-ports";
import {
  ConfigMapping,
  deepMerge,
  isMapping,
  setEntry,
  toStringList,
} from "@logging/utils";
import {
  FRAMEWORK_ACCESS_LOGGER,
  FRAMEWORK_ERROR_LOGGER,
  FRAMEWORK_LOGGER,
  LogFormatType,
} from "@logging/value-objects";
import { LogContextRegistry } from "./log-context.registry";

/**
 * LogConfigurator - Synthesizes the logging configuration.
 *
 * The baseline is generated from the registered log contexts (one filter
 * per context, one tag per context in each format), then the custom config
 * file and a programmatic override are deep-merged over it, and finally the
 * context filters are attached to every handler that does not opt out.
 *
 * Handlers opt out with:
 * - `auto_filters: false` (no filter is attached)
 * - `exclude_filters: [name, ...]` (the listed filters are not attached)
 */
@Injectable()
export class LogConfigurator
  extends LogConfigurationUseCase
  implements OnModuleInit
{
  private readonly logger = new Logger(LogConfigurator.name);

  constructor(
    @Inject(loggingConfig.KEY)
    private readonly settings: LoggingSettings,
    private readonly registry: LogContextRegistry,
    private readonly backend: LogBackendPort,
  ) {
    super();
  }

  onModuleInit(): void {
    this.configure();
  }

  override configure({
    extra,
    apply = true,
  }: ConfigureOptions = {}): LoggingConfigDocument {
    const custom = this.loadCustomConfigFile(this.settings.logConfigPath);

    let merged = deepMerge(this.buildBaseConfig(), custom);
    merged = deepMerge(merged, extra);
    merged = this.autoApplyFilters(merged);

    if (apply) {
      this.backend.applyConfig(merged);
      this.backend.captureWarnings(true);
      this.logger.log(
        `Logging configured with contexts: ${[...this.registry.contexts.keys()].join(", ") || "none"}`,
      );
    }

    return merged;
  }

  buildBaseConfig(): BaseLoggingConfig {
    const level = this.settings.logLevel;

    return {
      version: 1,
      disable_existing_loggers: false,
      formatters: {
        standard: { format: this.buildFormat(LogFormatType.STANDARD) },
        access: { format: this.buildFormat(LogFormatType.ACCESS) },
      },
      filters: this.registry.createFilterConfig(),
      handlers: {
        console: { class: "console", formatter: "standard", level },
        access_console: { class: "console", formatter: "access", level },
      },
      loggers: {
        [FRAMEWORK_LOGGER]: { level, handlers: ["console"], propagate: false },
        [FRAMEWORK_ERROR_LOGGER]: {
          level,
          handlers: ["console"],
          propagate: false,
        },
        [FRAMEWORK_ACCESS_LOGGER]: {
          level,
          handlers: ["access_console"],
          propagate: false,
        },
      },
      root: { level, handlers: ["console"] },
    };
  }

  /**
   * Format string with one `[name: %(name)s]` tag per registered context.
   */
  buildFormat(type: LogFormatType): string {
    let format = "[%(asctime)s][%(levelname)s]";
    if (type === LogFormatType.ACCESS) {
      format += "[ACCESS]";
    }

    for (const name of this.registry.contexts.keys()) {
      format += `[${name}: %(${name})s]`;
    }

    if (
      type === LogFormatType.ACCESS &&
      this.registry.contexts.has("response_time")
    ) {
      format += `[${RESPONSE_TIME_MS_FIELD}: %(${RESPONSE_TIME_MS_FIELD})s]`;
    }

    return format + "[%(name)s]: %(message)s";
  }

  /**
   * Load the custom logging config. A missing or blank file yields `{}`.
   */
  loadCustomConfigFile(logPath: string): ConfigMapping {
    const absolutePath = resolve(logPath);

    if (!existsSync(absolutePath)) {
      return {};
    }

    let config: unknown;
    try {
      config = parse(readFileSync(absolutePath, "utf8"));
    } catch (error) {
      throw new InvalidConfigFileError(logPath, error);
    }

    if (config === null || config === undefined) {
      return {};
    }
    if (!isMapping(config)) {
      throw new InvalidConfigFileError(logPath);
    }

    return config;
  }

  /**
   * Attach every configured filter to every handler that does not opt out.
   *
   * Declared filters keep their order; missing ones are appended sorted.
   * A handler that declared none and gets none keeps no `filters` key.
   * Returns `config` itself when it has no `filters` or no `handlers`.
   */
  autoApplyFilters(config: LoggingConfigDocument): LoggingConfigDocument {
    if (!("filters" in config) || !("handlers" in config)) {
      return config;
    }

    const { filters, handlers } = config;
    if (!isMapping(filters) || !isMapping(handlers)) {
      return config;
    }

    const allFilterNames = Object.keys(filters);
    const normalized: ConfigMapping = {};

    for (const [handlerName, handlerConfig] of Object.entries(handlers)) {
      if (!isMapping(handlerConfig)) {
        setEntry(normalized, handlerName, handlerConfig);
        continue;
      }

      const {
        auto_filters: autoFilters = true,
        exclude_filters: excludeFilters,
        ...handler
      } = handlerConfig;
      setEntry(normalized, handlerName, handler);

      if (!autoFilters) {
        continue;
      }

      const excluded = new Set(toStringList(excludeFilters));

      let existing: unknown[] = [];
      if ("filters" in handler) {
        if (Array.isArray(handler.filters)) {
          existing = handler.filters;
        } else {
          handler.filters = existing;
        }
      }
      const declared = new Set(existing);

      const filtersToAdd = allFilterNames
        .filter((name) => !excluded.has(name) && !declared.has(name))
        .sort();

      if (filtersToAdd.length > 0 || existing.length > 0) {
        handler.filters = [...existing, ...filtersToAdd];
      }
    }

    return { ...config, handlers: normalized };
  }
}
