import { LoggingConfigDocument } from "@logging/domain";
import { ConfigMapping } from "@logging/utils";

export interface ConfigureOptions {
  /** Programmatic override, merged last */
  extra?: ConfigMapping;
  /** Install the result into the logging backend (default: true) */
  apply?: boolean;
}

/**
 * LogConfigurationUseCase - Inbound port for building the logging setup.
 */
export abstract class LogConfigurationUseCase {
  /**
   * Build the baseline from the registered log contexts, merge the custom
   * config file and `extra` over it, attach filters to handlers and
   * optionally apply the result.
   *
   * @returns The merged document
   */
  abstract configure(options?: ConfigureOptions): LoggingConfigDocument;
}
