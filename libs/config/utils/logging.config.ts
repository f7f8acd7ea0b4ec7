import { registerAs } from "@nestjs/config";
import { plainToInstance } from "class-transformer";
import {
  ArrayUnique,
  IsArray,
  IsEnum,
  IsNotEmpty,
  IsString,
  validateSync,
} from "class-validator";
import { InvalidLoggingSettingsError } from "@logging/exceptions";
import { LogLevel, parseLogLevel } from "@logging/value-objects";

export const DEFAULT_LOG_CONTEXTS = [
  "correlation_id",
  "request_id",
  "trace_id",
  "user_id",
];

/**
 * Logging settings consumed by the logging library.
 */
export class LoggingSettings {
  /** Level of the generated handlers, loggers and root */
  @IsEnum(LogLevel)
  logLevel: LogLevel = LogLevel.INFO;

  /** Builtin log contexts to register, in order */
  @IsArray()
  @ArrayUnique()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  logContexts: string[] = [...DEFAULT_LOG_CONTEXTS];

  /** Custom logging config merged over the generated baseline */
  @IsString()
  @IsNotEmpty()
  logConfigPath: string = "logging.yaml";
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Build validated settings from environment variables:
 * LOG_LEVEL, LOG_CONTEXTS (comma separated) and LOG_CONFIG_PATH.
 * Unset variables keep their defaults.
 */
export function loadLoggingSettings(
  env: NodeJS.ProcessEnv = process.env,
): LoggingSettings {
  const plain: Record<string, unknown> = {};
  if (env.LOG_LEVEL !== undefined)
    plain.logLevel = parseLogLevel(env.LOG_LEVEL) ?? env.LOG_LEVEL;
  if (env.LOG_CONTEXTS !== undefined)
    plain.logContexts = parseList(env.LOG_CONTEXTS);
  if (env.LOG_CONFIG_PATH !== undefined)
    plain.logConfigPath = env.LOG_CONFIG_PATH;

  const settings = plainToInstance(LoggingSettings, plain);
  const errors = validateSync(settings);

  if (errors.length > 0) {
    throw new InvalidLoggingSettingsError(
      errors.flatMap((error) => Object.values(error.constraints ?? {})),
    );
  }

  return settings;
}

/**
 * Logging Configuration
 *
 * Exposes the validated LoggingSettings through ConfigService under "logging".
 */
export default registerAs("logging", () => loadLoggingSettings());
