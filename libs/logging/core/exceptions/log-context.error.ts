import { LogContextErrorCode } from '@logging/value-objects';

/**
 * Base class for every error raised while building the logging setup.
 */
export class LogContextError extends Error {
  constructor(
    public readonly code: LogContextErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidConfigFileError extends LogContextError {
  constructor(
    public readonly file: string,
    cause?: unknown,
  ) {
    super(
      LogContextErrorCode.INVALID_CONFIG_FILE,
      `File '${file}' is not a valid yaml file`,
      { cause },
    );
  }
}

export class InvalidLogConfigError extends LogContextError {
  constructor(message: string) {
    super(LogContextErrorCode.INVALID_LOG_CONFIG, message);
  }
}

export class InvalidLoggingSettingsError extends LogContextError {
  constructor(public readonly violations: string[]) {
    super(
      LogContextErrorCode.INVALID_SETTINGS,
      `Invalid logging settings: ${violations.join('; ')}`,
    );
  }
}

export class BuiltinLogContextNotFoundError extends LogContextError {
  constructor(public readonly contextName: string) {
    super(
      LogContextErrorCode.BUILTIN_NOT_FOUND,
      `Builtin log context '${contextName}' not found`,
    );
  }
}

export class BuiltinLogContextAmbiguousError extends LogContextError {
  constructor(
    public readonly contextName: string,
    public readonly candidates: string[],
  ) {
    super(
      LogContextErrorCode.BUILTIN_AMBIGUOUS,
      `Builtin log context '${contextName}' is ambiguous: ${candidates.join(', ')}`,
    );
  }
}
