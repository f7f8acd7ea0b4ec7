/**
 * Public API exports for the logging library.
 * This allows clean imports: import { LoggingModule, LogContextRegistry } from '@logging'
 */

// Module
export { LoggingModule } from './logging.module';

// Domain
export * from './core/domain';
export * from './core/exceptions';
export { LogLevel, LogFormatType } from './core/value-objects';
export { deepMerge } from './core/utils';

// Ports
export { LogConfigurationUseCase, ConfigureOptions } from './core/ports/in';
export { LogBackendPort } from './core/ports/out';

// Services
export { LogContextRegistry, LogConfigurator } from './service';

// Infrastructure
export { WinstonLogBackend } from './infrastructure';

// Presentation
export {
  AccessLogInterceptor,
  ContextLoggerService,
  ContextMiddleware,
  LogContextInterceptor,
} from './presentation';
