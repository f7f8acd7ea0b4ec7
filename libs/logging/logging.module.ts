import { Global, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { APP_INTERCEPTOR } from "@nestjs/core";
import loggingConfig, { LoggingSettings } from "@config/utils/logging.config";
import { LogConfigurationUseCase } from "@logging/in-ports";
import { LogBackendPort } from "@logging/out-ports";
import { WinstonLogBackend } from "@logging/infrastructure/index";
import {
  AccessLogInterceptor,
  ContextLoggerService,
  LogContextInterceptor,
} from "@logging/presentation/index";
import { LogConfigurator, LogContextRegistry } from "@logging/service/index";

/**
 * LoggingModule - NestJS module for request-scoped log context.
 *
 * Marked as @Global() so it can be imported once in AppModule. On init the
 * logging configuration is synthesized and applied; every HTTP request then
 * runs through the registered log context middlewares (outermost first) and
 * the access log.
 */
@Global()
@Module({
  imports: [ConfigModule.forFeature(loggingConfig)],
  providers: [
    {
      provide: LogContextRegistry,
      useFactory: (settings: LoggingSettings) =>
        LogContextRegistry.fromSettings(settings),
      inject: [loggingConfig.KEY],
    },
    {
      provide: LogBackendPort,
      useClass: WinstonLogBackend,
    },
    LogConfigurator,
    {
      provide: LogConfigurationUseCase,
      useExisting: LogConfigurator,
    },
    ContextLoggerService,
    {
      provide: APP_INTERCEPTOR,
      useClass: LogContextInterceptor,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: AccessLogInterceptor,
    },
  ],
  exports: [
    LogContextRegistry,
    LogBackendPort,
    LogConfigurationUseCase,
    ContextLoggerService,
  ],
})
export class LoggingModule {}
