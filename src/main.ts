import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { ConfigService } from "@nestjs/config";
import { ContextLoggerService } from "@logging";
import { AppModule } from "./app.module";

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(ContextLoggerService));

  app.enableCors({
    origin: "*",
    methods: ["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS"],
    allowedHeaders: [
      "Content-Type",
      "Authorization",
      "x-request-id",
      "x-correlation-id",
      "x-trace-id",
    ],
    exposedHeaders: [
      "X-Request-Id",
      "X-Correlation-Id",
      "X-Trace-Id",
      "X-Response-Time",
    ],
  });

  app.enableShutdownHooks();
  const configService = app.get(ConfigService);
  const port = configService.get<number>("PORT") ?? 3000;
  await app.listen(port);
}
bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(error);
  process.exit(1);
});
