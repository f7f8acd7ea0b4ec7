import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  NestInterceptor,
} from "@nestjs/common";
import { HTTP_CODE_METADATA } from "@nestjs/common/constants";
import { Reflector } from "@nestjs/core";
import { Request } from "express";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { LogBackendPort } from "@logging/out-ports";
import { FRAMEWORK_ACCESS_LOGGER, LogLevel } from "@logging/value-objects";

/**
 * AccessLogInterceptor - Writes one access line per HTTP request.
 *
 * Registered after LogContextInterceptor, so it runs inside the log context
 * scope and its lines carry the request's context tags.
 */
@Injectable()
export class AccessLogInterceptor implements NestInterceptor<unknown, unknown> {
  constructor(
    private readonly backend: LogBackendPort,
    private readonly reflector: Reflector,
  ) {}

  intercept(
    context: ExecutionContext,
    next: CallHandler<unknown>,
  ): Observable<unknown> {
    if (context.getType() !== "http") {
      return next.handle();
    }

    const request = context.switchToHttp().getRequest<Request>();
    const route = `${request.method} ${request.originalUrl ?? request.url}`;
    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        complete: () =>
          this.record(route, this.successStatus(context, request), startTime),
        error: (error: unknown) =>
          this.record(route, errorStatus(error), startTime),
      }),
    );
  }

  private successStatus(context: ExecutionContext, request: Request): number {
    const declared = this.reflector.get<number | undefined>(
      HTTP_CODE_METADATA,
      context.getHandler(),
    );
    if (declared !== undefined) return declared;
    return request.method === "POST" ? HttpStatus.CREATED : HttpStatus.OK;
  }

  private record(route: string, status: number, startTime: number): void {
    const durationMs = Date.now() - startTime;
    this.backend.write(
      FRAMEWORK_ACCESS_LOGGER,
      accessLevel(status),
      `${route} ${status} ${durationMs}ms`,
      { status_code: status, duration_ms: durationMs },
    );
  }
}

function errorStatus(error: unknown): number {
  return error instanceof HttpException
    ? error.getStatus()
    : HttpStatus.INTERNAL_SERVER_ERROR;
}

function accessLevel(status: number): LogLevel {
  if (status >= 500) return LogLevel.ERROR;
  if (status >= 400) return LogLevel.WARN;
  return LogLevel.INFO;
}
