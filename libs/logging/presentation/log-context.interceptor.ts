import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { LogContextRegistry } from "@logging/service/log-context.registry";
import { ContextMiddleware } from "./context.middleware";

/**
 * LogContextInterceptor - Installs the middleware of every registered log
 * context, in registry order.
 *
 * The first registered context wraps all the others: it binds first on the
 * way in and resets last on the way out.
 */
@Injectable()
export class LogContextInterceptor implements NestInterceptor<unknown, unknown> {
  private chain: ContextMiddleware[] | null = null;

  constructor(private readonly registry: LogContextRegistry) {}

  intercept(
    context: ExecutionContext,
    next: CallHandler<unknown>,
  ): Observable<unknown> {
    // Built on first use so that contexts registered during bootstrap are included.
    this.chain ??= [...this.registry.getAllMiddlewares().values()];

    return this.chain
      .reduceRight<CallHandler<unknown>>(
        (inner, middleware) => ({
          handle: () => middleware.intercept(context, inner),
        }),
        next,
      )
      .handle();
  }
}
