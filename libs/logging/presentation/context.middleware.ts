import {
  CallHandler,
  ExecutionContext,
  NestInterceptor,
} from "@nestjs/common";
import { AsyncResource } from "async_hooks";
import { Request, Response } from "express";
import { Observable } from "rxjs";
import { finalize, tap } from "rxjs/operators";
import { LogContext } from "@logging/domain";
import { toContextRequest, toContextResponse } from "./express-request";

/**
 * ContextMiddleware - Binds one log context around an HTTP request.
 *
 * Per request:
 * - extract the value once and store it on `request.state` and in the slot
 * - run the downstream chain inside the slot's scope
 * - decorate the response only when downstream completes successfully
 * - reset the slot on success, error and unsubscription
 *
 * Downstream errors are passed through as they are.
 */
export class ContextMiddleware<T = unknown>
  implements NestInterceptor<unknown, unknown>
{
  constructor(readonly context: LogContext<T>) {}

  intercept(
    executionContext: ExecutionContext,
    next: CallHandler<unknown>,
  ): Observable<unknown> {
    if (executionContext.getType() !== "http") {
      return next.handle();
    }

    const http = executionContext.switchToHttp();
    const request = toContextRequest(http.getRequest<Request>());
    const response = toContextResponse(http.getResponse<Response>());

    return new Observable<unknown>((subscriber) =>
      this.context.runInScope(() => {
        const value = this.context.extractFromRequest(request);
        request.state[this.context.contextVarName] = value;
        this.context.set(value);

        // Bound to this request's scope: unsubscription may run from outside it.
        const reset = AsyncResource.bind(() => this.context.reset());

        return next
          .handle()
          .pipe(
            tap({
              complete: () => this.context.prepareResponse(response, value),
            }),
            finalize(reset),
          )
          .subscribe(subscriber);
      }),
    );
  }
}
