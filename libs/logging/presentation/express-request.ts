import { Request, Response } from "express";
import { ContextRequest, ContextResponse } from "@logging/domain";

declare global {
  namespace Express {
    interface Request {
      /** Per-request attributes, populated by upstream middlewares */
      state?: Record<string, unknown>;
    }
  }
}

/**
 * Adapt an Express request to what log contexts read.
 * `req.get` is case-insensitive.
 */
export function toContextRequest(request: Request): ContextRequest {
  const state = (request.state ??= {});
  return {
    header: (name: string) => request.get(name),
    state,
  };
}

/**
 * Adapt an Express response to what log contexts write. Headers are left
 * alone once the handler has sent the response itself (e.g. with `@Res()`).
 */
export function toContextResponse(response: Response): ContextResponse {
  return {
    setHeader: (name: string, value: string) => {
      if (!response.headersSent) {
        response.setHeader(name, value);
      }
    },
  };
}
