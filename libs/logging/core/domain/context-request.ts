/**
 * What a log context may read from the incoming request.
 * Header lookup is case-insensitive.
 */
export interface ContextRequest {
  header(name: string): string | undefined;
  /** Per-request attributes shared with downstream code */
  readonly state: Record<string, unknown>;
}

/**
 * What a log context may write to the outgoing response.
 */
export interface ContextResponse {
  setHeader(name: string, value: string): void;
}
