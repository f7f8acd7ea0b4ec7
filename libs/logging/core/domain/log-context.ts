import { AsyncLocalStorage } from 'async_hooks';
import { ContextRequest, ContextResponse } from './context-request';
import { LogRecord, LogRecordFilter, LogRecordFilterFactory } from './log-record';

interface ContextSlot<T> {
  value: T;
}

/**
 * LogContext - Base class for one piece of per-request log metadata.
 *
 * Each instance owns its own AsyncLocalStorage. A request opens a fresh
 * slot with `runInScope`, so concurrent requests never share a value and
 * awaited work inside the request inherits it.
 *
 * Subclasses decide how the value is extracted from the request and,
 * optionally, how it is echoed on the response.
 */
export abstract class LogContext<T = string> {
  private readonly storage = new AsyncLocalStorage<ContextSlot<T>>();

  /**
   * Stable factory used in the `filters` section of the logging config.
   * Bound to this instance so every entry resolves to its own context.
   */
  readonly filterFactory: LogRecordFilterFactory = () => this.createFilter();

  constructor(
    public readonly contextVarName: string,
    public readonly defaultValue: T,
  ) {}

  /**
   * Run `fn` with a fresh slot holding the default value.
   */
  runInScope<R>(fn: () => R): R {
    return this.storage.run({ value: this.defaultValue }, fn);
  }

  set(value: T): void {
    const slot = this.storage.getStore();
    if (slot) {
      slot.value = value;
    } else {
      this.storage.enterWith({ value });
    }
  }

  /**
   * Current value, or the default outside of any request.
   */
  get(): T {
    const slot = this.storage.getStore();
    return slot ? slot.value : this.defaultValue;
  }

  reset(): void {
    this.set(this.defaultValue);
  }

  /**
   * Must not throw: missing data resolves to a generated or default value.
   */
  abstract extractFromRequest(request: ContextRequest): T;

  prepareResponse(_response: ContextResponse, _value: T): void {}

  createFilter(): LogRecordFilter {
    return {
      filter: (record: LogRecord): boolean => {
        record[this.contextVarName] = this.get();
        return true;
      },
    };
  }
}

export type AnyLogContext = LogContext<unknown>;

export type LogContextClass = new () => AnyLogContext;
