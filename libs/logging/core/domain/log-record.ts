/**
 * A log record as seen by filters and formatters: a bag of named fields.
 */
export interface LogRecord {
  [field: string]: unknown;
}

/**
 * Filters see every record before it is formatted. Returning false drops it.
 */
export interface LogRecordFilter {
  filter(record: LogRecord): boolean;
}

export type LogRecordFilterFactory = () => LogRecordFilter;

export function isLogRecordFilter(value: unknown): value is LogRecordFilter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'filter' in value &&
    typeof value.filter === 'function'
  );
}
