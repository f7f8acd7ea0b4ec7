import { LogRecord } from '@logging/domain/log-record';

const PLACEHOLDER = /%\((\w+)\)s/g;

export const MISSING_FIELD = '-';

/**
 * Render a `%(field)s` template against a log record.
 * Fields the record does not carry render as "-".
 */
export function renderTemplate(template: string, record: LogRecord): string {
  return template.replace(PLACEHOLDER, (_match, field: string) =>
    formatField(record[field]),
  );
}

function formatField(value: unknown): string {
  if (value === undefined || value === null) return MISSING_FIELD;
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.message;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
