export * from './log-context.error';
