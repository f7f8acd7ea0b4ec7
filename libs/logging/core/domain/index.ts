export * from './context-request';
export * from './log-config.document';
export * from './log-context';
export * from './log-record';
export * from './builtins';
