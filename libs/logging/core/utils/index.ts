export * from './config-mapping.util';
export * from './deep-merge.util';
export * from './format-template.util';
