export * from './commands';
export * from './loop';
