export * from './file';
export * from './memory';
