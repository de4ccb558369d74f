export * from './fake';
export * from './pino';
