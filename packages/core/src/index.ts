export * from './entities/message';
export * from './entities/inference';
export * from './errors';
export * from './ports';
export * from './config/types';
export * from './config/defaults';
export * from './config/schema';
export * from './utils';
