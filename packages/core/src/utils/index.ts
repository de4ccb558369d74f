export * from './chunk';
export * from './jsonFields';
export * from './metrics';
export * from './outcome';
