export * from './corpus';
export * from './prompts';
export * from './report';
export * from './runner';
