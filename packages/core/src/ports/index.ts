export * from './llm';
export * from './logger';
export * from './report';
