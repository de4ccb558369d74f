export * from './ollama';
export * from './llm';
export * from './logger';
export * from './report';
