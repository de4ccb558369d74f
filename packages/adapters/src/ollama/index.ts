export * from './chatClient';
export * from './health';
export * from './lines';
