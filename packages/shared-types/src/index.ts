export * from './chat';
export * from './events';
export * from './json';
export * from './settings';
export * from './stream';
