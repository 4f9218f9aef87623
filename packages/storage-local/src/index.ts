export * from './environment';
export * from './redaction';
export * from './settings';
export * from './storage';
