export * from './auth/credential-provider';
export * from './errors';
export * from './http/endpoints';
export * from './ids';
export * from './session/session-provider';
export * from './sse/frame-parser';
export * from './sse/transport';
export * from './streams/background-streams';
export * from './turn/decoder';
export * from './turn/fallback';
export * from './turn/orchestrator';
export * from './turn/payloads';
export * from './turn/request';
export * from './turn/state';
export * from './turn/types';
