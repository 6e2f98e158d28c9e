export * from './http/fetch';
export * from './http/sse';
export * from './openai/errors';
export * from './openai/vision';
export * from './openai/speech';
export * from './anthropic/vision';
export * from './google/vision';
export * from './google/speech';
export * from './azure/speech';
export * from './vision/probe';
export * from './vision/vendors';
export * from './vision/factory';
export * from './vision/fake';
export * from './speech/duration';
export * from './speech/factory';
export * from './speech/fake';
export * from './storage/local';
export * from './storage/memory';
export * from './credentials/static';
export * from './telemetry/logger';
export * from './telemetry/fake';
export * from './logger/pino';
export * from './logger/fake';
