export * from './conversation/store';
export * from './ratelimit/slidingWindow';
export * from './audio/manager';
export * from './speech/preprocess';
export * from './prompts/templates';
export * from './gateway/types';
export * from './gateway/stream';
export * from './gateway/orchestrator';
export * from './gateway/runtime';
export * from './resources/lifecycle';
