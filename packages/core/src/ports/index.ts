export * from './logger';
export * from './vision';
export * from './speech';
export * from './storage';
export * from './credentials';
export * from './telemetry';
