export * from './app';
export * from './crossOrigin';
export * from './errors';
export * from './requestContext';
export * from './schemas';
export * from './server';
export * from './sse';
export * from './version';
