export * from './lifecycle';
export * from './errors';
export * from './entities';
export * from './ports';
export * from './config';
export * from './utils/image';
export * from './utils/keyedMutex';
export * from './utils/upstream';
