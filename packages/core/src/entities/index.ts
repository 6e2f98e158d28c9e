export * from './conversation';
export * from './audio';
export * from './provider';
