export * from './store.types';
export * from './store.file';
export * from './store.memory';
