export * from './rotation.types';
export * from './rotation.utils';
export * from './rotation.scheduler';
