export * from './state.types';
export * from './rotator.state';
