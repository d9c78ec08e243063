export * from './egress.types';
export * from './egress.configurator';
export * from './apply.engine';
