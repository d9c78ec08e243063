export * from './rotator.errors';
