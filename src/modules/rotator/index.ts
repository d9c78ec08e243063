export * from './rotator.types';
export * from './rotator.service';
