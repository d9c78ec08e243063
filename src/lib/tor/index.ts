export * from './tor.types';
export * from './tor.control';
export * from './tor.process';
export * from './tor.controller';
