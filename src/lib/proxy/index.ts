/**
 * Proxy Management System
 * Main export file for the pool, sources, health checks and selection
 */

export * from './proxy.types';
export * from './proxy.sources';
export * from './proxy.headers';
export * from './proxy.favorites';
export * from './proxy.history';
export * from './proxy.pool';
export * from './proxy.health';
export * from './proxy.selector';
