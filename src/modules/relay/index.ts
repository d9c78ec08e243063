export * from './relay.render';
export * from './relay.network';
export * from './relay.controller';
export * from './relay.router';
export * from './relay.server';
