export * from './ip-resolver.js';
export * from './outcome.js';
export * from './resolvers/index.js';
export * from './update-client.js';
