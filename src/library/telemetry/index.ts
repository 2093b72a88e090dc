export * from './log-telemetry.js';
export * from './metrics-server.js';
export * from './telemetry.js';
