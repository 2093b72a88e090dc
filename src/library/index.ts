export * from './common.js';
export * from './config.js';
export * from './ddns/index.js';
export * from './errors.js';
export * from './reconciler.js';
export * from './scheduler.js';
export * from './service.js';
export * from './telemetry/index.js';

export {Logs} from './@log/index.js';
