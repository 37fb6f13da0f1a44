export * from './types.js';
export * from './errors.js';
export * from './retry.js';
export * from './api.js';
export * from './channel.js';
export * from './session.js';
