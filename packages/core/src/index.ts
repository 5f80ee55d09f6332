export * from './logging/index.js';
export * from './errors/index.js';
export * from './env/index.js';
export * from './config/index.js';
export * from './trust/index.js';
export * from './transport/index.js';
export * from './codec/index.js';
export * from './dispatch/index.js';
export * from './session/index.js';
