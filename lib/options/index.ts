export * from './enums.js';
export * from './errors.js';
export * from './fields.js';
export * from './wire.js';
export * from './codec.js';
export * from './resolve.js';
