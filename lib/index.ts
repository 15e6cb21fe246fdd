export * from './options/index.js';
export * from './attach/scope.js';
export * from './config/document.js';
