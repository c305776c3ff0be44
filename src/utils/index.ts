export * from './config.js';
export * from './hash.js';
export * from './process.js';
export * from './shell.js';
export * from './size-label.js';
