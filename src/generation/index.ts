export * from './files.js';
export * from './generator.js';
