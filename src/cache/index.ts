export * from './controller.js';
export * from './evictor.js';
