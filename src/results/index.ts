export * from './aggregator.js';
export * from './environment.js';
export * from './report.js';
