export * from './catalog.js';
export * from './reports.js';
export * from './analysis.js';
export * from './events.js';
