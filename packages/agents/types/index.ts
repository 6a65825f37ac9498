export * from './report.js';
export * from './run.js';
export * from './errors.js';
export * from './events.js';
