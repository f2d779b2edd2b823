export * from './permissions.js';
export * from './context.js';
export * from './models.js';
export * from './agents.js';
export * from './analysis.js';
export * from './events.js';
