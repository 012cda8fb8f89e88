export * from './stack.js';
export * from './plan.js';
export * from './status.js';
