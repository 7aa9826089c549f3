export { computeStats, isOverdue } from './stats.js';
export { analyzeTodos, findOldestOpen, findOverdue } from './analysis.js';
