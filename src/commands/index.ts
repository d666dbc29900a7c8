/**
 * Command re-exports
 */

export { runCommand } from './run.js';
export { evaluateCommand } from './evaluate.js';
export { statsCommand } from './stats.js';
export { mistakesCommand } from './mistakes.js';
export { constraintsCommand } from './constraints.js';
export { clearCommand } from './clear.js';
export { demoCommand } from './demo.js';
export { configCommand } from './config.js';
