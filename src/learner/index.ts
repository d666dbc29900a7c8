export { Learner, learn, correctiveRule } from './learner.js';
export type { LearnerOptions } from './learner.js';
