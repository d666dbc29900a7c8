export { compileConstraints, formatConstraints } from './modifier.js';
export type { Constraint, CompileConstraintsOptions } from './modifier.js';
