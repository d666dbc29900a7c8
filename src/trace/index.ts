export type { ToolName, PlannedStep, ExecutedStep, Trace } from './types.js';
export { TOOL_NAMES, TOOL_ALIASES, isToolName, sortTools } from './types.js';
export {
  ToolNameSchema,
  PlannedStepSchema,
  ExecutedStepSchema,
  TraceSchema,
  parseTrace,
} from './schema.js';
