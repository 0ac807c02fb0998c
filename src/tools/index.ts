/**
 * Tools module - the six sandbox tools, the invocation union and the executor.
 */

export type { ToolErrorCode, ToolExecution } from './types.js';
export { Tool } from './tool.js';

export { bashTool, formatCommandOutput, effectiveTimeoutMs } from './bash.js';
export { readTool } from './read.js';
export { writeTool } from './write.js';
export { editTool, countOccurrences } from './edit.js';
export { globTool } from './glob.js';
export { grepTool } from './grep.js';

export {
  TOOL_NAMES,
  ToolInvocationSchema,
  isToolName,
  parseInvocation,
} from './invocation.js';
export type { ToolInvocation, ToolName } from './invocation.js';

export { ToolExecutor } from './executor.js';
export type { ToolExecutorOptions } from './executor.js';

export {
  displayPath,
  globToRegExp,
  isBinaryContent,
  mapSystemErrorToToolError,
  matchGlob,
  resolveInSandbox,
  walkFiles,
} from './workspace.js';
