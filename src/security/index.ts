export { SecurityPolicy } from './policy.js';
export type { SecurityPolicyOptions, ToolOutcome } from './policy.js';
export { SecurityViolation } from './violation.js';
export type { SecurityRule } from './violation.js';
export { toPolicyConfig } from './policy-config.js';
export type { PolicyConfig } from './policy-config.js';
export {
  expandHome,
  isPathWithin,
  relativeToRoot,
  resolveRealPath,
  resolveToolPath,
} from './paths.js';
