import { ForkError } from '../errors/index.js';

export type SecurityRule =
  | 'blocked_path'
  | 'outside_allowed'
  | 'file_too_large'
  | 'blocked_command'
  | 'blocked_pattern'
  | 'invalid_parameters';

/**
 * A tool call the security policy refused to run.
 */
export class SecurityViolation extends ForkError {
  public readonly reason: string;
  public readonly toolName: string;
  public readonly rule: SecurityRule;

  constructor(toolName: string, rule: SecurityRule, reason: string) {
    super(reason, 'SECURITY_VIOLATION');
    this.name = 'SecurityViolation';
    this.reason = reason;
    this.toolName = toolName;
    this.rule = rule;
  }
}
