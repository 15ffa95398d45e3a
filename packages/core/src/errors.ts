export type ErrorCode = 'E_CONFIG' | 'E_CORPUS' | 'E_INVOCATION';

export type InvocationFailureReason = 'backend' | 'timeout' | 'aborted';

export interface ValidationIssue {
  path: string;
  message: string;
}

export class SkillbenchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends SkillbenchError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('E_CONFIG', message);
    this.issues = issues;
  }
}

export class CorpusError extends SkillbenchError {
  readonly issues: ValidationIssue[];
  readonly file?: string;

  constructor(message: string, issues: ValidationIssue[] = [], file?: string) {
    super('E_CORPUS', message);
    this.issues = issues;
    this.file = file;
  }
}

export class InvocationError extends SkillbenchError {
  readonly reason: InvocationFailureReason;
  readonly attempts: number;

  constructor(message: string, reason: InvocationFailureReason, attempts: number, options?: { cause?: unknown }) {
    super('E_INVOCATION', message, options);
    this.reason = reason;
    this.attempts = attempts;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
