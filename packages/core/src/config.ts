import { readFile } from 'node:fs/promises';
import type { ZodError } from 'zod';
import { RunConfigSchema } from './schemas.js';
import type { RunConfig } from './types.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { ValidationIssue } from './errors.js';

export function resolveConfig(input: unknown = {}): RunConfig {
  const result = RunConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    throw new ConfigurationError(
      `Invalid configuration: ${issues.map(i => `${i.path || '<root>'}: ${i.message}`).join('; ')}`,
      issues,
    );
  }
  return result.data;
}

export async function loadConfig(path: string): Promise<RunConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read config ${path}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Config ${path} is not valid JSON: ${errorMessage(err)}`);
  }

  return resolveConfig(parsed);
}

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map(i => ({
    path: i.path.join('.'),
    message: i.message,
  }));
}
