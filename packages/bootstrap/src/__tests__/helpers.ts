import type { ExpectedIssue, PromptModule, QualityScore, TrainingExample } from '@skillbench/core';
import { zeroScore } from '@skillbench/scorer';
import type { Metric } from '../types.js';

export const SQLI: ExpectedIssue = {
  title: 'SQL injection in login',
  severity: 'critical',
  locations: ['login:12'],
  description: 'Unsanitised input allows attackers to read any row.',
  fix: 'Use parameterized queries',
};

export const LEAK: ExpectedIssue = {
  title: 'File handle never closed',
  severity: 'medium',
  locations: ['read_config:4', 'read_config:9'],
  fix: 'with open(path) as fh:\n    return fh.read()',
};

export function example(id: string, expectedIssues: ExpectedIssue[] = [SQLI]): TrainingExample {
  return { id, language: 'python', code: `def ${id}():\n    pass\n`, expectedIssues };
}

export function trainset(n: number): TrainingExample[] {
  return Array.from({ length: n }, (_, i) => example(`ex${i + 1}`));
}

/** Replies by example id; an Error reply makes the call fail. */
export function scriptedModule(replies: Record<string, string | Error>, name = 'scripted'): PromptModule {
  return {
    name,
    async run(ex) {
      const reply = replies[ex.id] ?? '';
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
}

/** Reads the score straight from the output text, e.g. "0.75". */
export const numericMetric: Metric = output => {
  const score: QualityScore = { ...zeroScore(), failed: false, overall: Number(output) };
  return score;
};
