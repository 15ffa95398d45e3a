import type { ExpectedIssue, PromptModule, TrainingExample } from '@skillbench/core';

export const SQLI: ExpectedIssue = {
  title: 'SQL injection in login',
  severity: 'critical',
  locations: ['login:12'],
  fix: 'Use parameterized queries',
};

export const SQLI_REVIEW = ['1. [Critical] SQL injection in login', '   Location: login:12'].join('\n');

export function example(id: string, expectedIssues: ExpectedIssue[] = [SQLI]): TrainingExample {
  return { id, language: 'python', code: `# ${id}\n`, expectedIssues };
}

export type Reply = string | Error | 'hang';

export function hangUntilAborted(signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('cancelled')));
  });
}

/** Module whose reply is looked up by example id. */
export function scriptedModule(replies: Record<string, Reply>, name = 'scripted'): PromptModule {
  return {
    name,
    async run(ex, signal) {
      const reply = replies[ex.id] ?? '';
      if (reply === 'hang') return hangUntilAborted(signal);
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
}
