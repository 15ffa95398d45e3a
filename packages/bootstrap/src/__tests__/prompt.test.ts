import { describe, it, expect, vi } from 'vitest';
import type { Demonstration, ModelInvoker } from '@skillbench/core';
import { extractIssues } from '@skillbench/extractor';
import { buildPrompt, createPromptModule, renderDemonstrations, renderIssues } from '../prompt.js';
import { LEAK, SQLI, example } from './helpers.js';

const SKILL = '# Security Review Skill\n\nReport every injection flaw.';

function labeled(id: string, output: string): Demonstration {
  return { example: example(id), output, score: null, source: 'labeled' };
}

describe('renderIssues', () => {
  it('renders numbered issues with their fields', () => {
    expect(renderIssues([SQLI])).toBe(
      [
        '1. **SQL injection in login** (Critical)',
        '   - Location: login:12',
        '   - Description: Unsanitised input allows attackers to read any row.',
        '   - Fix: Use parameterized queries',
      ].join('\n'),
    );
  });

  it('puts a multi-line fix in a code fence', () => {
    expect(renderIssues([LEAK])).toBe(
      [
        '1. **File handle never closed** (Medium)',
        '   - Location: read_config:4, read_config:9',
        '   - Fix:',
        '```',
        'with open(path) as fh:',
        '    return fh.read()',
        '```',
      ].join('\n'),
    );
  });

  it('reads back through the extractor', () => {
    const result = extractIssues(renderIssues([SQLI, LEAK]));

    expect(result.format).toBe('text');
    expect(result.fragments.map(f => f.kind)).toEqual(['fully_parsed', 'fully_parsed']);
    expect(result.issues.map(i => ({ title: i.title, severity: i.severity, locations: i.locations, fix: i.fix }))).toEqual(
      [SQLI, LEAK].map(i => ({ title: i.title, severity: i.severity, locations: i.locations, fix: i.fix })),
    );
  });

  it('states that there are no issues for an empty list', () => {
    expect(renderIssues([])).toBe('No issues found.');
    expect(extractIssues(renderIssues([])).format).toBe('empty');
  });
});

describe('buildPrompt', () => {
  it('appends the code under review to the skill', () => {
    expect(buildPrompt('Review the code.', [], { code: 'x = 1', language: 'python' })).toBe(
      'Review the code.\n\n## Code to review\n\n```python\nx = 1\n```',
    );
  });

  it('places demonstrations between the skill and the code', () => {
    const prompt = buildPrompt('Review the code.', [labeled('ex1', 'No issues found.\n')], {
      code: 'x = 1',
      language: 'python',
    });

    expect(prompt).toBe(
      [
        'Review the code.',
        '## Examples',
        '### Example 1',
        '```python\ndef ex1():\n    pass\n```',
        '**Review:**',
        'No issues found.',
        '## Code to review',
        '```python\nx = 1\n```',
      ].join('\n\n'),
    );
  });

  it('renders nothing for an empty demonstration list', () => {
    expect(renderDemonstrations([])).toBe('');
  });
});

describe('createPromptModule', () => {
  it('sends the rendered prompt and the example input to the invoker', async () => {
    const invoke = vi.fn<ModelInvoker>(async () => 'No issues found.');
    const demos = [labeled('ex1', renderIssues([SQLI]))];
    const module = createPromptModule({ name: 'security', skill: SKILL, invoke, demonstrations: demos });
    const target = example('ex2');
    const signal = new AbortController().signal;

    await expect(module.run(target, signal)).resolves.toBe('No issues found.');
    expect(invoke).toHaveBeenCalledWith(
      buildPrompt(SKILL, demos, target),
      { code: target.code, language: 'python' },
      signal,
    );
  });

  it('fingerprints the skill together with its demonstrations', () => {
    const invoke: ModelInvoker = async () => '';
    const bare = createPromptModule({ name: 'a', skill: SKILL, invoke });
    const again = createPromptModule({ name: 'b', skill: SKILL, invoke });
    const withDemo = createPromptModule({
      name: 'a',
      skill: SKILL,
      invoke,
      demonstrations: [labeled('ex1', 'No issues found.')],
    });

    expect(bare.fingerprint).toBe(again.fingerprint);
    expect(withDemo.fingerprint).not.toBe(bare.fingerprint);
  });
});
