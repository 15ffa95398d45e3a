import type {
  Demonstration,
  ExampleInput,
  ExpectedIssue,
  PromptModule,
  Severity,
} from '@skillbench/core';
import { fingerprint } from '@skillbench/core';
import type { PromptModuleInput } from './types.js';

const SEVERITY_LABEL: Record<Severity, string> = {
  critical: 'Critical',
  high: 'High',
  medium: 'Medium',
  low: 'Low',
};

function fence(code: string, language = ''): string {
  return `\`\`\`${language}\n${code.replace(/\n$/, '')}\n\`\`\``;
}

/**
 * Renders ground-truth issues as a numbered review the extractor reads back:
 * bold title with severity, then Location / Description / Fix fields.
 */
export function renderIssues(issues: readonly ExpectedIssue[]): string {
  if (issues.length === 0) return 'No issues found.';

  return issues
    .map((issue, i) => {
      const lines = [
        `${i + 1}. **${issue.title}** (${SEVERITY_LABEL[issue.severity]})`,
        `   - Location: ${issue.locations.join(', ')}`,
      ];
      if (issue.description) lines.push(`   - Description: ${issue.description.replace(/\s*\n\s*/g, ' ')}`);
      if (issue.fix.includes('\n')) {
        lines.push('   - Fix:', fence(issue.fix));
      } else {
        lines.push(`   - Fix: ${issue.fix}`);
      }
      return lines.join('\n');
    })
    .join('\n\n');
}

export function renderDemonstrations(demos: readonly Demonstration[]): string {
  if (demos.length === 0) return '';
  const blocks = demos.map((demo, i) =>
    [
      `### Example ${i + 1}`,
      fence(demo.example.code, demo.example.language),
      '**Review:**',
      demo.output.trim(),
    ].join('\n\n'),
  );
  return ['## Examples', ...blocks].join('\n\n');
}

export function renderSkill(skill: string, demos: readonly Demonstration[] = []): string {
  const examples = renderDemonstrations(demos);
  return examples ? `${skill.trim()}\n\n${examples}\n` : `${skill.trim()}\n`;
}

export function buildPrompt(skill: string, demos: readonly Demonstration[], input: ExampleInput): string {
  return [renderSkill(skill, demos).trim(), '## Code to review', fence(input.code, input.language)].join('\n\n');
}

export function promptFingerprint(skill: string, demos: readonly Demonstration[]): string {
  return fingerprint({
    skill,
    demonstrations: demos.map(d => ({ example: d.example.id, source: d.source, output: d.output })),
  });
}

export function createPromptModule(input: PromptModuleInput): PromptModule {
  const demos = Object.freeze([...(input.demonstrations ?? [])]);
  return {
    name: input.name,
    fingerprint: promptFingerprint(input.skill, demos),
    run: (example, signal) =>
      input.invoke(
        buildPrompt(input.skill, demos, example),
        { code: example.code, language: example.language },
        signal,
      ),
  };
}
