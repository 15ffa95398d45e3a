import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadCorpus, parseCorpus } from '../corpus.js';
import { CorpusError } from '../errors.js';

const sqlIssue = {
  title: 'SQL injection in login',
  severity: 'Critical',
  locations: 'authenticate_user:12',
  fix: 'Use parameterized queries',
};

describe('parseCorpus', () => {
  it('normalises severity and locations', async () => {
    const [example] = await parseCorpus({
      examples: [{ id: 'auth', language: 'python', code: 'x = 1', expectedIssues: [sqlIssue] }],
    });
    expect(example.expectedIssues[0].severity).toBe('critical');
    expect(example.expectedIssues[0].locations).toEqual(['authenticate_user:12']);
  });

  it('freezes examples and issues', async () => {
    const examples = await parseCorpus({
      examples: [{ id: 'auth', language: 'python', code: 'x = 1', expectedIssues: [sqlIssue] }],
    });
    expect(Object.isFrozen(examples)).toBe(true);
    expect(Object.isFrozen(examples[0])).toBe(true);
    expect(Object.isFrozen(examples[0].expectedIssues[0])).toBe(true);
  });

  it('accepts an example with no expected issues', async () => {
    const [example] = await parseCorpus({
      examples: [{ id: 'clean', language: 'js', code: 'const a = 1;', expectedIssues: [] }],
    });
    expect(example.expectedIssues).toHaveLength(0);
  });

  it('rejects duplicate (title, severity) pairs within an example', async () => {
    await expect(
      parseCorpus({
        examples: [{ id: 'dup', language: 'js', code: '', expectedIssues: [sqlIssue, { ...sqlIssue, title: 'sql injection in LOGIN' }] }],
      }),
    ).rejects.toThrow(/Duplicate expected issue/);
  });

  it('allows the same title at a different severity', async () => {
    const examples = await parseCorpus({
      examples: [{ id: 'ok', language: 'js', code: '', expectedIssues: [sqlIssue, { ...sqlIssue, severity: 'high' }] }],
    });
    expect(examples[0].expectedIssues).toHaveLength(2);
  });

  it('rejects an unknown severity', async () => {
    await expect(
      parseCorpus({ examples: [{ id: 'x', language: 'js', code: '', expectedIssues: [{ ...sqlIssue, severity: 'blocker' }] }] }),
    ).rejects.toBeInstanceOf(CorpusError);
  });

  it('rejects an example with both code and file', async () => {
    await expect(
      parseCorpus({ examples: [{ id: 'x', language: 'js', code: '', file: 'a.js', expectedIssues: [] }] }),
    ).rejects.toThrow(/Exactly one of "code" or "file"/);
  });

  it('rejects duplicate example ids', async () => {
    const ex = { id: 'same', language: 'js', code: '', expectedIssues: [] };
    await expect(parseCorpus({ examples: [ex, ex] })).rejects.toThrow('Duplicate example id "same"');
  });
});

describe('loadCorpus', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'skillbench-corpus-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads code files relative to the corpus file', async () => {
    await writeFile(join(tempDir, 'auth.py'), 'def login(): pass\n');
    await writeFile(join(tempDir, 'corpus.json'), JSON.stringify({
      examples: [{ id: 'auth', language: 'python', file: 'auth.py', expectedIssues: [sqlIssue] }],
    }));

    const [example] = await loadCorpus(join(tempDir, 'corpus.json'));
    expect(example.code).toBe('def login(): pass\n');
    expect(example.language).toBe('python');
  });

  it('reports a missing code file', async () => {
    await writeFile(join(tempDir, 'corpus.json'), JSON.stringify({
      examples: [{ id: 'auth', language: 'python', file: 'missing.py', expectedIssues: [] }],
    }));
    await expect(loadCorpus(join(tempDir, 'corpus.json'))).rejects.toThrow(/Example "auth": cannot read missing.py/);
  });

  it('reports invalid JSON', async () => {
    await writeFile(join(tempDir, 'corpus.json'), '{ not json');
    await expect(loadCorpus(join(tempDir, 'corpus.json'))).rejects.toThrow(/is not valid JSON/);
  });
});
