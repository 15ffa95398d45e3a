import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { CorpusSchema } from './schemas.js';
import type { CorpusExampleRecord } from './schemas.js';
import type { ExpectedIssue, TrainingExample } from './types.js';
import { CorpusError, errorMessage } from './errors.js';
import { toValidationIssues } from './config.js';

export async function loadCorpus(path: string): Promise<readonly TrainingExample[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new CorpusError(`Cannot read corpus ${path}: ${errorMessage(err)}`, [], path);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CorpusError(`Corpus ${path} is not valid JSON: ${errorMessage(err)}`, [], path);
  }

  return parseCorpus(data, dirname(path), path);
}

/**
 * Validates a corpus document and materialises its examples. Examples that
 * reference a `file` are read relative to `baseDir`. The returned examples and
 * their issues are frozen.
 */
export async function parseCorpus(
  data: unknown,
  baseDir: string = process.cwd(),
  source?: string,
): Promise<readonly TrainingExample[]> {
  const result = CorpusSchema.safeParse(data);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    throw new CorpusError(
      `Invalid corpus${source ? ` ${source}` : ''}: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
      issues,
      source,
    );
  }

  const seen = new Set<string>();
  const examples: TrainingExample[] = [];

  for (const record of result.data.examples) {
    if (seen.has(record.id)) {
      throw new CorpusError(`Duplicate example id "${record.id}"`, [], source);
    }
    seen.add(record.id);
    examples.push(await toExample(record, baseDir, source));
  }

  return Object.freeze(examples);
}

async function toExample(
  record: CorpusExampleRecord,
  baseDir: string,
  source?: string,
): Promise<TrainingExample> {
  let code = record.code;
  if (code === undefined && record.file !== undefined) {
    const filePath = isAbsolute(record.file) ? record.file : resolve(baseDir, record.file);
    try {
      code = await readFile(filePath, 'utf8');
    } catch (err) {
      throw new CorpusError(
        `Example "${record.id}": cannot read ${record.file}: ${errorMessage(err)}`,
        [],
        source,
      );
    }
  }

  const expectedIssues: ExpectedIssue[] = record.expectedIssues.map(issue =>
    Object.freeze({
      title: issue.title,
      severity: issue.severity,
      locations: Object.freeze([...issue.locations]),
      fix: issue.fix,
      ...(issue.description !== undefined ? { description: issue.description } : {}),
      ...(issue.category !== undefined ? { category: issue.category } : {}),
    }),
  );

  return Object.freeze({
    id: record.id,
    language: record.language,
    code: code ?? '',
    ...(record.description !== undefined ? { description: record.description } : {}),
    expectedIssues: Object.freeze(expectedIssues),
  });
}
