import type { PredictedIssue } from '@skillbench/core';
import { UNKNOWN } from '@skillbench/core';
import { parseSeverity } from './severity.js';
import { deriveImpact } from './impact.js';
import type { Fragment, IssueField } from './types.js';

function stripCodeFence(text: string): string {
  const m = /^```(?:json)?\s*\n([\s\S]*?)\n?```/i.exec(text.trim());
  return m ? m[1] : text;
}

export function looksLikeJson(text: string): boolean {
  const body = stripCodeFence(text).trimStart();
  return body.startsWith('{') || body.startsWith('[');
}

function findJsonSlice(text: string, start: number): string | null {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      stack.push(ch === '{' ? '}' : ']');
    } else if (ch === '}' || ch === ']') {
      if (stack.pop() !== ch) return null;
      if (stack.length === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

export function extractJsonValue(text: string): unknown {
  const body = stripCodeFence(text);
  for (let i = 0; i < body.length; i++) {
    if (body[i] !== '{' && body[i] !== '[') continue;
    const slice = findJsonSlice(body, i);
    if (!slice) continue;
    try {
      return JSON.parse(slice);
    } catch {
      continue;
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const t = value.trim();
    return t ? t : undefined;
  }
  if (typeof value === 'number') return String(value);
  return undefined;
}

function pick(record: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const v = str(record[key]);
    if (v !== undefined) return v;
  }
  return undefined;
}

const TITLE_KEYS = ['title', 'name', 'issue', 'summary'];
const SEVERITY_KEYS = ['severity', 'priority', 'level'];
const DESCRIPTION_KEYS = ['description', 'message', 'details', 'explanation'];
const FIX_KEYS = ['fix', 'suggested_fix', 'suggestedFix', 'suggestion', 'recommendation', 'remediation', 'code_example'];
const ISSUE_KEYS = [...TITLE_KEYS, ...SEVERITY_KEYS, ...DESCRIPTION_KEYS];

function locationsOf(record: Record<string, unknown>): string[] {
  const raw = record.locations ?? record.location;
  const out: string[] = [];
  if (Array.isArray(raw)) {
    for (const v of raw) {
      const s = str(v);
      if (s) out.push(s);
    }
  } else {
    const s = str(raw);
    if (s) out.push(s);
  }
  if (out.length === 0) {
    const scope = pick(record, ['function', 'method', 'file']);
    const line = str(record.line);
    if (scope && line) out.push(`${scope}:${line}`);
    else if (scope) out.push(scope);
  }
  return out;
}

function toFragment(item: unknown): Fragment {
  if (!isRecord(item)) {
    return { kind: 'unparseable', text: JSON.stringify(item) ?? String(item) };
  }

  const title = pick(item, TITLE_KEYS);
  const severity = parseSeverity(pick(item, SEVERITY_KEYS));
  const description = pick(item, DESCRIPTION_KEYS) ?? '';
  const fix = pick(item, FIX_KEYS);
  const impact = str(item.impact) ?? deriveImpact(description, fix);

  if (title === undefined && severity === undefined) {
    return { kind: 'unparseable', text: JSON.stringify(item) };
  }

  const issue: PredictedIssue = {
    title: title ?? UNKNOWN,
    severity: severity ?? UNKNOWN,
    locations: locationsOf(item),
    description,
    ...(fix !== undefined ? { fix } : {}),
    ...(impact !== undefined ? { impact } : {}),
  };

  const missing: IssueField[] = [];
  if (title === undefined) missing.push('title');
  if (severity === undefined) missing.push('severity');
  return missing.length > 0 ? { kind: 'partially_parsed', issue, missing } : { kind: 'fully_parsed', issue };
}

/**
 * Turns a parsed JSON value into fragments. Accepts an array of issue objects,
 * an object wrapping one under `issues` / `findings`, or a single issue object.
 * Returns null when the value is not an issue document at all.
 */
export function fragmentsFromJson(value: unknown): Fragment[] | null {
  let items: unknown[] | undefined;

  if (Array.isArray(value)) {
    items = value;
  } else if (isRecord(value)) {
    if (Array.isArray(value.issues)) items = value.issues;
    else if (Array.isArray(value.findings)) items = value.findings;
    else if (ISSUE_KEYS.some(k => k in value)) items = [value];
  }

  if (!items) return null;
  if (items.length > 0 && !items.some(i => isRecord(i) && ISSUE_KEYS.some(k => k in i))) {
    return null;
  }
  return items.map(toFragment);
}

/**
 * Scans prose for an embedded JSON issue document, fenced or inline, and
 * returns the fragments of the first one that yields at least one issue.
 */
export function findIssueDocument(text: string): Fragment[] | null {
  for (let i = 0; i < text.length; i++) {
    if (text[i] !== '{' && text[i] !== '[') continue;
    const slice = findJsonSlice(text, i);
    if (!slice) continue;
    let value: unknown;
    try {
      value = JSON.parse(slice);
    } catch {
      continue;
    }
    const fragments = fragmentsFromJson(value);
    if (fragments && fragments.some(f => f.kind !== 'unparseable')) return fragments;
  }
  return null;
}
