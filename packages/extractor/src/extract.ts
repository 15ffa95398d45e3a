import { errorMessage } from '@skillbench/core';
import type { PredictedIssue } from '@skillbench/core';
import { extractJsonValue, findIssueDocument, fragmentsFromJson, looksLikeJson } from './json.js';
import { parseText } from './text.js';
import type { ExtractionFormat, ExtractionResult, Fragment } from './types.js';

const NO_ISSUES_RE =
  /^(?:no\s+(?:significant\s+|major\s+|security\s+)?(?:issues|problems|bugs|vulnerabilities|findings)(?:\s+(?:were\s+)?(?:found|detected|identified))?|none(?:\s+found)?|n\/a|lgtm|looks\s+good(?:\s+to\s+me)?)[.!]?$/i;

function result(format: ExtractionFormat, fragments: Fragment[]): ExtractionResult {
  const issues: PredictedIssue[] = [];
  for (const f of fragments) {
    if (f.kind !== 'unparseable') issues.push(f.issue);
  }
  return { format, issues, fragments };
}

/**
 * Recovers predicted issues from free-form model output. JSON issue lists are
 * read directly, including one embedded after a preamble; anything else goes
 * through the markdown / text reader.
 * Never throws: text that cannot be read comes back as unparseable fragments.
 */
export function extractIssues(output: string): ExtractionResult {
  const trimmed = output.trim();
  if (!trimmed || NO_ISSUES_RE.test(trimmed.replace(/[*_`#]/g, '').trim())) {
    return { format: 'empty', issues: [], fragments: [] };
  }

  try {
    if (looksLikeJson(trimmed)) {
      const fragments = fragmentsFromJson(extractJsonValue(trimmed));
      if (fragments) return result('json', fragments);
    }
    const text = result('text', parseText(trimmed));
    const embedded = findIssueDocument(trimmed);
    if (embedded) {
      const json = result('json', embedded);
      if (json.issues.length >= text.issues.length) return json;
    }
    return text;
  } catch (err) {
    return result('text', [{ kind: 'unparseable', text: `${trimmed}\n\n[extraction failed: ${errorMessage(err)}]` }]);
  }
}
