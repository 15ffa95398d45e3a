import type { PredictedIssue } from '@skillbench/core';

export type IssueField = 'title' | 'severity';

export type Fragment =
  | { kind: 'fully_parsed'; issue: PredictedIssue }
  | { kind: 'partially_parsed'; issue: PredictedIssue; missing: IssueField[] }
  | { kind: 'unparseable'; text: string };

/**
 * empty: the output states there is nothing to report.
 * json:  the output carried a JSON issue list.
 * text:  the output was read as markdown / plain text.
 */
export type ExtractionFormat = 'empty' | 'json' | 'text';

export interface ExtractionResult {
  format: ExtractionFormat;
  issues: PredictedIssue[];
  fragments: Fragment[];
}
