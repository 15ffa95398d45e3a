export { extractIssues } from './extract.js';
export { parseText } from './text.js';
export { extractJsonValue, fragmentsFromJson } from './json.js';
export { parseSeverity } from './severity.js';
export { deriveImpact } from './impact.js';
export type { ExtractionFormat, ExtractionResult, Fragment, IssueField } from './types.js';
