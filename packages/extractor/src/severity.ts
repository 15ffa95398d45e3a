import type { Severity } from '@skillbench/core';

const SEVERITY_WORDS: Record<string, Severity> = {
  critical: 'critical',
  crit: 'critical',
  blocker: 'critical',
  severe: 'critical',
  high: 'high',
  major: 'high',
  medium: 'medium',
  moderate: 'medium',
  med: 'medium',
  low: 'low',
  minor: 'low',
  trivial: 'low',
  info: 'low',
  informational: 'low',
};

const SEVERITY_WORD_RE = new RegExp(`\\b(${Object.keys(SEVERITY_WORDS).join('|')})\\b`, 'i');

/** Reads a severity from a label value such as "Critical", "🔴 HIGH" or "moderate (perf)". */
export function parseSeverity(value: unknown): Severity | undefined {
  if (typeof value !== 'string') return undefined;
  const m = SEVERITY_WORD_RE.exec(value);
  return m ? SEVERITY_WORDS[m[1].toLowerCase()] : undefined;
}

// Tags recognised inside issue titles. Only the four canonical words count here;
// synonyms such as "major" are too common in prose.
const SEV = '(critical|high|medium|low)';
const QUALIFIER = '(?:[\\s-]+(?:severity|priority|risk))?';

const TAG_PATTERNS: RegExp[] = [
  // [CRITICAL] title / (High) title
  new RegExp(`^[\\[(]\\s*${SEV}${QUALIFIER}\\s*[\\])]\\s*(?::|\\s[-–—|])?\\s*`, 'i'),
  // Critical: title / HIGH - title / Medium severity - title
  new RegExp(`^${SEV}${QUALIFIER}\\s*(?::|\\s[-–—|])\\s*`, 'i'),
  // title (Critical) / title [severity: high]
  new RegExp(`\\s*[\\[(]\\s*(?:severity\\s*[:=]\\s*)?${SEV}${QUALIFIER}\\s*[\\])]`, 'i'),
  // title, severity: high
  new RegExp(`\\s*[-–—|,;]?\\s*severity\\s*[:=]\\s*${SEV}\\b`, 'i'),
  // title - High
  new RegExp(`\\s+[-–—|]\\s*${SEV}${QUALIFIER}\\s*$`, 'i'),
];

export interface SeverityTag {
  severity?: Severity;
  text: string;
}

export function takeSeverityTag(text: string): SeverityTag {
  for (const re of TAG_PATTERNS) {
    const m = re.exec(text);
    if (m) {
      const stripped = `${text.slice(0, m.index)} ${text.slice(m.index + m[0].length)}`;
      return {
        severity: SEVERITY_WORDS[m[1].toLowerCase()],
        text: stripped.replace(/\s+/g, ' ').trim(),
      };
    }
  }
  return { text: text.trim() };
}

export function hasSeverityTag(text: string): boolean {
  return TAG_PATTERNS.some(re => re.test(text));
}

export function hasLeadingSeverityTag(text: string): boolean {
  return TAG_PATTERNS.slice(0, 2).some(re => re.test(text));
}

export function isBareSeverity(text: string): boolean {
  return new RegExp(`^${SEV}${QUALIFIER}$`, 'i').test(text.trim());
}
