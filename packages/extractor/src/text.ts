import type { PredictedIssue, Severity } from '@skillbench/core';
import { UNKNOWN } from '@skillbench/core';
import { hasLeadingSeverityTag, hasSeverityTag, isBareSeverity, parseSeverity, takeSeverityTag } from './severity.js';
import { deriveImpact } from './impact.js';
import type { Fragment, IssueField } from './types.js';

type MarkerKind = 'heading' | 'bold' | 'numbered' | 'prefixed' | 'severity' | 'inline' | 'field';
type FieldName = 'title' | 'severity' | 'location' | 'description' | 'impact' | 'fix' | 'category';
type TextField = 'description' | 'impact' | 'fix';

type Line =
  | { type: 'blank' }
  | { type: 'fence' }
  | { type: 'section'; severity?: Severity }
  | { type: 'field'; field: FieldName; value: string }
  | { type: 'marker'; kind: MarkerKind; text: string; indent: number; number?: number }
  | { type: 'text'; text: string };

const FIELD_LABELS: Record<string, FieldName> = {
  title: 'title',
  issue: 'title',
  name: 'title',
  vulnerability: 'title',
  severity: 'severity',
  priority: 'severity',
  'severity level': 'severity',
  'risk level': 'severity',
  location: 'location',
  locations: 'location',
  line: 'location',
  lines: 'location',
  file: 'location',
  function: 'location',
  where: 'location',
  description: 'description',
  details: 'description',
  problem: 'description',
  explanation: 'description',
  why: 'description',
  note: 'description',
  example: 'description',
  notes: 'description',
  impact: 'impact',
  consequence: 'impact',
  consequences: 'impact',
  risk: 'impact',
  'attack scenario': 'impact',
  fix: 'fix',
  'suggested fix': 'fix',
  'proposed fix': 'fix',
  'fixed code': 'fix',
  'how to fix': 'fix',
  recommendation: 'fix',
  recommendations: 'fix',
  suggestions: 'fix',
  remediation: 'fix',
  solution: 'fix',
  suggestion: 'fix',
  category: 'category',
  type: 'category',
};

const FENCE_RE = /^(```|~~~)/;
const HEADING_RE = /^(#{1,6})\s+(.*?)\s*#*\s*$/;
const FIELD_RE = /^(?:\*\*|__)?([A-Za-z][A-Za-z /]{0,29}?)(?:\*\*|__)?\s*:\s*(?:\*\*|__)?\s*(.*)$/;
const BULLET_RE = /^[-*+•]\s+/;
const NUMBERED_RE = /^(\d+)[.)]\s+(.*)$/;
const PREFIXED_RE =
  /^(?:\*\*|__)?\s*(?:issue|problem|finding|bug|vulnerability)\s*#?\s*(\d+)\b\s*(?:\*\*|__)?\s*[:.)\-–—]?\s*(.*)$/i;
const BOLD_LEAD_RE = /^(\*\*|__)(.+?)\1(.*)$/;
const DECORATION_RE = /^(?:[\p{Extended_Pictographic}\uFE0F\u200D]+\s*)+/u;
// "a critical SQL injection vulnerability" inside a sentence
const INLINE_ISSUE_RE =
  /\b(critical|high|medium|low)(?:[\s-]+(?:severity|priority|risk))?\s+((?:[\w-]+\s+){0,3}?(?:vulnerability|issue|bug|flaw|problem|weakness|injection|leak|overflow))\b/i;
const NEGATED_RE = /\b(?:no|not|without|any|zero)\s+(?:[\w-]+\s+)?$/i;

const SEVERITY_SECTION_RE =
  /^(critical|high|medium|low)(?:[\s-]+(?:severity|priority|risk))?(?:\s+(?:security\s+)?(?:issues?|findings?|problems?|vulnerabilit(?:y|ies)|bugs?|concerns?))?$/;
const SECTION_NOUN_RE =
  /\b(?:issues|findings|problems|vulnerabilities|bugs|concerns|recommendations|suggestions|observations)$/;
const GENERIC_SECTION_RE =
  /^(?:summary|overview|(?:code\s+)?review(?:\s+(?:summary|report|notes))?|findings|conclusions?|notes?|strengths|positives?|positive aspects|analysis|overall(?:\s+assessment)?|assessment|results?|details|next steps|verdict|recommendations?)$/;
const SEVERITY_WORD_RE = /\b(critical|high|medium|low)\b/;

const NAME_LINE_RE = /`?([A-Za-z_][\w.]*?)(?:\(\))?`?:(\d+)\b/g;
const NAME_AT_LINE_RE = /`?([A-Za-z_]\w*)\(\)`?\s+(?:at|on)\s+line\s+(\d+)/gi;
const INLINE_LABEL_RE = /\b(impact|fix|location|severity|recommendation|suggested fix)\s*:\s*/gi;

function plainWords(text: string): string {
  return text
    .replace(/[^A-Za-z0-9\s-]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()
    .replace(/^\d+\s+/, '');
}

/**
 * Classifies a heading-like text as a section divider. Severity sections
 * ("Critical Issues") carry their severity down to the issues beneath them;
 * generic ones ("Summary") clear it.
 */
function sectionOf(text: string, generic: boolean): { severity?: Severity } | null {
  const plain = plainWords(text);
  if (!plain) return generic ? {} : null;
  const sev = SEVERITY_SECTION_RE.exec(plain);
  if (sev) return { severity: parseSeverity(sev[1]) };
  if (generic && (GENERIC_SECTION_RE.test(plain) || SECTION_NOUN_RE.test(plain))) {
    const word = SEVERITY_WORD_RE.exec(plain);
    return word ? { severity: parseSeverity(word[1]) } : {};
  }
  return null;
}

function stripDecoration(text: string): string {
  return text.replace(DECORATION_RE, '');
}

function inlineIssue(text: string): RegExpExecArray | null {
  const m = INLINE_ISSUE_RE.exec(text);
  if (!m || NEGATED_RE.test(text.slice(0, m.index))) return null;
  return m;
}

function fieldOf(text: string): { field: FieldName; value: string } | null {
  const m = FIELD_RE.exec(stripDecoration(text.replace(BULLET_RE, '')));
  if (!m) return null;
  const field = FIELD_LABELS[m[1].trim().toLowerCase()];
  return field ? { field, value: m[2].trim() } : null;
}

export function classifyLine(line: string): Line {
  const t = line.trim();
  if (!t) return { type: 'blank' };
  if (FENCE_RE.test(t)) return { type: 'fence' };
  const indent = line.length - line.trimStart().length;

  const heading = HEADING_RE.exec(t);
  if (heading) {
    const body = heading[2];
    const section = sectionOf(body, true);
    if (section) return { type: 'section', ...section };
    if (heading[1].length === 1) return { type: 'section' };
    const field = fieldOf(body);
    if (field) return { type: 'field', ...field };
    const prefixed = PREFIXED_RE.exec(body);
    return { type: 'marker', kind: 'heading', text: prefixed ? prefixed[2] : body, indent };
  }

  const field = fieldOf(t);
  if (field) return { type: 'field', ...field };

  const unbulleted = stripDecoration(t.replace(BULLET_RE, ''));
  const boldOnly = /^(\*\*|__)[^*_]+\1:?$/.test(unbulleted);
  if (boldOnly || t.endsWith(':')) {
    const section = sectionOf(unbulleted, true);
    if (section) return { type: 'section', ...section };
  } else if (!BULLET_RE.test(t) && unbulleted.split(/\s+/).length <= 4) {
    const section = sectionOf(unbulleted, false);
    if (section) return { type: 'section', ...section };
  }

  const prefixed = PREFIXED_RE.exec(unbulleted);
  if (prefixed) {
    return { type: 'marker', kind: 'prefixed', text: prefixed[2], indent, number: Number(prefixed[1]) };
  }

  const numbered = NUMBERED_RE.exec(t);
  if (numbered) {
    return { type: 'marker', kind: 'numbered', text: numbered[2], indent, number: Number(numbered[1]) };
  }

  if (BOLD_LEAD_RE.test(unbulleted)) {
    return { type: 'marker', kind: 'bold', text: unbulleted, indent };
  }

  if (hasLeadingSeverityTag(unbulleted) || (BULLET_RE.test(t) && hasSeverityTag(unbulleted))) {
    return { type: 'marker', kind: 'severity', text: unbulleted, indent };
  }

  if (!t.endsWith(':') && inlineIssue(unbulleted)) {
    return { type: 'marker', kind: 'inline', text: unbulleted, indent };
  }

  return { type: 'text', text: unbulleted };
}

// --- Marker text ---

interface MarkerParts {
  title?: string;
  severity?: Severity;
  remainder: string;
}

function cleanTitle(raw: string): string | undefined {
  const title = raw
    .replace(/`/g, '')
    .replace(/\*\*|__/g, '')
    .replace(/^#?\d+[.):]\s*/, '')
    .replace(/\s+(?:at|in|on)\s+[\w.]+(?:\(\))?:\d+$/, '')
    .replace(/\s+(?:at|on)\s+line\s+\d+$/i, '')
    .replace(/\s+/g, ' ')
    .replace(/[\s:.\-–—]+$/, '')
    .trim();
  if (!title || isBareSeverity(title)) return undefined;
  return title;
}

function stripSeparators(text: string): string {
  return text.replace(/^[\s:.\-–—|]+/, '').trim();
}

function splitTitle(text: string): { title: string; rest: string } {
  const m = /:\s+|\s+[-–—]\s+/.exec(text);
  if (!m) return { title: text, rest: '' };
  return { title: text.slice(0, m.index), rest: text.slice(m.index + m[0].length).trim() };
}

export function parseMarkerText(raw: string): MarkerParts {
  const text = stripDecoration(raw.trim().replace(/^\d+[.)]\s+/, ''));

  const bold = BOLD_LEAD_RE.exec(text);
  if (bold) {
    const innerRaw = bold[2].trim();
    const inner = takeSeverityTag(innerRaw);
    if (isBareSeverity(innerRaw) || (inner.severity && !inner.text)) {
      const parts = parseMarkerText(stripSeparators(bold[3]));
      return { ...parts, severity: parts.severity ?? inner.severity ?? parseSeverity(innerRaw) };
    }
    const rest = takeSeverityTag(stripSeparators(bold[3]));
    return {
      title: cleanTitle(inner.text),
      severity: inner.severity ?? rest.severity,
      remainder: stripSeparators(rest.text),
    };
  }

  const tag = takeSeverityTag(text.replace(/\*\*|__/g, ''));
  const { title, rest } = splitTitle(tag.text);
  return { title: cleanTitle(title), severity: tag.severity, remainder: rest };
}

// --- Blocks ---

interface Block {
  kind: MarkerKind;
  number?: number;
  title?: string;
  markerSeverity?: Severity;
  fieldSeverity?: Severity;
  sectionSeverity?: Severity;
  description: string[];
  impact: string[];
  fix: string[];
  fences: string[];
  locations: string[];
  hintText: string[];
  raw: string[];
  openField?: TextField;
  expectsList: boolean;
}

function isTextField(field: FieldName): field is TextField {
  return field === 'description' || field === 'impact' || field === 'fix';
}

function splitLocations(value: string): string[] {
  return value
    .split(/[,;]|\s+and\s+/)
    .map(s =>
      s
        .replace(/`/g, '')
        .replace(/\(\)/g, '')
        .replace(/[.\s]+$/, '')
        .trim(),
    )
    .filter(s => s.length > 0);
}

function locationHints(text: string): string[] {
  const out: string[] = [];
  for (const m of text.matchAll(NAME_LINE_RE)) out.push(`${m[1]}:${m[2]}`);
  for (const m of text.matchAll(NAME_AT_LINE_RE)) out.push(`${m[1]}:${m[2]}`);
  return out;
}

function join(lines: string[]): string {
  return lines.join('\n').trim();
}

class TextParser {
  private readonly fragments: Fragment[] = [];
  private section: Severity | undefined;
  private block: Block | null = null;
  private loose: string[] = [];
  private fence: string[] | null = null;

  parse(text: string): Fragment[] {
    for (const line of text.replace(/\r\n?/g, '\n').split('\n')) {
      this.consume(line);
    }
    if (this.fence) this.closeFence();
    this.closeBlock();
    this.flushLoose();
    return this.fragments;
  }

  private consume(line: string): void {
    if (this.fence) {
      if (FENCE_RE.test(line.trim())) this.closeFence();
      else this.fence.push(line);
      return;
    }

    const c = classifyLine(line);
    const block = this.block;

    switch (c.type) {
      case 'blank':
        if (block) {
          block.raw.push('');
          const field = block.openField;
          if (field && block[field].length > 0) block.openField = undefined;
        } else {
          this.loose.push('');
        }
        return;
      case 'fence':
        this.fence = [];
        return;
      case 'section':
        this.closeBlock();
        this.flushLoose();
        this.section = c.severity;
        return;
      case 'field':
        if (block) this.applyField(block, c.field, c.value, line);
        else this.openBlock({ type: 'marker', kind: 'field', text: '', indent: 0 }, line, c);
        return;
      case 'marker':
        if (block && this.continues(block, c)) {
          this.appendText(block, line.trim().replace(BULLET_RE, ''), line);
        } else {
          this.openBlock(c, line);
        }
        return;
      case 'text':
        if (block) this.appendText(block, c.text, line);
        else this.loose.push(line);
        return;
    }
  }

  private continues(block: Block, marker: Extract<Line, { type: 'marker' }>): boolean {
    if (marker.indent >= 2) return true;
    if (marker.kind === 'inline') return block.kind !== 'inline';
    if (marker.kind !== 'numbered') return false;
    const nextInSequence =
      block.kind === 'numbered' && block.number !== undefined && marker.number === block.number + 1;
    if (nextInSequence) return false;
    return block.openField !== undefined || block.expectsList;
  }

  private openBlock(
    marker: Extract<Line, { type: 'marker' }>,
    line: string,
    field?: Extract<Line, { type: 'field' }>,
  ): void {
    this.closeBlock();
    this.flushLoose();

    const block: Block = {
      kind: marker.kind,
      number: marker.number,
      sectionSeverity: this.section,
      description: [],
      impact: [],
      fix: [],
      fences: [],
      locations: [],
      hintText: [],
      raw: [line],
      expectsList: false,
    };
    this.block = block;

    if (field) {
      this.applyField(block, field.field, field.value);
      return;
    }

    const inline = marker.kind === 'inline' ? inlineIssue(marker.text) : null;
    if (inline) {
      block.title = cleanTitle(inline[2]);
      block.markerSeverity = parseSeverity(inline[1]);
      block.hintText.push(marker.text);
      block.description.push(marker.text.trim());
      return;
    }

    const parts = parseMarkerText(marker.text);
    block.title = parts.title;
    block.markerSeverity = parts.severity;
    block.hintText.push(marker.text);
    if (parts.remainder) this.applyInline(block, parts.remainder);
  }

  /** Splits "desc. Impact: ... Fix: ..." style remainders into their fields. */
  private applyInline(block: Block, text: string): void {
    const labels = [...text.matchAll(INLINE_LABEL_RE)];
    const head = labels.length > 0 ? text.slice(0, labels[0].index ?? 0) : text;
    if (head.trim()) block.description.push(head.trim());

    labels.forEach((m, i) => {
      const start = (m.index ?? 0) + m[0].length;
      const end = i + 1 < labels.length ? (labels[i + 1].index ?? text.length) : text.length;
      const value = text.slice(start, end).trim();
      const field = FIELD_LABELS[m[1].toLowerCase()];
      if (field && value) this.applyField(block, field, value);
    });
    block.expectsList = text.trim().endsWith(':');
  }

  private applyField(block: Block, field: FieldName, value: string, line?: string): void {
    if (line !== undefined) block.raw.push(line);
    block.expectsList = false;

    switch (field) {
      case 'title': {
        block.title ??= cleanTitle(value);
        block.openField = undefined;
        return;
      }
      case 'severity':
        block.fieldSeverity ??= parseSeverity(value);
        block.openField = undefined;
        return;
      case 'location':
        block.locations.push(...splitLocations(value));
        block.openField = undefined;
        return;
      case 'category':
        block.openField = undefined;
        return;
      default:
        if (isTextField(field)) {
          if (value) block[field].push(value);
          block.openField = field;
        }
    }
  }

  private appendText(block: Block, text: string, line: string): void {
    block.raw.push(line);
    const target = block.openField ?? 'description';
    block[target].push(text);
    block.expectsList = text.trim().endsWith(':');
  }

  private closeFence(): void {
    const content = (this.fence ?? []).join('\n');
    this.fence = null;
    const block = this.block;
    if (block) {
      block.fences.push(content);
      block.raw.push(content);
    } else {
      this.loose.push(content);
    }
  }

  private flushLoose(): void {
    const text = this.loose.join('\n').trim();
    if (text) this.fragments.push({ kind: 'unparseable', text });
    this.loose = [];
  }

  private closeBlock(): void {
    const block = this.block;
    if (!block) return;
    this.block = null;
    this.fragments.push(finishBlock(block));
  }
}

function finishBlock(block: Block): Fragment {
  const severity = block.fieldSeverity ?? block.markerSeverity ?? block.sectionSeverity;
  const title = block.title;
  const description = join(block.description);
  const fixText = join(block.fix);
  const snippet = block.fences[0]?.trim() ?? '';
  const fix = [fixText, snippet].filter(s => s.length > 0).join('\n') || undefined;
  const impact = join(block.impact) || deriveImpact(description, fix);

  const hints = locationHints([...block.hintText, description, join(block.impact), fixText].join('\n'));
  const locations = [...new Set([...block.locations, ...hints])];

  const hasBody = description.length > 0 || locations.length > 0 || fix !== undefined || impact !== undefined;
  const rawText = join(block.raw);

  // A title alone under a heading or in bold, with no severity, is a divider.
  if (severity === undefined && !hasBody && (block.kind === 'heading' || block.kind === 'bold')) {
    return { kind: 'unparseable', text: rawText };
  }
  if (title === undefined && (severity === undefined || description.length === 0)) {
    return { kind: 'unparseable', text: rawText };
  }

  const issue: PredictedIssue = {
    title: title ?? UNKNOWN,
    severity: severity ?? UNKNOWN,
    locations,
    description,
    ...(fix !== undefined ? { fix } : {}),
    ...(impact !== undefined ? { impact } : {}),
  };

  const missing: IssueField[] = [];
  if (title === undefined) missing.push('title');
  if (severity === undefined) missing.push('severity');
  return missing.length > 0 ? { kind: 'partially_parsed', issue, missing } : { kind: 'fully_parsed', issue };
}

export function parseText(text: string): Fragment[] {
  return new TextParser().parse(text);
}
