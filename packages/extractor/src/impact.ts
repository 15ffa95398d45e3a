const CONSEQUENCE_RE =
  /\b(?:allows?|allowing|enables?|lets|leads?\s+to|results?\s+in|could|can\s+(?:be|lead|cause|result|allow|expose|crash)|may|might|would|causes?|exposes?|attackers?|compromised?|leaks?|leakage|crash(?:es)?|impact)\b/i;

function sentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

/**
 * First sentence of the description that states a consequence and does not
 * also appear inside the fix.
 */
export function deriveImpact(description: string, fix?: string): string | undefined {
  const fixText = fix?.toLowerCase() ?? '';
  for (const sentence of sentences(description)) {
    if (!CONSEQUENCE_RE.test(sentence)) continue;
    if (fixText && fixText.includes(sentence.toLowerCase())) continue;
    return sentence;
  }
  return undefined;
}
