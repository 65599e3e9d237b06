/** Trimmed, non-empty lines of `text`, in source order. */
export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Parses a money numeral such as `7,000.00` or `12.34`. Thousands separators
 * are stripped; returns null when the remainder is not a finite number.
 */
export function parseMoney(raw: string): number | null {
  const cleaned = raw.replace(/,/g, '').trim();
  if (!cleaned) return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some(needle => haystack.includes(needle));
}
