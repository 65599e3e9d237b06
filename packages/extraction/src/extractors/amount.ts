/**
 * @fileoverview Total Amount Extraction
 *
 * Receipts mix line prices, subtotals, fees and totals with no reliable
 * structure once they have been through OCR. Every money-shaped numeral is
 * collected as a candidate, implausible values are filtered out, and the rest
 * are ranked by position (totals sit near the end), capped magnitude, and
 * proximity to words like "total" or "due".
 */

import { DEFAULT_CONFIG, type ExtractionConfig } from '../config';
import { containsAny, parseMoney } from './text';
import type { FieldExtractor } from './types';

export type AmountConfig = ExtractionConfig['amount'];

export interface AmountPattern {
  name: string;
  /** Global regex; capture group 1 is the numeral */
  regex: RegExp;
}

const NUMERAL = String.raw`([0-9][0-9,]*(?:\.[0-9]{1,2})?)`;
const FORMATTED_NUMERAL = String.raw`([0-9]{1,3}(?:,[0-9]{3})+(?:\.[0-9]{1,2})?|[0-9]+\.[0-9]{2})`;
const CURRENCY_PREFIX = String.raw`(?:(?:[$₦#]|USD|NGN)\s*)?`;

/** Candidate patterns in priority order; earlier patterns win score ties. */
export const AMOUNT_PATTERNS: readonly AmountPattern[] = [
  { name: 'amount-due', regex: new RegExp(String.raw`amount\s+due[:\s]*${CURRENCY_PREFIX}${NUMERAL}`, 'gi') },
  { name: 'total', regex: new RegExp(String.raw`total[:\s]*${CURRENCY_PREFIX}${NUMERAL}`, 'gi') },
  { name: 'amount', regex: new RegExp(String.raw`amount[:\s]*${CURRENCY_PREFIX}${NUMERAL}`, 'gi') },
  { name: 'naira-symbol', regex: new RegExp(String.raw`₦\s*${NUMERAL}`, 'g') },
  { name: 'dollar-symbol', regex: new RegExp(String.raw`\$\s*${NUMERAL}`, 'g') },
  // OPay prints "#7,000.00"; only formatted money so invoice numbers like "#1042" are ignored
  { name: 'hash-prefixed', regex: new RegExp(String.raw`#\s?${FORMATTED_NUMERAL}`, 'g') },
  { name: 'currency-suffix', regex: new RegExp(String.raw`${NUMERAL}\s*(?:naira|NGN|USD)\b`, 'gi') },
  { name: 'standalone-line', regex: /^[ \t]*([0-9]{1,3}(?:,[0-9]{3})*(?:\.[0-9]{1,2})?)[ \t]*\r?$/gm }
];

/** Words that mark a candidate as a likely final amount. */
export const TOTAL_KEYWORDS: readonly string[] = ['total', 'due', 'amount due', 'pay'];

export interface AmountCandidate {
  value: number;
  /** Character offset of the numeral in the text */
  index: number;
  pattern: string;
}

/**
 * Collects every parsable candidate at or below `maxAmount`, in pattern order
 * and then order of appearance.
 */
export function collectAmountCandidates(text: string, config: AmountConfig = DEFAULT_CONFIG.amount): AmountCandidate[] {
  const candidates: AmountCandidate[] = [];
  for (const pattern of AMOUNT_PATTERNS) {
    for (const match of text.matchAll(pattern.regex)) {
      const numeral = match[1];
      if (numeral === undefined || match.index === undefined) continue;
      const value = parseMoney(numeral);
      if (value === null) continue;
      if (value > config.maxAmount) continue;
      candidates.push({ value, index: match.index + match[0].indexOf(numeral), pattern: pattern.name });
    }
  }
  return candidates;
}

export function scoreAmountCandidate(candidate: AmountCandidate, text: string, config: AmountConfig): number {
  const position = text.length > 0 ? candidate.index / text.length : 0;
  const windowStart = Math.max(0, candidate.index - config.keywordWindow);
  const context = text.slice(windowStart, candidate.index + config.keywordWindow).toLowerCase();
  const bonus = containsAny(context, TOTAL_KEYWORDS) ? config.keywordBonus : 0;
  return position * config.positionWeight + Math.min(candidate.value, config.magnitudeCap) + bonus;
}

/** Creates the total amount extractor. */
export function amountExtractor(config: AmountConfig = DEFAULT_CONFIG.amount): FieldExtractor<number | null> {
  return {
    field: 'amount',
    extract(text) {
      const candidates = collectAmountCandidates(text, config);
      const first = candidates[0];
      if (!first) return null;

      const significant = candidates.filter(candidate => candidate.value >= config.minSignificantAmount);
      if (significant.length === 0) return first.value;

      let best = significant[0];
      let bestScore = -Infinity;
      for (const candidate of significant) {
        const score = scoreAmountCandidate(candidate, text, config);
        if (score > bestScore) {
          best = candidate;
          bestScore = score;
        }
      }
      return best ? best.value : null;
    }
  };
}
