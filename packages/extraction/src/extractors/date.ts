/**
 * @fileoverview Transaction Date Extraction
 *
 * Returns the first date-shaped substring, trying the most specific shapes
 * first. The value is kept exactly as printed: storage treats it as display
 * text, so "Nov 31" is accepted as-is and nothing is reformatted.
 */

import type { FieldExtractor } from './types';

const FULL_MONTHS = 'January|February|March|April|May|June|July|August|September|October|November|December';
const SHORT_MONTHS = 'Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sept|Sep|Oct|Nov|Dec';
const ORDINAL = '(?:st|nd|rd|th)?';
const TIME = String.raw`\d{1,2}:\d{2}(?::\d{2})?(?:\s?[AP]M)?`;

export interface DatePattern {
  name: string;
  /** Capture group 1 is the date as printed */
  regex: RegExp;
}

/** Date shapes in priority order. */
export const DATE_PATTERNS: readonly DatePattern[] = [
  {
    name: 'full-month',
    regex: new RegExp(String.raw`\b((?:${FULL_MONTHS})\s+\d{1,2}${ORDINAL},?\s+\d{4}(?:,?\s+${TIME})?)`, 'i')
  },
  {
    // OPay style: "Nov 7th, 2025 17:53:25"
    name: 'short-month-with-time',
    regex: new RegExp(String.raw`\b((?:${SHORT_MONTHS})\.?\s*-?\s*\d{1,2}${ORDINAL},?\s+\d{4},?\s+${TIME})`, 'i')
  },
  {
    name: 'short-month',
    regex: new RegExp(String.raw`\b((?:${SHORT_MONTHS})\.?\s*-?\s*\d{1,2}${ORDINAL},?\s+\d{4})\b`, 'i')
  },
  {
    name: 'day-month-year',
    regex: new RegExp(String.raw`\b(\d{1,2}${ORDINAL}\s+(?:${FULL_MONTHS}|${SHORT_MONTHS})\.?,?\s+\d{2,4})\b`, 'i')
  },
  {
    name: 'iso',
    regex: new RegExp(String.raw`\b(\d{4}-\d{1,2}-\d{1,2}(?:[ T]${TIME})?)`)
  },
  {
    name: 'numeric',
    regex: new RegExp(String.raw`\b(\d{1,2}[-/]\d{1,2}[-/]\d{2,4}(?:\s+${TIME})?)\b`, 'i')
  }
];

export function dateExtractor(): FieldExtractor<string | null> {
  return {
    field: 'date',
    extract(text) {
      for (const pattern of DATE_PATTERNS) {
        const value = pattern.regex.exec(text)?.[1];
        if (value) return value.trim();
      }
      return null;
    }
  };
}
