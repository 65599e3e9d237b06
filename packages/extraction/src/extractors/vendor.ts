/**
 * @fileoverview Vendor Extraction
 *
 * Finds the business or person being paid. OCR output rarely labels the payee,
 * so the extractor walks an ordered fallback chain and the first stage that
 * produces a candidate wins:
 *
 * 1. Known aliases: previously seen vendors matched anywhere in the text
 * 2. Labels: the rest of a line after "Recipient Details", "Merchant:", "Payee:", "Sold by:"
 * 3. Company suffixes: capitalized phrases ending in LTD, INC, STORES, BANK, ...
 * 4. Header heuristic: a mostly-uppercase line near the top of the document
 */

import { z } from 'zod';
import knownVendorsData from '../data/known-vendors.json';
import { DEFAULT_CONFIG, type ExtractionConfig } from '../config';
import { containsAny, splitLines } from './text';
import type { FieldExtractor } from './types';

const KnownVendorsSchema = z.array(
  z.object({
    /** Lowercase phrase searched for in the text */
    alias: z.string().min(1),
    /** Canonical vendor name returned on a hit */
    vendor: z.string().min(1)
  })
);

export type KnownVendor = z.infer<typeof KnownVendorsSchema>[number];

export const KNOWN_VENDORS: readonly KnownVendor[] = KnownVendorsSchema.parse(knownVendorsData);

/** Label phrases; capture group 1 is the candidate vendor. */
export const VENDOR_LABEL_PATTERNS: readonly RegExp[] = [
  /recipient\s+details\s*:?\s*(.+)$/i,
  /\bmerchant\s*:\s*(.+)$/i,
  /\bpayee\s*:\s*(.+)$/i,
  /\bsold\s+by\s*:\s*(.+)$/i
];

export interface CompanySuffixPattern {
  name: string;
  regex: RegExp;
  /** Whether a candidate containing "bank" is acceptable for this pattern */
  allowsBank: boolean;
}

// Character classes exclude line breaks so a match never spans two lines. The
// name part is capped so a failed attempt scans a bounded window, not the rest
// of a long line.
export const COMPANY_SUFFIX_PATTERNS: readonly CompanySuffixPattern[] = [
  {
    name: 'corporate',
    regex: /[A-Z][A-Za-z &.'-]{0,80}\b(?:Corporation|Corp|Limited|Ltd|Inc|Company|LLC|PLC)\b\.?/gi,
    allowsBank: false
  },
  {
    name: 'trade',
    regex: /[A-Z][A-Za-z &.'-]{0,80}\b(?:Stores?|Shopping|Communications?|Bank|Nigeria)\b(?:[ \t]+(?:Limited|Ltd|PLC)\b\.?)?/gi,
    allowsBank: true
  }
];

/** Header lines containing any of these are boilerplate, not a business name. */
export const HEADER_SKIP_TOKENS: readonly string[] = ['invoice', 'receipt', 'transaction', 'date', 'bill to', '@'];

export type VendorConfig = ExtractionConfig['vendor'];

function fromKnownAliases(text: string, knownVendors: readonly KnownVendor[]): string | null {
  const lower = text.toLowerCase();
  const hit = knownVendors.find(entry => lower.includes(entry.alias.toLowerCase()));
  return hit ? hit.vendor : null;
}

function fromLabels(lines: readonly string[], config: VendorConfig): string | null {
  for (const line of lines) {
    for (const pattern of VENDOR_LABEL_PATTERNS) {
      const candidate = pattern.exec(line)?.[1]?.trim();
      if (candidate && candidate.length >= config.minLength) return candidate;
    }
  }
  return null;
}

function fromCompanySuffixes(text: string, config: VendorConfig): string | null {
  for (const pattern of COMPANY_SUFFIX_PATTERNS) {
    for (const match of text.matchAll(pattern.regex)) {
      const candidate = match[0].trim();
      if (candidate.length < config.minLength) continue;
      if (!pattern.allowsBank && candidate.toLowerCase().includes('bank')) continue;
      return candidate;
    }
  }
  return null;
}

function uppercaseRatio(line: string): number {
  const compact = line.replace(/\s/g, '');
  if (compact.length === 0) return 0;
  const upper = compact.match(/\p{Lu}/gu)?.length ?? 0;
  return upper / compact.length;
}

function fromHeaderLines(lines: readonly string[], config: VendorConfig): string | null {
  for (const line of lines.slice(0, config.headerLinesToScan)) {
    if (containsAny(line.toLowerCase(), HEADER_SKIP_TOKENS)) continue;
    if (line.length < config.minLength || line.length > config.maxHeaderLineLength) continue;
    if (uppercaseRatio(line) > config.uppercaseRatio) return line;
  }
  return null;
}

/**
 * Creates the vendor extractor.
 *
 * @param knownVendors - alias dictionary consulted before any heuristic; defaults to `data/known-vendors.json`
 */
export function vendorExtractor(
  config: VendorConfig = DEFAULT_CONFIG.vendor,
  knownVendors: readonly KnownVendor[] = KNOWN_VENDORS
): FieldExtractor<string | null> {
  return {
    field: 'vendor',
    extract(text) {
      if (!text.trim()) return null;
      const lines = splitLines(text);
      return (
        fromKnownAliases(text, knownVendors) ??
        fromLabels(lines, config) ??
        fromCompanySuffixes(text, config) ??
        fromHeaderLines(lines, config)
      );
    }
  };
}
