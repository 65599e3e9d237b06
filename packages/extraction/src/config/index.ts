/**
 * Extraction Configuration
 *
 * Every threshold the heuristics depend on is a named value here rather than a
 * literal inside an extractor. Defaults reproduce the behaviour tuned against
 * real receipts; callers override individual values per section and the merged
 * result is validated before a pipeline is built.
 */

import { z } from 'zod';

const nonNegative = z.number().finite().nonnegative();
const positiveInt = z.number().int().positive();

export const ExtractionConfigSchema = z.object({
  /** Gatekeeping applied to the raw text before any extractor runs */
  input: z.object({
    /** Trimmed text shorter than this is treated as insufficient input */
    minTextLength: z.number().int().nonnegative(),
    /** Upper bound on characters scanned; bounds regex work on untrusted text */
    maxTextLength: positiveInt
  }),

  /** Vendor fallback chain */
  vendor: z.object({
    /** Minimum length of a label-anchored or suffix-matched candidate */
    minLength: positiveInt,
    /** Number of leading non-empty lines scanned by the uppercase heuristic */
    headerLinesToScan: positiveInt,
    /** Longest header line still considered a business name */
    maxHeaderLineLength: positiveInt,
    /** Uppercase letters / non-space characters must exceed this ratio */
    uppercaseRatio: z.number().min(0).max(1)
  }),

  /** Total amount candidate filtering and scoring */
  amount: z.object({
    /** Values above this are presumed transaction or reference IDs */
    maxAmount: nonNegative,
    /** Values below this are presumed unit prices or fees */
    minSignificantAmount: nonNegative,
    /** Multiplier for the normalized document position (0..1) */
    positionWeight: nonNegative,
    /** Cap on the magnitude contribution to the score */
    magnitudeCap: nonNegative,
    /** Added when a total/due keyword is near the candidate */
    keywordBonus: nonNegative,
    /** Characters inspected either side of the candidate for keywords */
    keywordWindow: z.number().int().nonnegative()
  }),

  /** Line item row parsing */
  lineItems: z.object({
    /** Items totalling less than this are treated as noise */
    minTotalPrice: nonNegative,
    /** Lines shorter than this are never parsed as items */
    minLineLength: z.number().int().nonnegative(),
    /** Lines longer than this are never parsed as items */
    maxLineLength: positiveInt
  })
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

/** Per-section partial overrides accepted by {@link resolveConfig}. */
export type ExtractionConfigOverrides = {
  [Section in keyof ExtractionConfig]?: Partial<ExtractionConfig[Section]>;
};

export const DEFAULT_CONFIG: ExtractionConfig = {
  input: {
    minTextLength: 10,
    maxTextLength: 200_000
  },
  vendor: {
    minLength: 4,
    headerLinesToScan: 5,
    maxHeaderLineLength: 49,
    uppercaseRatio: 0.5
  },
  amount: {
    maxAmount: 1_000_000,
    minSignificantAmount: 0.5,
    positionWeight: 100,
    magnitudeCap: 1000,
    keywordBonus: 50,
    keywordWindow: 50
  },
  lineItems: {
    minTotalPrice: 10,
    minLineLength: 5,
    maxLineLength: 200
  }
};

/**
 * Merges section overrides over {@link DEFAULT_CONFIG} and validates the result.
 *
 * @throws {z.ZodError} when an override is out of range (e.g. a negative threshold)
 */
export function resolveConfig(overrides: ExtractionConfigOverrides = {}): ExtractionConfig {
  const merged = {
    input: { ...DEFAULT_CONFIG.input, ...overrides.input },
    vendor: { ...DEFAULT_CONFIG.vendor, ...overrides.vendor },
    amount: { ...DEFAULT_CONFIG.amount, ...overrides.amount },
    lineItems: { ...DEFAULT_CONFIG.lineItems, ...overrides.lineItems }
  };
  return ExtractionConfigSchema.parse(merged);
}

function readNumber(env: Record<string, string | undefined>, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Builds overrides from environment variables. Unset or unparsable values are
 * left to the defaults.
 *
 * - `EXTRACTION_MIN_TEXT_LENGTH`
 * - `EXTRACTION_MAX_AMOUNT`
 * - `EXTRACTION_MIN_SIGNIFICANT_AMOUNT`
 * - `EXTRACTION_MIN_LINE_ITEM_TOTAL`
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): ExtractionConfigOverrides {
  const overrides: ExtractionConfigOverrides = {};

  const minTextLength = readNumber(env, 'EXTRACTION_MIN_TEXT_LENGTH');
  if (minTextLength !== undefined) overrides.input = { minTextLength };

  const maxAmount = readNumber(env, 'EXTRACTION_MAX_AMOUNT');
  const minSignificantAmount = readNumber(env, 'EXTRACTION_MIN_SIGNIFICANT_AMOUNT');
  if (maxAmount !== undefined || minSignificantAmount !== undefined) {
    overrides.amount = {
      ...(maxAmount !== undefined ? { maxAmount } : {}),
      ...(minSignificantAmount !== undefined ? { minSignificantAmount } : {})
    };
  }

  const minTotalPrice = readNumber(env, 'EXTRACTION_MIN_LINE_ITEM_TOTAL');
  if (minTotalPrice !== undefined) overrides.lineItems = { minTotalPrice };

  return overrides;
}
