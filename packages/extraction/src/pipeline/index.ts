/**
 * @fileoverview Receipt Extraction Pipeline
 *
 * Runs every field extractor and the category classifier over one document's
 * raw text and assembles an {@link ExtractionResult}. `process` is total: bad
 * input and faults inside an extractor both come back as a failed result with
 * the raw text preserved, never as a thrown error.
 *
 * @example
 * ```typescript
 * const pipeline = createReceiptPipeline({ config: { amount: { maxAmount: 50_000 } } });
 * const result = pipeline.process('TOTAL: $12.34\nBig Store LTD\n2024-12-31');
 * // result.amount === 12.34, result.category === 'retail'
 * ```
 */

import {
  DEFAULT_CATEGORY,
  silentLogger,
  type Category,
  type ExtractionResult,
  type LineItem,
  type Logger
} from '@receipt-tracker/shared';
import { categoryClassifier, type CategoryClassifier } from '../classifier/category';
import { resolveConfig, type ExtractionConfig, type ExtractionConfigOverrides } from '../config';
import { ExtractionError, INSUFFICIENT_TEXT_MESSAGE, toExtractionError } from '../errors';
import { amountExtractor } from '../extractors/amount';
import { dateExtractor } from '../extractors/date';
import { lineItemExtractor } from '../extractors/line-items';
import type { FieldExtractor } from '../extractors/types';
import { vendorExtractor, type KnownVendor, KNOWN_VENDORS } from '../extractors/vendor';

export interface PipelineExtractors {
  vendor: FieldExtractor<string | null>;
  amount: FieldExtractor<number | null>;
  date: FieldExtractor<string | null>;
  lineItems: FieldExtractor<LineItem[]>;
}

export interface ReceiptPipelineOptions {
  /** Threshold overrides merged over the defaults */
  config?: ExtractionConfigOverrides;
  /** Extra alias entries consulted after the bundled ones */
  knownVendors?: readonly KnownVendor[];
  /** Replaces individual extractors, e.g. with a vendor lookup backed by user history */
  extractors?: Partial<PipelineExtractors>;
  classifier?: CategoryClassifier;
  logger?: Logger;
}

export interface ReceiptPipeline {
  readonly config: ExtractionConfig;
  /** Never throws; failures are reported through `success` and `error`. */
  process(text: string | null | undefined): ExtractionResult;
}

function failedResult(rawText: string, error: string): ExtractionResult {
  return {
    vendor: null,
    amount: null,
    date: null,
    category: DEFAULT_CATEGORY,
    lineItems: [],
    rawText,
    success: false,
    error
  };
}

function runField<T>(extractor: FieldExtractor<T>, text: string): T {
  try {
    return extractor.extract(text);
  } catch (err) {
    throw toExtractionError(err, extractor.field);
  }
}

/**
 * Builds a pipeline from validated configuration.
 *
 * @throws {z.ZodError} when `options.config` contains an out-of-range value
 */
export function createReceiptPipeline(options: ReceiptPipelineOptions = {}): ReceiptPipeline {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? silentLogger;
  const knownVendors = options.knownVendors ? [...KNOWN_VENDORS, ...options.knownVendors] : KNOWN_VENDORS;

  const extractors: PipelineExtractors = {
    vendor: options.extractors?.vendor ?? vendorExtractor(config.vendor, knownVendors),
    amount: options.extractors?.amount ?? amountExtractor(config.amount),
    date: options.extractors?.date ?? dateExtractor(),
    lineItems: options.extractors?.lineItems ?? lineItemExtractor(config.lineItems)
  };
  const classifier = options.classifier ?? categoryClassifier();

  const extract = (text: string): ExtractionResult => {
    if (text.trim().length < config.input.minTextLength) {
      throw new ExtractionError({ message: INSUFFICIENT_TEXT_MESSAGE, category: 'INSUFFICIENT_INPUT' });
    }
    if (text.length > config.input.maxTextLength) {
      throw new ExtractionError({
        message: `Text exceeds maximum length of ${config.input.maxTextLength} characters`,
        category: 'TEXT_TOO_LARGE'
      });
    }

    const vendor = runField(extractors.vendor, text);
    const amount = runField(extractors.amount, text);
    const date = runField(extractors.date, text);
    const lineItems = runField(extractors.lineItems, text);

    let category: Category;
    try {
      category = classifier.classify(vendor, text);
    } catch (err) {
      throw toExtractionError(err, 'category');
    }

    return { vendor, amount, date, category, lineItems, rawText: text, success: true, error: null };
  };

  return {
    config,
    process(input) {
      const text = input ?? '';
      const start = Date.now();
      try {
        const result = extract(text);
        logger.info('extraction.completed', {
          decision: 'OK',
          durationMs: Date.now() - start,
          textLength: text.length,
          vendorFound: result.vendor !== null,
          amountFound: result.amount !== null,
          dateFound: result.date !== null,
          lineItems: result.lineItems.length,
          category: result.category
        });
        return result;
      } catch (err) {
        const error = toExtractionError(err);
        logger.warn('extraction.failed', {
          decision: error.category,
          durationMs: Date.now() - start,
          textLength: text.length,
          field: error.field,
          message: error.message
        });
        return failedResult(text, error.message);
      }
    }
  };
}
