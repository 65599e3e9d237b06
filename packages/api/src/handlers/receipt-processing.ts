/**
 * @fileoverview Receipt Processing Handler
 *
 * Turns an uploaded receipt file into an extraction result: validates the
 * event, obtains raw text from the configured text source, bounds its size and
 * runs the extraction pipeline. Every outcome is logged as one JSON line with a
 * decision code and returned as a status-coded response; the handler never
 * throws.
 *
 * Processing Flow:
 * 1. Validate the event shape and the file type
 * 2. Extract raw text via the text source
 * 3. Reject oversized text
 * 4. Run the pipeline and map its result to a response
 */

import { z } from 'zod';
import { createLogger, type ExtractionResult, type Logger } from '@receipt-tracker/shared';
import { configFromEnv, createReceiptPipeline, type ReceiptPipeline } from '@receipt-tracker/extraction';
import {
  detectFileType,
  getTextSource,
  TextSourceError,
  textSourceConfigFromEnv,
  type TextSource,
  type TextSourceInput,
  type TextSourceMetadata
} from '../services/text-source';

/**
 * Decision codes used for logging and error classification.
 */
export type DecisionCode =
  | 'OK' // Result extracted
  | 'VALIDATION_ERROR_INPUT' // Event missing filePath or malformed
  | 'VALIDATION_ERROR_TYPE' // File extension not recognised
  | 'TEXT_SOURCE_ERROR' // Text source failed
  | 'TEXT_TOO_LARGE' // Extracted text exceeds the byte limit
  | 'EXTRACTION_FAILED' // Pipeline reported success=false
  | 'CONFIG_ERROR'; // Handler could not be built from its configuration

export const ReceiptEventSchema = z.object({
  filePath: z.string().min(1),
  fileName: z.string().min(1).optional()
});

export type ReceiptEvent = z.infer<typeof ReceiptEventSchema>;

export type ReceiptProcessingResponse =
  | { statusCode: 200; result: ExtractionResult; source: TextSourceMetadata }
  | { statusCode: 422; error_code: 'EXTRACTION_FAILED'; message: string; result: ExtractionResult }
  | { statusCode: number; error_code: Exclude<DecisionCode, 'OK' | 'EXTRACTION_FAILED'>; message: string; category?: string };

export interface ReceiptProcessingOptions {
  textSource: TextSource;
  pipeline: ReceiptPipeline;
  logger?: Logger;
  /** Upper bound on extracted text in UTF-8 bytes (default 1MB) */
  maxTextBytes?: number;
}

export const DEFAULT_MAX_TEXT_BYTES = 1 * 1024 * 1024;

const STATUS_BY_CATEGORY: Record<TextSourceError['category'], number> = {
  VALIDATION: 400,
  UNSUPPORTED_TYPE: 415,
  AUTH: 401,
  QUOTA: 429,
  TIMEOUT: 504,
  SERVER: 502,
  FAILED_STATUS: 502
};

function mapTextSourceError(err: unknown): { statusCode: number; category: string; message: string } {
  if (err instanceof TextSourceError) {
    return { statusCode: err.statusCode ?? STATUS_BY_CATEGORY[err.category], category: err.category, message: err.message };
  }
  const message = err instanceof Error ? err.message : 'Unknown text source error';
  return { statusCode: 502, category: 'SERVER', message };
}

function mapConfigError(err: unknown): { error_code: 'TEXT_SOURCE_ERROR' | 'CONFIG_ERROR'; category: string; message: string } {
  if (err instanceof TextSourceError) {
    return { error_code: 'TEXT_SOURCE_ERROR', category: err.category, message: err.message };
  }
  if (err instanceof z.ZodError) {
    const issues = err.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return { error_code: 'CONFIG_ERROR', category: 'VALIDATION', message: `Invalid extraction configuration: ${issues}` };
  }
  return { error_code: 'CONFIG_ERROR', category: 'VALIDATION', message: err instanceof Error ? err.message : 'Invalid configuration' };
}

export function createReceiptProcessingHandler(options: ReceiptProcessingOptions) {
  const { textSource, pipeline } = options;
  const logger = options.logger ?? createLogger({ scope: 'receipt-processing' });
  const maxTextBytes = options.maxTextBytes ?? DEFAULT_MAX_TEXT_BYTES;

  return async (event: unknown): Promise<ReceiptProcessingResponse> => {
    const t0 = Date.now();
    const log = (decision: DecisionCode, extra?: Record<string, unknown>) => {
      const fields = { decision, source: textSource.name, durationMs: Date.now() - t0, ...extra };
      if (decision === 'OK') logger.info('receipt.processed', fields);
      else logger.warn('receipt.rejected', fields);
    };

    const parsed = ReceiptEventSchema.safeParse(event);
    if (!parsed.success) {
      const message = parsed.error.issues.map(issue => `${issue.path.join('.') || 'event'}: ${issue.message}`).join('; ');
      log('VALIDATION_ERROR_INPUT', { reason: message });
      return { statusCode: 400, error_code: 'VALIDATION_ERROR_INPUT', message };
    }

    const input: TextSourceInput = { filePath: parsed.data.filePath };
    if (parsed.data.fileName !== undefined) input.fileName = parsed.data.fileName;
    const fileType = detectFileType(input.fileName ?? input.filePath);
    if (fileType === 'unknown') {
      log('VALIDATION_ERROR_TYPE', { fileName: input.fileName ?? null });
      return { statusCode: 400, error_code: 'VALIDATION_ERROR_TYPE', message: 'Unsupported file type' };
    }

    let text: string;
    let metadata: TextSourceMetadata;
    try {
      ({ text, metadata } = await textSource.extract(input));
    } catch (err) {
      const mapped = mapTextSourceError(err);
      log('TEXT_SOURCE_ERROR', { error_category: mapped.category, message: mapped.message });
      return { statusCode: mapped.statusCode, error_code: 'TEXT_SOURCE_ERROR', message: mapped.message, category: mapped.category };
    }

    const bytes = Buffer.byteLength(text, 'utf8');
    if (bytes > maxTextBytes) {
      log('TEXT_TOO_LARGE', { bytes });
      return { statusCode: 413, error_code: 'TEXT_TOO_LARGE', message: 'Extracted text exceeds size limit' };
    }

    const result = pipeline.process(text);
    if (!result.success) {
      log('EXTRACTION_FAILED', { fileType, bytes, message: result.error });
      return {
        statusCode: 422,
        error_code: 'EXTRACTION_FAILED',
        message: result.error ?? 'Extraction failed',
        result
      };
    }

    log('OK', {
      fileType,
      bytes,
      textSourceMs: metadata.durationMs,
      category: result.category,
      lineItems: result.lineItems.length
    });
    return { statusCode: 200, result, source: metadata };
  };
}

export type ReceiptProcessingHandler = ReturnType<typeof createReceiptProcessingHandler>;

/**
 * Builds a handler from environment configuration (`TEXT_SOURCE`,
 * `EXTRACTION_*`, `TEXT_MAX_BYTES`).
 *
 * @throws {TextSourceError} when the text source configuration is invalid
 * @throws {z.ZodError} when an `EXTRACTION_*` value is out of range
 */
export function handlerFromEnv(env: Record<string, string | undefined> = process.env): ReceiptProcessingHandler {
  const logger = createLogger({ scope: 'receipt-processing' });
  const maxTextBytes = Number(env['TEXT_MAX_BYTES']);
  return createReceiptProcessingHandler({
    textSource: getTextSource(textSourceConfigFromEnv(env), logger.child({ component: 'text-source' })),
    pipeline: createReceiptPipeline({ config: configFromEnv(env), logger: logger.child({ component: 'pipeline' }) }),
    logger,
    ...(Number.isFinite(maxTextBytes) && maxTextBytes > 0 ? { maxTextBytes } : {})
  });
}

let defaultHandler: ReceiptProcessingHandler | undefined;

/** Default handler configured from `process.env` on first use. */
export const handler = async (event: unknown): Promise<ReceiptProcessingResponse> => {
  if (!defaultHandler) {
    try {
      defaultHandler = handlerFromEnv();
    } catch (err) {
      const mapped = mapConfigError(err);
      createLogger({ scope: 'receipt-processing' }).error('receipt.misconfigured', {
        decision: mapped.error_code,
        message: mapped.message
      });
      return { statusCode: 500, ...mapped };
    }
  }
  return defaultHandler(event);
};
