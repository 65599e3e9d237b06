/**
 * Categories of extraction failures.
 *
 * - INSUFFICIENT_INPUT: text missing or too short to analyze
 * - TEXT_TOO_LARGE: text exceeds the configured scan limit
 * - EXTRACTION_FAILURE: unexpected fault while evaluating patterns or numbers
 */
export type ExtractionErrorCategory = 'INSUFFICIENT_INPUT' | 'TEXT_TOO_LARGE' | 'EXTRACTION_FAILURE';

export const INSUFFICIENT_TEXT_MESSAGE = 'Could not extract meaningful text from document';

/**
 * Error raised inside the pipeline and converted into a failed result at its
 * boundary. Never escapes `ReceiptPipeline.process`.
 */
export class ExtractionError extends Error {
  category: ExtractionErrorCategory;
  /** Extractor that was running when the fault occurred, if any */
  field?: string;
  causeMessage?: string;

  constructor(options: { message: string; category: ExtractionErrorCategory; field?: string; cause?: unknown }) {
    super(options.message);
    this.name = 'ExtractionError';
    this.category = options.category;
    if (options.field !== undefined) this.field = options.field;
    const cm = options.cause instanceof Error ? options.cause.message : undefined;
    if (cm !== undefined) this.causeMessage = cm;
  }

  toJSON() {
    return {
      name: 'ExtractionError',
      message: this.message,
      category: this.category,
      field: this.field
    } satisfies Record<string, unknown>;
  }
}

export function toExtractionError(err: unknown, field?: string): ExtractionError {
  if (err instanceof ExtractionError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ExtractionError({
    message,
    category: 'EXTRACTION_FAILURE',
    cause: err,
    ...(field !== undefined ? { field } : {})
  });
}
