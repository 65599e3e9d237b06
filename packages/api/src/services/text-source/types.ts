/**
 * @fileoverview Text Source Interface
 *
 * A text source turns an uploaded receipt file into raw text for the
 * extraction pipeline. Implementations range from reading a plain text file
 * to calling an OCR service; all of them report failures through
 * {@link TextSourceError} so callers can map them to a status code and decide
 * whether a retry makes sense.
 */

/**
 * Categories of text source failures.
 *
 * - VALIDATION: bad input or configuration (missing file, missing endpoint)
 * - UNSUPPORTED_TYPE: the source cannot read this kind of file
 * - AUTH / QUOTA / TIMEOUT / SERVER: upstream service failures
 * - FAILED_STATUS: the service answered but produced no usable text
 */
export type TextSourceErrorCategory =
  | 'VALIDATION'
  | 'UNSUPPORTED_TYPE'
  | 'AUTH'
  | 'QUOTA'
  | 'TIMEOUT'
  | 'SERVER'
  | 'FAILED_STATUS';

export class TextSourceError extends Error {
  category: TextSourceErrorCategory;
  /** HTTP status returned by an upstream service, if any */
  statusCode?: number;
  source?: string;
  requestId?: string | null;
  causeMessage?: string;

  constructor(options: {
    message: string;
    category: TextSourceErrorCategory;
    statusCode?: number;
    source?: string;
    requestId?: string | null;
    cause?: unknown;
  }) {
    super(options.message);
    this.name = 'TextSourceError';
    this.category = options.category;
    if (options.statusCode !== undefined) this.statusCode = options.statusCode;
    if (options.source !== undefined) this.source = options.source;
    if (options.requestId !== undefined) this.requestId = options.requestId;
    const cm = options.cause instanceof Error ? options.cause.message : undefined;
    if (cm !== undefined) this.causeMessage = cm;
  }

  toJSON() {
    return {
      name: 'TextSourceError',
      message: this.message,
      category: this.category,
      statusCode: this.statusCode,
      source: this.source,
      requestId: this.requestId
    } satisfies Record<string, unknown>;
  }
}

export type FileType = 'pdf' | 'image' | 'text' | 'unknown';

export interface TextSourceInput {
  /** Local path of the uploaded file */
  filePath: string;
  /** Original upload name; used for type detection when the stored path has no extension */
  fileName?: string;
}

export interface TextSourceMetadata {
  /** Text source name for identification and logging */
  source: string;
  fileType: FileType;
  durationMs: number;
  pages?: number;
  /** Size of the input file in bytes */
  bytes?: number;
  requestId?: string | null;
}

export interface TextSourceResult {
  text: string;
  metadata: TextSourceMetadata;
}

export interface TextSource {
  name: string;
  extract(input: TextSourceInput): Promise<TextSourceResult>;
}

const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.tiff', '.bmp']);

/** Classifies a file by its (case-insensitive) extension. */
export function detectFileType(fileName: string): FileType {
  const match = /\.[^./\\]+$/.exec(fileName.trim());
  const extension = match ? match[0].toLowerCase() : '';
  if (extension === '.pdf') return 'pdf';
  if (IMAGE_EXTENSIONS.has(extension)) return 'image';
  if (extension === '.txt') return 'text';
  return 'unknown';
}

/**
 * Determines if an error category supports retry operations.
 *
 * @example
 * ```typescript
 * if (err instanceof TextSourceError && isRetryable(err.category)) {
 *   // schedule another attempt
 * }
 * ```
 */
export function isRetryable(category: TextSourceErrorCategory): boolean {
  return category === 'QUOTA' || category === 'TIMEOUT' || category === 'SERVER';
}
