/**
 * @fileoverview Text Source Selection
 *
 * Builds the configured {@link TextSource}. Configuration is an explicit
 * object so tests and scripts can swap the mock source in without touching
 * global state; {@link textSourceConfigFromEnv} is the only place that reads
 * the environment.
 *
 * Supported sources:
 * - `plain` (default): UTF-8 `.txt` files
 * - `pdf`: the text layer of `.pdf` files
 * - `mock`: canned receipts chosen by file name
 * - `internal`: Docling-compatible OCR service over HTTP
 */

import { z } from 'zod';
import { silentLogger, type Logger } from '@receipt-tracker/shared';
import { internalTextSource, type InternalSourceConfig } from './internal';
import { mockTextSource } from './mock';
import { pdfTextSource } from './pdf';
import { plainTextSource } from './plain-text';
import { TextSourceError, type TextSource } from './types';

export * from './types';
export { internalTextSource, DEFAULT_INTERNAL_OPTIONS, type InternalSourceConfig } from './internal';
export { mockTextSource, MOCK_RECEIPTS } from './mock';
export { pdfTextSource } from './pdf';
export { plainTextSource } from './plain-text';

export type TextSourceKind = 'mock' | 'plain' | 'pdf' | 'internal';

export type TextSourceConfig =
  | { kind: 'mock' }
  | { kind: 'plain' }
  | { kind: 'pdf' }
  | { kind: 'internal'; internal: InternalSourceConfig };

const TextSourceKindSchema = z.enum(['mock', 'plain', 'pdf', 'internal']);
const InternalOptionsSchema = z.record(z.unknown());

/**
 * Reads text source configuration.
 *
 * - `TEXT_SOURCE`: `mock | plain | pdf | internal` (default `plain`)
 * - `INTERNAL_OCR_URL`: endpoint for the internal source
 * - `INTERNAL_OCR_OPTIONS_JSON`: JSON object merged over the default conversion options
 * - `OCR_STRIP_IMAGE_LINKS=1`, `OCR_DEBUG=1`
 *
 * @throws {TextSourceError} VALIDATION for an unknown source or malformed options
 */
export function textSourceConfigFromEnv(env: Record<string, string | undefined> = process.env): TextSourceConfig {
  const id = (env['TEXT_SOURCE'] || 'plain').trim().toLowerCase();
  const kind = TextSourceKindSchema.safeParse(id);
  if (!kind.success) {
    throw new TextSourceError({ message: `Unknown text source: ${id}`, category: 'VALIDATION' });
  }
  if (kind.data !== 'internal') return { kind: kind.data };

  const internal: InternalSourceConfig = {
    url: env['INTERNAL_OCR_URL']?.trim() ?? '',
    stripImageLinks: env['OCR_STRIP_IMAGE_LINKS'] === '1',
    debug: env['OCR_DEBUG'] === '1'
  };

  const rawOptions = env['INTERNAL_OCR_OPTIONS_JSON'];
  if (rawOptions) {
    let json: unknown;
    try {
      json = JSON.parse(rawOptions);
    } catch (err) {
      throw new TextSourceError({ message: 'INTERNAL_OCR_OPTIONS_JSON is not valid JSON', category: 'VALIDATION', cause: err });
    }
    const options = InternalOptionsSchema.safeParse(json);
    if (!options.success) {
      throw new TextSourceError({ message: 'INTERNAL_OCR_OPTIONS_JSON must be an object', category: 'VALIDATION' });
    }
    internal.options = options.data;
  }

  return { kind: 'internal', internal };
}

/**
 * Creates the text source described by `config`.
 *
 * @throws {TextSourceError} VALIDATION when the internal source has no endpoint
 *
 * @example
 * ```typescript
 * const source = getTextSource(textSourceConfigFromEnv());
 * const { text } = await source.extract({ filePath: '/tmp/upload-1.txt' });
 * ```
 */
export function getTextSource(config: TextSourceConfig, logger: Logger = silentLogger): TextSource {
  switch (config.kind) {
    case 'mock':
      return mockTextSource();
    case 'plain':
      return plainTextSource(logger);
    case 'pdf':
      return pdfTextSource(logger);
    case 'internal':
      return internalTextSource(config.internal, logger);
  }
}
