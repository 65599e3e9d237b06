import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { silentLogger, type Logger } from '@receipt-tracker/shared';
import { detectFileType, TextSourceError, type TextSource, type TextSourceMetadata } from './types';

export const DEFAULT_INTERNAL_OPTIONS = {
  from_formats: ['pdf', 'image'],
  to_formats: ['md'],
  image_export_mode: 'placeholder',
  do_ocr: true,
  force_ocr: false,
  ocr_engine: 'rapidocr',
  ocr_lang: ['en'],
  pdf_backend: 'dlparse_v2',
  table_mode: 'fast',
  abort_on_error: false,
  return_as_file: false
} as const;

export interface InternalSourceConfig {
  /** Docling-compatible `/v1/convert/file`-style endpoint */
  url: string;
  /** Merged over {@link DEFAULT_INTERNAL_OPTIONS} */
  options?: Record<string, unknown>;
  /** Remove markdown image lines (`![..](..)`) from the returned text */
  stripImageLinks?: boolean;
  timeoutMs?: number;
  debug?: boolean;
}

const DoclingDocumentSchema = z.object({
  md_content: z.string().nullish(),
  text_content: z.string().nullish(),
  html_content: z.string().nullish(),
  metadata: z
    .object({
      pages: z.number().nullish(),
      bytes: z.number().nullish()
    })
    .nullish()
});

const DoclingResponseSchema = z.object({
  status: z.string(),
  document: DoclingDocumentSchema.nullish(),
  errors: z.array(z.object({ message: z.string().optional() })).optional()
});

type DoclingDocument = z.infer<typeof DoclingDocumentSchema>;

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Sends the uploaded file to an internal OCR service as base64 and returns its
 * markdown (falling back to plain text, then HTML).
 */
export function internalTextSource(config: InternalSourceConfig, logger: Logger = silentLogger): TextSource {
  const endpoint = config.url.trim();
  if (!endpoint) {
    throw new TextSourceError({ message: 'Missing INTERNAL_OCR_URL', category: 'VALIDATION', source: 'internal' });
  }

  const name = 'internal';
  const log = logger.child({ source: name });
  const options = { ...DEFAULT_INTERNAL_OPTIONS, ...config.options };
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return {
    name,
    async extract(input) {
      const fileName = input.fileName ?? basename(input.filePath);
      const fileType = detectFileType(fileName);
      if (fileType !== 'pdf' && fileType !== 'image') {
        throw new TextSourceError({
          message: `internal OCR cannot read ${fileType} files`,
          category: 'UNSUPPORTED_TYPE',
          source: name
        });
      }

      let file: Buffer;
      try {
        file = await readFile(input.filePath);
      } catch (err) {
        throw new TextSourceError({ message: `File not found: ${input.filePath}`, category: 'VALIDATION', source: name, cause: err });
      }

      const start = Date.now();
      const payload = {
        options,
        file_sources: [{ base64_string: file.toString('base64'), filename: fileName }]
      };

      if (config.debug) {
        log.debug('text_source.request', { endpoint, fileType, bytes: file.byteLength });
      }

      let response: Response;
      try {
        response = await fetch(endpoint, {
          method: 'POST',
          headers: {
            'content-type': 'application/json',
            accept: 'application/json'
          },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(timeoutMs)
        });
      } catch (err) {
        const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
        throw new TextSourceError({
          message: timedOut ? `internal OCR timed out after ${timeoutMs}ms` : 'internal OCR request failed',
          category: timedOut ? 'TIMEOUT' : 'SERVER',
          source: name,
          cause: err
        });
      }

      const requestId = response.headers.get('x-request-id') ?? response.headers.get('x-amzn-requestid');

      if (!response.ok) {
        const bodyText = await safeText(response);
        throw new TextSourceError({
          message: `internal http error ${response.status}${bodyText ? `: ${bodyText}` : ''}`,
          category: mapStatusToCategory(response.status),
          statusCode: response.status,
          source: name,
          requestId
        });
      }

      const parsed = DoclingResponseSchema.safeParse(await safeJson(response));
      if (!parsed.success) {
        throw new TextSourceError({
          message: 'internal provider returned an unexpected payload',
          category: 'FAILED_STATUS',
          source: name,
          requestId
        });
      }

      const data = parsed.data;
      if (data.status !== 'success' || !data.document) {
        const errMsg =
          data.errors
            ?.map(err => err.message)
            .filter(Boolean)
            .join('; ') || 'provider did not return document payload';
        throw new TextSourceError({
          message: `internal provider error: ${errMsg}`,
          category: 'FAILED_STATUS',
          source: name,
          requestId
        });
      }

      let text = resolveText(data.document);
      if (config.stripImageLinks) {
        text = text.replace(/^!\[[^\]]*]\([^)]+\)\s*$/gm, '');
      }
      if (!text.trim()) {
        throw new TextSourceError({
          message: 'internal provider returned empty text',
          category: 'FAILED_STATUS',
          source: name,
          requestId
        });
      }

      const durationMs = Date.now() - start;
      const metadata: TextSourceMetadata = { source: name, fileType, durationMs, bytes: file.byteLength };
      const pages = data.document.metadata?.pages;
      if (pages !== undefined && pages !== null) metadata.pages = pages;
      if (requestId) metadata.requestId = requestId;

      log.info('text_source.completed', { durationMs, requestId, pages: metadata.pages });

      return { text, metadata };
    }
  };
}

function mapStatusToCategory(status: number): TextSourceError['category'] {
  if (status === 400) return 'VALIDATION';
  if (status === 401 || status === 403) return 'AUTH';
  if (status === 408 || status === 504) return 'TIMEOUT';
  if (status === 415) return 'UNSUPPORTED_TYPE';
  if (status === 429) return 'QUOTA';
  return 'SERVER';
}

function resolveText(doc: DoclingDocument): string {
  if (doc.md_content?.trim()) return doc.md_content;
  if (doc.text_content?.trim()) return doc.text_content;
  if (doc.html_content?.trim()) return doc.html_content;
  return '';
}

async function safeText(res: Response): Promise<string | null> {
  try {
    return await res.text();
  } catch {
    return null;
  }
}

async function safeJson(res: Response): Promise<unknown> {
  try {
    return await res.json();
  } catch {
    return null;
  }
}
