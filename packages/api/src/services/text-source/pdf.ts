import { readFile } from 'node:fs/promises';
import { silentLogger, type Logger } from '@receipt-tracker/shared';
import { detectFileType, TextSourceError, type TextSource } from './types';

/** Items whose baselines differ by less than this many points share a line. */
const SAME_LINE_TOLERANCE = 2;

// Loaded on first use so the other sources never pay for pdf.js.
async function loadPdfjs() {
  return import('pdfjs-dist/legacy/build/pdf.mjs');
}

interface PositionedText {
  str: string;
  y: number;
}

/** Joins text items into lines, starting a new line whenever the baseline moves. */
export function joinTextItems(items: readonly PositionedText[]): string {
  const lines: string[] = [];
  let current: string[] = [];
  let currentY: number | null = null;

  for (const item of items) {
    if (!item.str.trim()) continue;
    if (currentY !== null && Math.abs(item.y - currentY) >= SAME_LINE_TOLERANCE) {
      lines.push(current.join(' '));
      current = [];
    }
    current.push(item.str);
    currentY = item.y;
  }
  if (current.length > 0) lines.push(current.join(' '));

  return lines.map(line => line.replace(/\s+/g, ' ').trim()).join('\n');
}

/**
 * Reads the text layer of `.pdf` uploads with pdf.js, page by page. Scanned
 * PDFs without a text layer are rejected; send those to the internal OCR
 * source instead.
 */
export function pdfTextSource(logger: Logger = silentLogger): TextSource {
  const name = 'pdf';

  return {
    name,
    async extract(input) {
      const fileType = detectFileType(input.fileName ?? input.filePath);
      if (fileType !== 'pdf') {
        throw new TextSourceError({
          message: `pdf text source cannot read ${fileType} files`,
          category: 'UNSUPPORTED_TYPE',
          source: name
        });
      }

      let buffer: Buffer;
      try {
        buffer = await readFile(input.filePath);
      } catch (err) {
        throw new TextSourceError({ message: `File not found: ${input.filePath}`, category: 'VALIDATION', source: name, cause: err });
      }

      const start = Date.now();
      const { getDocument } = await loadPdfjs();
      const loadingTask = getDocument({ data: new Uint8Array(buffer), verbosity: 0 });
      const pageTexts: string[] = [];
      let pages = 0;

      try {
        const pdf = await loadingTask.promise;
        pages = pdf.numPages;
        for (let pageNumber = 1; pageNumber <= pages; pageNumber++) {
          const page = await pdf.getPage(pageNumber);
          const content = await page.getTextContent();
          const items: PositionedText[] = [];
          for (const item of content.items) {
            if ('str' in item) items.push({ str: item.str, y: Number(item.transform[5]) });
          }
          pageTexts.push(joinTextItems(items));
        }
      } catch (err) {
        throw new TextSourceError({
          message: `Could not read PDF: ${err instanceof Error ? err.message : String(err)}`,
          category: 'VALIDATION',
          source: name,
          cause: err
        });
      } finally {
        await loadingTask.destroy();
      }

      const text = pageTexts.filter(Boolean).join('\n\n');
      if (!text.trim()) {
        throw new TextSourceError({
          message: 'PDF has no text layer',
          category: 'UNSUPPORTED_TYPE',
          source: name
        });
      }

      const durationMs = Date.now() - start;
      logger.debug('text_source.read', { source: name, bytes: buffer.byteLength, pages, durationMs });

      return {
        text,
        metadata: { source: name, fileType, durationMs, pages, bytes: buffer.byteLength }
      };
    }
  };
}
