import { readFile } from 'node:fs/promises';
import { silentLogger, type Logger } from '@receipt-tracker/shared';
import { detectFileType, TextSourceError, type TextSource } from './types';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR');
}

/**
 * Reads `.txt` uploads as UTF-8, e.g. text already pulled from a PDF's text
 * layer by another tool. Every other file type is rejected.
 */
export function plainTextSource(logger: Logger = silentLogger): TextSource {
  const name = 'plain';

  return {
    name,
    async extract(input) {
      const fileType = detectFileType(input.fileName ?? input.filePath);
      if (fileType !== 'text') {
        throw new TextSourceError({
          message: `plain text source cannot read ${fileType} files`,
          category: 'UNSUPPORTED_TYPE',
          source: name
        });
      }

      const start = Date.now();
      let buffer: Buffer;
      try {
        buffer = await readFile(input.filePath);
      } catch (err) {
        throw new TextSourceError({
          message: isMissingFile(err) ? `File not found: ${input.filePath}` : 'Failed to read file',
          category: isMissingFile(err) ? 'VALIDATION' : 'SERVER',
          source: name,
          cause: err
        });
      }

      const durationMs = Date.now() - start;
      logger.debug('text_source.read', { source: name, bytes: buffer.byteLength, durationMs });

      return {
        text: buffer.toString('utf8'),
        metadata: { source: name, fileType, durationMs, bytes: buffer.byteLength }
      };
    }
  };
}
