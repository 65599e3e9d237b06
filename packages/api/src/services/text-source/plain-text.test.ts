import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { plainTextSource } from './plain-text';

const TEXT_FIXTURE = fileURLToPath(new URL('../../__fixtures__/grocery-receipt.txt', import.meta.url));

describe('Plain text source', () => {
  const source = plainTextSource();

  it('reads text files as UTF-8', async () => {
    const result = await source.extract({ filePath: TEXT_FIXTURE });

    expect(result.text).toBe(readFileSync(TEXT_FIXTURE, 'utf8'));
    expect(result.text.split('\n')[0]).toBe('SHOPRITE LEKKI');
    expect(result.metadata).toMatchObject({
      source: 'plain',
      fileType: 'text',
      bytes: Buffer.byteLength(result.text, 'utf8')
    });
  });

  it('detects the type from the original file name', async () => {
    await expect(source.extract({ filePath: TEXT_FIXTURE, fileName: 'scan.pdf' })).rejects.toMatchObject({
      category: 'UNSUPPORTED_TYPE',
      message: 'plain text source cannot read pdf files'
    });
  });

  it('reports missing files as validation errors', async () => {
    await expect(source.extract({ filePath: '/nonexistent/receipt.txt' })).rejects.toMatchObject({
      category: 'VALIDATION',
      message: 'File not found: /nonexistent/receipt.txt'
    });
  });
});
