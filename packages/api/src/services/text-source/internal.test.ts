import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { internalTextSource } from './internal';
import { TextSourceError } from './types';

const PDF_FIXTURE = fileURLToPath(new URL('../../__fixtures__/receipt-scan.pdf', import.meta.url));
const ENDPOINT = 'https://ocr.example.com/v1/convert/file';

function mkJsonResponse(body: unknown, init: ResponseInit & { headers?: Record<string, string> } = { status: 200 }) {
  const headers = new Headers({ 'content-type': 'application/json', ...(init.headers ?? {}) });
  return new Response(JSON.stringify(body), { ...init, headers });
}

describe('Internal OCR text source', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fetchMock.mockReset();
  });

  it('returns markdown with metadata on success', async () => {
    fetchMock.mockResolvedValue(
      mkJsonResponse(
        { status: 'success', document: { md_content: '# Receipt\nTOTAL 12.00', metadata: { pages: 1 } } },
        { status: 200, headers: { 'x-request-id': 'req-internal-1' } }
      )
    );

    const source = internalTextSource({ url: ENDPOINT });
    const result = await source.extract({ filePath: PDF_FIXTURE });

    expect(result.text).toBe('# Receipt\nTOTAL 12.00');
    expect(result.metadata).toMatchObject({
      source: 'internal',
      fileType: 'pdf',
      pages: 1,
      requestId: 'req-internal-1',
      bytes: readFileSync(PDF_FIXTURE).byteLength
    });
  });

  it('posts the file as base64 with merged options', async () => {
    fetchMock.mockResolvedValue(mkJsonResponse({ status: 'success', document: { md_content: 'TOTAL 5.00' } }));

    const source = internalTextSource({ url: ENDPOINT, options: { do_ocr: false } });
    await source.extract({ filePath: PDF_FIXTURE, fileName: 'scan.pdf' });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe('POST');
    const body = JSON.parse(String(init?.body));
    expect(body.file_sources).toEqual([{ base64_string: readFileSync(PDF_FIXTURE).toString('base64'), filename: 'scan.pdf' }]);
    expect(body.options.do_ocr).toBe(false);
    expect(body.options.to_formats).toEqual(['md']);
  });

  it('falls back to plain text content', async () => {
    fetchMock.mockResolvedValue(mkJsonResponse({ status: 'success', document: { md_content: '  ', text_content: 'TOTAL 9.00' } }));

    const result = await internalTextSource({ url: ENDPOINT }).extract({ filePath: PDF_FIXTURE });
    expect(result.text).toBe('TOTAL 9.00');
  });

  it('strips image links when configured', async () => {
    fetchMock.mockResolvedValue(mkJsonResponse({ status: 'success', document: { md_content: '![logo](logo.png)\nTOTAL 5.00' } }));

    const result = await internalTextSource({ url: ENDPOINT, stripImageLinks: true }).extract({ filePath: PDF_FIXTURE });
    expect(result.text).toBe('\nTOTAL 5.00');
  });

  it('maps non-success payloads to FAILED_STATUS', async () => {
    fetchMock.mockResolvedValue(mkJsonResponse({ status: 'error', errors: [{ message: 'ocr failed' }] }));

    await expect(internalTextSource({ url: ENDPOINT }).extract({ filePath: PDF_FIXTURE })).rejects.toMatchObject({
      category: 'FAILED_STATUS',
      message: 'internal provider error: ocr failed'
    });
  });

  it('maps http 403 to AUTH', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 403 }));

    await expect(internalTextSource({ url: ENDPOINT }).extract({ filePath: PDF_FIXTURE })).rejects.toMatchObject({
      category: 'AUTH',
      statusCode: 403
    });
  });

  it('maps http 429 to QUOTA', async () => {
    fetchMock.mockResolvedValue(new Response('slow down', { status: 429 }));

    await expect(internalTextSource({ url: ENDPOINT }).extract({ filePath: PDF_FIXTURE })).rejects.toMatchObject({
      category: 'QUOTA',
      message: 'internal http error 429: slow down'
    });
  });

  it.each<[number, string]>([
    [408, 'TIMEOUT'],
    [504, 'TIMEOUT'],
    [415, 'UNSUPPORTED_TYPE'],
    [400, 'VALIDATION'],
    [500, 'SERVER']
  ])('maps http %i to %s', async (status, category) => {
    fetchMock.mockResolvedValue(new Response(null, { status }));

    await expect(internalTextSource({ url: ENDPOINT }).extract({ filePath: PDF_FIXTURE })).rejects.toMatchObject({
      category,
      statusCode: status,
      message: `internal http error ${status}`
    });
  });

  it('maps request timeouts to TIMEOUT', async () => {
    fetchMock.mockRejectedValue(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));

    await expect(internalTextSource({ url: ENDPOINT, timeoutMs: 10 }).extract({ filePath: PDF_FIXTURE })).rejects.toMatchObject({
      category: 'TIMEOUT',
      message: 'internal OCR timed out after 10ms'
    });
  });

  it('rejects file types the service cannot read', async () => {
    await expect(internalTextSource({ url: ENDPOINT }).extract({ filePath: '/tmp/notes.txt' })).rejects.toMatchObject({
      category: 'UNSUPPORTED_TYPE'
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('requires an endpoint', () => {
    expect(() => internalTextSource({ url: ' ' })).toThrow(TextSourceError);
  });
});
