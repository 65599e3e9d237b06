import { describe, it, expect } from 'vitest';
import { mockTextSource, MOCK_RECEIPTS } from './mock';

describe('Mock text source', () => {
  const source = mockTextSource();

  it('returns the invoice receipt for railway or invoice files', async () => {
    expect((await source.extract({ filePath: '/uploads/Railway-92BA953E.pdf' })).text).toBe(MOCK_RECEIPTS.railway);
    expect((await source.extract({ filePath: '/uploads/x', fileName: 'invoice.pdf' })).text).toBe(MOCK_RECEIPTS.railway);
  });

  it('returns the wallet transfer for opay or photo files', async () => {
    const result = await source.extract({ filePath: '/uploads/photo_2025.jpg' });
    expect(result.text).toBe(MOCK_RECEIPTS.opay);
    expect(result.metadata).toEqual({ source: 'mock', fileType: 'image', durationMs: 0 });
  });

  it('falls back to a generic receipt', async () => {
    expect((await source.extract({ filePath: '/uploads/scan.pdf' })).text).toBe(MOCK_RECEIPTS.generic);
  });
});
