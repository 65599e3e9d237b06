import { detectFileType, type TextSource } from './types';

/** Canned receipts keyed by the file-name fragments that select them. */
export const MOCK_RECEIPTS = {
  railway: [
    'Railway Corporation',
    'Invoice number 92BA953E-0003',
    'Date of issue: Nov 3, 2025',
    'Hobby plan usage',
    'Amount due $7.15 USD'
  ].join('\n'),
  opay: [
    'OPay',
    'Transaction Receipt',
    '₦7,000.00',
    'Successful',
    'Nov 7th, 2025 17:53:25',
    'Recipient Details: Ada Obi',
    'Transaction Type Transfer'
  ].join('\n'),
  generic: ['TEST VENDOR', 'Receipt', 'Total 100.00', '2025-11-10'].join('\n')
} as const;

/**
 * Returns canned text chosen by file name, for local development and demos
 * without an OCR service. The file itself is never read.
 */
export function mockTextSource(): TextSource {
  const name = 'mock';

  return {
    name,
    async extract(input) {
      const fileName = (input.fileName ?? input.filePath).toLowerCase();
      let text: string = MOCK_RECEIPTS.generic;
      if (fileName.includes('railway') || fileName.includes('invoice')) text = MOCK_RECEIPTS.railway;
      else if (fileName.includes('opay') || fileName.includes('photo')) text = MOCK_RECEIPTS.opay;

      return {
        text,
        metadata: { source: name, fileType: detectFileType(fileName), durationMs: 0 }
      };
    }
  };
}
