import { describe, it, expect, vi } from 'vitest';
import { ZodError } from 'zod';
import { createLogger, ExtractionResultSchema } from '@receipt-tracker/shared';
import { INSUFFICIENT_TEXT_MESSAGE } from '../errors';
import { createReceiptPipeline } from './index';

describe('Receipt pipeline', () => {
  const pipeline = createReceiptPipeline();

  it('should extract amount, vendor and date from a simple receipt', () => {
    const text = 'TOTAL: $12.34\nBig Store LTD\n2024-12-31';
    expect(pipeline.process(text)).toEqual({
      vendor: 'Big Store LTD',
      amount: 12.34,
      date: '2024-12-31',
      category: 'retail',
      lineItems: [],
      rawText: text,
      success: true,
      error: null
    });
  });

  it('should accept naira amounts without keyword context', () => {
    const result = pipeline.process('Payment slip\n₦7,000.00\nStatus: Successful');
    expect(result.success).toBe(true);
    expect(result.amount).toBe(7000);
  });

  it('should fail short input with empty fields', () => {
    expect(pipeline.process('hi')).toEqual({
      vendor: null,
      amount: null,
      date: null,
      category: 'other',
      lineItems: [],
      rawText: 'hi',
      success: false,
      error: INSUFFICIENT_TEXT_MESSAGE
    });
  });

  it('should treat missing text as insufficient input', () => {
    const result = pipeline.process(undefined);
    expect(result.success).toBe(false);
    expect(result.rawText).toBe('');
    expect(result.error).toBe(INSUFFICIENT_TEXT_MESSAGE);
  });

  it('should classify wallet transfers as financial', () => {
    const result = pipeline.process('OPay\nTransaction Receipt\n₦2,500.00\nRecipient Details: Ada Obi');
    expect(result.vendor).toBe('Ada Obi');
    expect(result.category).toBe('financial');
  });

  it('should classify deposit slips from any bank as financial', () => {
    const result = pipeline.process('Sterling Bank PLC\nDeposit slip\nAmount 2,000.00\n2025-11-03');
    expect(result.vendor).toBe('Sterling Bank PLC');
    expect(result.category).toBe('financial');
  });

  it('should parse line items', () => {
    const result = pipeline.process('Shoprite Lekki\nBig Pack Pcs 2 800.00\nTotal 800.00');
    expect(result.lineItems).toEqual([{ name: 'Big Pack', quantity: 2, unitPrice: 400, totalPrice: 800 }]);
    expect(result.amount).toBe(800);
  });

  it('should be deterministic', () => {
    const text = 'Merchant: Mama Put Kitchen\nJollof Rice 2 3,000.00\nTotal ₦3,000.00\nNov 7th, 2025 17:53:25';
    expect(pipeline.process(text)).toEqual(pipeline.process(text));
  });

  it('should produce results that satisfy the shared schema', () => {
    expect(ExtractionResultSchema.safeParse(pipeline.process('TOTAL: $12.34\nBig Store LTD')).success).toBe(true);
    expect(ExtractionResultSchema.safeParse(pipeline.process('')).success).toBe(true);
  });

  it('should reject text over the configured limit', () => {
    const small = createReceiptPipeline({ config: { input: { maxTextLength: 20 } } });
    const result = small.process('x'.repeat(21));
    expect(result.success).toBe(false);
    expect(result.error).toBe('Text exceeds maximum length of 20 characters');
  });

  it('should contain faults raised by an extractor', () => {
    const faulty = createReceiptPipeline({
      extractors: {
        amount: {
          field: 'amount',
          extract() {
            throw new Error('numeric overflow');
          }
        }
      }
    });
    const text = 'TOTAL: $12.34\nBig Store LTD';
    const result = faulty.process(text);
    expect(result).toMatchObject({ success: false, error: 'numeric overflow', rawText: text, vendor: null, amount: null });
  });

  it('should use extra known vendors', () => {
    const custom = createReceiptPipeline({ knownVendors: [{ alias: 'mama put', vendor: 'Mama Put Kitchen' }] });
    const result = custom.process('mama put\nJollof rice 1,500.00');
    expect(result.vendor).toBe('Mama Put Kitchen');
    expect(result.category).toBe('restaurant');
  });

  it('should validate configuration when built', () => {
    expect(() => createReceiptPipeline({ config: { amount: { maxAmount: -5 } } })).toThrow(ZodError);
  });

  it('should log one decision line per call', () => {
    const sink = vi.fn();
    const logged = createReceiptPipeline({ logger: createLogger({ scope: 'pipeline', sink }) });

    logged.process('TOTAL: $12.34\nBig Store LTD');
    logged.process('hi');

    expect(sink).toHaveBeenCalledTimes(2);
    const first = JSON.parse(String(sink.mock.calls[0]?.[0]));
    const second = JSON.parse(String(sink.mock.calls[1]?.[0]));
    expect(first).toMatchObject({ scope: 'pipeline', event: 'extraction.completed', decision: 'OK', category: 'retail' });
    expect(second).toMatchObject({ level: 'warn', event: 'extraction.failed', decision: 'INSUFFICIENT_INPUT' });
  });
});
