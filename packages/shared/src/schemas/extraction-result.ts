/**
 * @fileoverview Receipt Extraction Result Schema
 *
 * Zod schemas and inferred types for the record produced by the extraction
 * pipeline. Consumers that receive a result across a process or storage
 * boundary validate it with `ExtractionResultSchema` before trusting it.
 *
 * Field naming is camelCase; a persistence layer maps `lineItems`, `rawText`,
 * `unitPrice` and `totalPrice` onto its own column names.
 */

import { z } from 'zod';

/**
 * Closed set of receipt categories. Order is presentation order only;
 * classification priority lives in the extraction package's keyword table.
 */
export const CATEGORIES = [
  'technology',
  'business',
  'financial',
  'electronics',
  'groceries',
  'restaurant',
  'fuel',
  'retail',
  'pharmacy',
  'transportation',
  'utilities',
  'education',
  'personal',
  'other'
] as const;

export const CategorySchema = z.enum(CATEGORIES);

export type Category = z.infer<typeof CategorySchema>;

/** Fallback label when no classification rule matches. */
export const DEFAULT_CATEGORY: Category = 'other';

export function isCategory(value: string): value is Category {
  return CategorySchema.safeParse(value).success;
}

/**
 * One purchased item row. Both prices are always populated; whichever one the
 * source line did not encode is derived from the other and the quantity.
 */
export const LineItemSchema = z.object({
  name: z.string().min(1),
  quantity: z.number().int().min(1),
  unitPrice: z.number().nonnegative(),
  totalPrice: z.number().nonnegative()
});

export type LineItem = z.infer<typeof LineItemSchema>;

export const ExtractionResultSchema = z
  .object({
    vendor: z.string().nullable(),
    amount: z.number().nonnegative().nullable(),
    date: z.string().nullable(),
    category: CategorySchema,
    lineItems: z.array(LineItemSchema),
    rawText: z.string(),
    success: z.boolean(),
    error: z.string().nullable()
  })
  .refine(result => result.success === (result.error === null), {
    message: 'error must be set exactly when success is false',
    path: ['error']
  });

export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;
