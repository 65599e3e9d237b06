/**
 * @fileoverview Category Classification
 *
 * Maps a receipt onto one label of the closed category set using an ordered
 * keyword table. The vendor name is consulted on its own first because it is
 * the most specific signal; the full text is only searched when the vendor
 * says nothing. Individuals receiving a transfer fall back to `personal`.
 */

import { z } from 'zod';
import { CategorySchema, DEFAULT_CATEGORY, type Category } from '@receipt-tracker/shared';
import categoryKeywordsData from '../data/category-keywords.json';
import { containsAny } from '../extractors/text';

const CategoryKeywordsSchema = z.array(
  z.object({
    category: CategorySchema,
    /** Lowercase substrings; the first table entry with a hit wins */
    keywords: z.array(z.string().min(1)).min(1)
  })
);

export type CategoryKeywords = z.infer<typeof CategoryKeywordsSchema>[number];

export const CATEGORY_KEYWORDS: readonly CategoryKeywords[] = CategoryKeywordsSchema.parse(categoryKeywordsData);

/** Any of these in the vendor marks it as an organisation, not a person. */
export const COMPANY_INDICATORS: readonly string[] = [
  'ltd',
  'limited',
  'inc',
  'corp',
  'company',
  'plc',
  'stores',
  'bank',
  'communications'
];

export const TRANSFER_WORDS: readonly string[] = ['transfer', 'recipient', 'beneficiary', 'sent to'];

export interface CategoryClassifier {
  classify(vendor: string | null, text: string): Category;
}

function firstMatch(haystack: string, table: readonly CategoryKeywords[]): Category | null {
  const hit = table.find(entry => containsAny(haystack, entry.keywords));
  return hit ? hit.category : null;
}

function looksLikePersonName(vendor: string): boolean {
  const words = vendor.trim().split(/\s+/);
  if (words.length < 2 || words.length > 4) return false;
  if (!words.every(word => /^\p{L}+$/u.test(word))) return false;
  return !containsAny(vendor.toLowerCase(), COMPANY_INDICATORS);
}

/**
 * Creates the classifier. Always returns exactly one category; `other` when no
 * rule applies.
 */
export function categoryClassifier(table: readonly CategoryKeywords[] = CATEGORY_KEYWORDS): CategoryClassifier {
  return {
    classify(vendor, text) {
      const vendorLower = (vendor ?? '').toLowerCase();
      const textLower = text.toLowerCase();

      if (vendorLower) {
        const byVendor = firstMatch(vendorLower, table);
        if (byVendor) return byVendor;
      }

      const byText = firstMatch(`${vendorLower} ${textLower}`, table);
      if (byText) return byText;

      if (vendor && looksLikePersonName(vendor) && containsAny(textLower, TRANSFER_WORDS)) {
        return 'personal';
      }

      return DEFAULT_CATEGORY;
    }
  };
}
