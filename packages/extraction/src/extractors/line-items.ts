/**
 * @fileoverview Line Item Extraction
 *
 * Parses purchased-item rows such as "Big Pack Pcs 2 800.00" or
 * "Crispy Fried Yam 1,500.00". Each line is tried against an ordered list of
 * row shapes; the first shape that matches decides how quantity, unit price
 * and total price are derived. Header, summary and separator lines are
 * skipped before any pattern runs.
 */

import type { LineItem } from '@receipt-tracker/shared';
import { DEFAULT_CONFIG, type ExtractionConfig } from '../config';
import { containsAny, parseMoney, roundMoney, splitLines } from './text';
import type { FieldExtractor } from './types';

export type LineItemConfig = ExtractionConfig['lineItems'];

/** Lines containing any of these (lowercased) are never items. */
export const LINE_SKIP_KEYWORDS: readonly string[] = [
  'item name',
  'description',
  'subtotal',
  'sub total',
  'total',
  'discount',
  'settled',
  'thank you',
  'receipt',
  'change due',
  '====',
  '----'
];

/**
 * How the capture groups of a row pattern map onto an item:
 * - `unit-quantity-total`: name, unit label, quantity, line total
 * - `name-price`: name, price (quantity 1)
 * - `name-quantity-price`: name, optional quantity, price
 */
export type RowShape = 'unit-quantity-total' | 'name-price' | 'name-quantity-price';

export interface LineItemPattern {
  shape: RowShape;
  regex: RegExp;
}

// Whitespace inside a name is consumed a whole run at a time and only before
// another name character, so a run of spaces has exactly one way to match.
const NAME_CHAR = String.raw`[A-Za-z.,&'-]`;
const NAME = String.raw`([A-Za-z](?:${NAME_CHAR}|\s+(?=${NAME_CHAR}))*?)`;
const PRICE = String.raw`([0-9][0-9,]*(?:\.[0-9]{1,2})?)`;

/** Row shapes in priority order. */
export const LINE_ITEM_PATTERNS: readonly LineItemPattern[] = [
  {
    shape: 'unit-quantity-total',
    regex: new RegExp(String.raw`^${NAME}\s+(Pcs?|REGULAR|Units?|Ea)\s+(\d+)\s+${PRICE}$`, 'i')
  },
  {
    shape: 'name-price',
    regex: new RegExp(String.raw`^${NAME}\s+${PRICE}$`, 'i')
  },
  {
    shape: 'name-quantity-price',
    regex: new RegExp(String.raw`^${NAME}\s+(?:(?:Pcs?|REGULAR|x)\s*)?(?:(\d+)\s*)?(?:x\s*)?${PRICE}$`, 'i')
  }
];

/** Trims, collapses whitespace and title-cases each word ("BIG PACK" → "Big Pack"). */
export function normalizeItemName(raw: string): string {
  return raw
    .trim()
    .replace(/\s+/g, ' ')
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

function buildItem(name: string, quantity: number, totalPrice: number): LineItem {
  // A printed quantity of 0 still describes one purchased row.
  const qty = quantity > 0 ? quantity : 1;
  return {
    name: normalizeItemName(name),
    quantity: qty,
    unitPrice: roundMoney(totalPrice / qty),
    totalPrice
  };
}

function toItem(shape: RowShape, groups: ReadonlyArray<string | undefined>): LineItem | null {
  const [name, second, third, fourth] = groups;
  if (!name) return null;

  switch (shape) {
    case 'unit-quantity-total': {
      const total = fourth === undefined ? null : parseMoney(fourth);
      if (total === null || third === undefined) return null;
      return buildItem(name, Number.parseInt(third, 10), total);
    }
    case 'name-price': {
      const total = second === undefined ? null : parseMoney(second);
      if (total === null) return null;
      return buildItem(name, 1, total);
    }
    case 'name-quantity-price': {
      if (second !== undefined && /^\d+$/.test(second)) {
        const total = third === undefined ? null : parseMoney(third);
        if (total === null) return null;
        return buildItem(name, Number.parseInt(second, 10), total);
      }
      const price = parseMoney(second ?? third ?? '');
      if (price === null) return null;
      return buildItem(name, 1, price);
    }
  }
}

function isCandidateLine(line: string, config: LineItemConfig): boolean {
  if (line.length < config.minLineLength || line.length > config.maxLineLength) return false;
  if (!/\d/.test(line)) return false;
  return !containsAny(line.toLowerCase(), LINE_SKIP_KEYWORDS);
}

/** Creates the line item extractor. Output preserves source line order. */
export function lineItemExtractor(config: LineItemConfig = DEFAULT_CONFIG.lineItems): FieldExtractor<LineItem[]> {
  return {
    field: 'lineItems',
    extract(text) {
      const items: LineItem[] = [];
      for (const line of splitLines(text)) {
        if (!isCandidateLine(line, config)) continue;
        for (const pattern of LINE_ITEM_PATTERNS) {
          const match = pattern.regex.exec(line);
          if (!match) continue;
          const item = toItem(pattern.shape, match.slice(1));
          if (item && item.totalPrice >= config.minTotalPrice) items.push(item);
          break;
        }
      }
      return items;
    }
  };
}
