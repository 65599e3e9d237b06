import { describe, it, expect } from 'vitest';
import { PROJECT_NAME, VERSION, CATEGORIES, DEFAULT_CATEGORY } from './index';

describe('Shared Package', () => {
  describe('Constants', () => {
    it('should export correct project name', () => {
      expect(PROJECT_NAME).toBe('receipt-extraction');
    });

    it('should export correct version', () => {
      expect(VERSION).toBe('1.0.0');
    });

    it('should expose the closed category set with other as default', () => {
      expect(CATEGORIES).toHaveLength(14);
      expect(CATEGORIES).toContain('personal');
      expect(DEFAULT_CATEGORY).toBe('other');
    });
  });
});
