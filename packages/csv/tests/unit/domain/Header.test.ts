import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@sourcemux/core';
import { buildIndex, matchesHeader, validateHeader } from '../../../src/domain/model/Header.js';

describe('Header', () => {
  describe('validateHeader()', () => {
    it('should accept unique names', () => {
      expect(() => validateHeader(['id', 'name', 'Name'])).not.toThrow();
    });

    it('should reject a repeated name', () => {
      expect(() => validateHeader(['id', 'name', 'id'])).toThrow(ConfigurationError);
      expect(() => validateHeader(['id', 'name', 'id'])).toThrow(
        'malformed header: duplicate entry "id" in header [id, name, id]',
      );
    });
  });

  describe('buildIndex()', () => {
    it('should map names to positions', () => {
      const index = buildIndex(['id', 'name']);

      expect(index.get('id')).toBe(0);
      expect(index.get('name')).toBe(1);
      expect(index.get('email')).toBeUndefined();
    });
  });

  describe('matchesHeader()', () => {
    it('should match an identical row', () => {
      expect(matchesHeader(['id', 'name'], ['id', 'name'])).toBe(true);
    });

    it('should not match a reordered, shorter or case-changed row', () => {
      expect(matchesHeader(['id', 'name'], ['name', 'id'])).toBe(false);
      expect(matchesHeader(['id', 'name'], ['id'])).toBe(false);
      expect(matchesHeader(['id', 'name'], ['id', 'Name'])).toBe(false);
    });
  });
});
