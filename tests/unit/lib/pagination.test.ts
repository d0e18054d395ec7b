/**
 * Pagination Helper Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  countPages,
  pageOffset,
  validatePageParams,
} from '@/types/pagination.js';

describe('validatePageParams', () => {
  it('should accept the bounds', () => {
    expect(validatePageParams({ page: 1, limit: 1 })).toBeNull();
    expect(validatePageParams({ page: 7, limit: 100 })).toBeNull();
  });

  it('should reject a page below 1', () => {
    expect(validatePageParams({ page: 0, limit: 20 })).toBe(
      'Page must be a positive integer'
    );
  });

  it('should reject a fractional page', () => {
    expect(validatePageParams({ page: 1.5, limit: 20 })).toBe(
      'Page must be a positive integer'
    );
  });

  it('should reject a limit outside 1..100', () => {
    expect(validatePageParams({ page: 1, limit: 0 })).toBe(
      'Limit must be between 1 and 100'
    );
    expect(validatePageParams({ page: 1, limit: 101 })).toBe(
      'Limit must be between 1 and 100'
    );
  });
});

describe('pageOffset', () => {
  it('should skip the preceding pages', () => {
    expect(pageOffset({ page: 1, limit: 20 })).toBe(0);
    expect(pageOffset({ page: 3, limit: 20 })).toBe(40);
  });
});

describe('countPages', () => {
  it('should round up partial pages', () => {
    expect(countPages(0, 20)).toBe(0);
    expect(countPages(20, 20)).toBe(1);
    expect(countPages(21, 20)).toBe(2);
    expect(countPages(45, 20)).toBe(3);
  });
});
