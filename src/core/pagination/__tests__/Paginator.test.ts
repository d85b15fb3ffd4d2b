import { describe, it, expect } from 'vitest';
import { completeList, paginate, validatePageParams } from '../Paginator.js';

describe('paginate', () => {
  it('returns an empty first page without more data', () => {
    expect(paginate([], 1, 25, 0)).toEqual({
      items: [],
      total: 0,
      count: 0,
      page: 1,
      per_page: 25,
      offset: 0,
      has_more: false,
      next_page: null,
      next_offset: null
    });
  });

  it('computes has_more from a known total', () => {
    const envelope = paginate(['a', 'b'], 2, 2, 5);
    expect(envelope).toMatchObject({ offset: 2, count: 2, has_more: true, next_page: 3, next_offset: 4 });
  });

  it('stops exactly at the known total', () => {
    expect(paginate(['a', 'b'], 2, 2, 4)).toMatchObject({ has_more: false, next_page: null, next_offset: null });
  });

  it.each([
    [1, 10, 9, false],
    [1, 10, 10, false],
    [1, 10, 11, true],
    [3, 7, 22, true],
    [4, 7, 28, false]
  ])('page %i of %i with total %i has_more=%s', (page, perPage, total, expected) => {
    expect(paginate([], page, perPage, total).has_more).toBe(expected);
  });

  it('infers has_more from a full page when the total is unknown', () => {
    expect(paginate([1, 2, 3], 1, 3, null)).toMatchObject({ total: null, has_more: true, next_page: 2 });
    expect(paginate([1, 2], 1, 3, null)).toMatchObject({ total: null, has_more: false, next_page: null });
  });

  it('accepts per_page 100', () => {
    expect(paginate([], 1, 100, null).per_page).toBe(100);
  });

  it('rejects per_page 101 naming the maximum', () => {
    expect(() => paginate([], 1, 101, null)).toThrow('per_page: must be ≤ 100, got 101');
  });
});

describe('validatePageParams', () => {
  it('collects every violated parameter', () => {
    expect(() => validatePageParams(0, 0, -1)).toThrow(
      'page: must be an integer ≥ 1, got 0; per_page: must be an integer ≥ 1, got 0; total: must be an integer ≥ 0, got -1'
    );
  });
});

describe('completeList', () => {
  it('reports a closed catalog as a single complete page', () => {
    expect(completeList(['open', 'closed'])).toEqual({
      items: ['open', 'closed'],
      total: 2,
      count: 2,
      page: 1,
      per_page: 2,
      offset: 0,
      has_more: false,
      next_page: null,
      next_offset: null
    });
  });

  it('keeps per_page at least 1 for an empty catalog', () => {
    const envelope = completeList([]);

    expect(envelope.per_page).toBe(1);
    expect(envelope.count).toBe(0);
    expect(() => validatePageParams(envelope.page, envelope.per_page, envelope.total)).not.toThrow();
  });
});
