import { MAX_PER_PAGE } from '../../constants.js';
import { ValidationError, type FieldIssue } from '../../infrastructure/errors/ValidationError.js';

/**
 * One page of a list response. `total` is null when the API did not
 * report one; `next_page`/`next_offset` are null when there is no more data.
 */
export interface PaginationEnvelope<T> {
  readonly items: readonly T[];
  readonly total: number | null;
  readonly count: number;
  readonly page: number;
  readonly per_page: number;
  readonly offset: number;
  readonly has_more: boolean;
  readonly next_page: number | null;
  readonly next_offset: number | null;
}

export function validatePageParams(page: number, perPage: number, total: number | null = null): void {
  const issues: FieldIssue[] = [];

  if (!Number.isSafeInteger(page) || page < 1) {
    issues.push({ field: 'page', reason: `must be an integer ≥ 1, got ${page}` });
  }
  if (!Number.isSafeInteger(perPage) || perPage < 1) {
    issues.push({ field: 'per_page', reason: `must be an integer ≥ 1, got ${perPage}` });
  } else if (perPage > MAX_PER_PAGE) {
    issues.push({ field: 'per_page', reason: `must be ≤ ${MAX_PER_PAGE}, got ${perPage}` });
  }
  if (total !== null && (!Number.isSafeInteger(total) || total < 0)) {
    issues.push({ field: 'total', reason: `must be an integer ≥ 0, got ${total}` });
  }

  const [first, ...rest] = issues;
  if (first) {
    throw new ValidationError([first, ...rest]);
  }
}

/**
 * Wrap one page of results.
 *
 * With a known total, `has_more` is exact. Without one it is inferred from a
 * full page (`count === perPage`), so a last page that is exactly full still
 * reports `has_more: true`; the next request then comes back empty.
 *
 * @throws ValidationError for out-of-range page, per_page or total
 */
export function paginate<T>(items: readonly T[], page: number, perPage: number, total: number | null): PaginationEnvelope<T> {
  validatePageParams(page, perPage, total);

  const offset = (page - 1) * perPage;
  const count = items.length;
  const hasMore = total !== null ? page * perPage < total : count === perPage;

  return {
    items,
    total,
    count,
    page,
    per_page: perPage,
    offset,
    has_more: hasMore,
    next_page: hasMore ? page + 1 : null,
    next_offset: hasMore ? offset + perPage : null
  };
}

/**
 * Envelope for a closed catalog that was fetched in full
 * (groups, states, priorities): never more pages.
 */
export function completeList<T>(items: readonly T[]): PaginationEnvelope<T> {
  return {
    items,
    total: items.length,
    count: items.length,
    page: 1,
    per_page: Math.max(items.length, 1),
    offset: 0,
    has_more: false,
    next_page: null,
    next_offset: null
  };
}
