/**
 * Pagination Types
 * Offset-based pagination shared by listings
 */

/**
 * Parameters for paginated queries
 */
export interface PageParams {
  page: number; // 1-based
  limit: number; // 1..MAX_PAGE_LIMIT
}

/**
 * Result wrapper for paginated data
 */
export interface PagedResult<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

/**
 * Default pagination values
 */
export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

/**
 * Validate pagination params
 * Returns an error message, or null when valid
 */
export function validatePageParams(params: PageParams): string | null {
  if (!Number.isInteger(params.page) || params.page < 1) {
    return 'Page must be a positive integer';
  }
  if (
    !Number.isInteger(params.limit) ||
    params.limit < 1 ||
    params.limit > MAX_PAGE_LIMIT
  ) {
    return `Limit must be between 1 and ${MAX_PAGE_LIMIT}`;
  }
  return null;
}

/**
 * Row offset for a page
 */
export function pageOffset(params: PageParams): number {
  return (params.page - 1) * params.limit;
}

/**
 * Number of pages needed for `total` rows
 */
export function countPages(total: number, limit: number): number {
  return Math.ceil(total / limit);
}
