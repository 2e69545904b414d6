import type { FastifyRequest } from 'fastify';
import { pageCount, type Paginated } from '@smart-recipe/shared';
import { ApiError } from './errors';
import { queryParam } from './validate';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface PageParams {
  page: number;
  pageSize: number;
}

function invalidPage(): ApiError {
  return new ApiError({ code: 'NOT_FOUND', message: 'Invalid page.' });
}

export function getPageParams(query: unknown): PageParams {
  const rawPage = queryParam(query, 'page');
  let page = 1;
  if (rawPage !== undefined) {
    if (!/^\d+$/.test(rawPage) || Number(rawPage) < 1) throw invalidPage();
    page = Number(rawPage);
  }

  const rawSize = Number(queryParam(query, 'pageSize'));
  const pageSize =
    Number.isInteger(rawSize) && rawSize > 0 ? Math.min(rawSize, MAX_PAGE_SIZE) : DEFAULT_PAGE_SIZE;

  return { page, pageSize };
}

// Request-relative link with `page` swapped; page 1 drops the parameter
function pageLink(request: FastifyRequest, page: number): string {
  const url = new URL(request.url, 'http://localhost');
  if (page === 1) {
    url.searchParams.delete('page');
  } else {
    url.searchParams.set('page', String(page));
  }
  const search = url.searchParams.toString();
  return search ? `${url.pathname}?${search}` : url.pathname;
}

/**
 * Page-number pagination over a counted result set.
 *
 * `fetchPage` only runs once the requested page is known to exist, so an
 * out-of-range page never touches the row query.
 */
export async function paginate<T>(
  request: FastifyRequest,
  count: number,
  fetchPage: (limit: number, offset: number) => Promise<T[]>
): Promise<Paginated<T>> {
  const { page, pageSize } = getPageParams(request.query);
  const lastPage = pageCount(count, pageSize);
  if (page > lastPage) throw invalidPage();

  const results = await fetchPage(pageSize, (page - 1) * pageSize);

  return {
    count,
    next: page < lastPage ? pageLink(request, page + 1) : null,
    previous: page > 1 ? pageLink(request, page - 1) : null,
    results,
  };
}
