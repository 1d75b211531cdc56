import { NotFoundError } from './errors';
import type { PageRequest } from './stores/types';

export interface PageParams {
  page: number;
  limit: number;
}

export interface PageSettings {
  pageSize: number;
  maxPageSize: number;
}

export interface Paginated<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

export function positiveInt(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : null;
}

export function parsePageParams(
  query: { page?: string; limit?: string },
  settings: PageSettings
): PageParams {
  let page = 1;
  if (query.page !== undefined) {
    const parsed = positiveInt(query.page);
    if (parsed === null) throw new NotFoundError('Invalid page');
    page = parsed;
  }

  const limit = positiveInt(query.limit);
  return {
    page,
    limit: limit === null ? settings.pageSize : Math.min(limit, settings.maxPageSize),
  };
}

export function toPageRequest(params: PageParams): PageRequest {
  return { limit: params.limit, offset: (params.page - 1) * params.limit };
}

function pageLink(url: URL, page: number): string {
  const link = new URL(url.toString());
  if (page === 1) {
    link.searchParams.delete('page');
  } else {
    link.searchParams.set('page', String(page));
  }
  return link.toString();
}

/** `url` is the absolute URL of the page being served. */
export function paginate<T>(
  url: URL,
  params: PageParams,
  count: number,
  results: T[]
): Paginated<T> {
  const offset = (params.page - 1) * params.limit;
  if (params.page > 1 && offset >= count) {
    throw new NotFoundError('Invalid page');
  }

  return {
    count,
    next: offset + results.length < count ? pageLink(url, params.page + 1) : null,
    previous: params.page > 1 ? pageLink(url, params.page - 1) : null,
    results,
  };
}
