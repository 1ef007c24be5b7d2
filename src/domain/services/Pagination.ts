export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 100;

export interface PageRequest {
  limit: number;
  offset: number;
}

export interface PageInfo extends PageRequest {
  total: number;
  pages: number;
}

export const calculatePages = (total: number, limit: number): number => Math.max(1, Math.ceil(total / limit));

export const buildPageInfo = (total: number, page: PageRequest): PageInfo => ({
  total,
  limit: page.limit,
  offset: page.offset,
  pages: calculatePages(total, page.limit),
});
