/**
 * @fileoverview Query Interface - CQRS Read Side
 *
 * @packageDocumentation
 * @module @eventframe/core/application/cqrs
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * A query asks for data without changing state. It is routed by its
 * `queryType` tag to one handler on the {@link QueryBus}.
 *
 * Queries are plain data: the caching middleware derives its key from the
 * query's type tag and its enumerable fields, so two queries with equal
 * fields share a cache entry.
 *
 * @example
 * ```typescript
 * class GetOrder implements IQuery {
 *   readonly queryType = 'GetOrder';
 *   constructor(readonly orderId: string) {}
 * }
 *
 * const order = await queryBus.handle(ctx, logger, new GetOrder('order-1'));
 * ```
 */

/**
 * IQuery - anything carrying a query type tag.
 */
export interface IQuery {
  /** Routing key on the query bus. */
  readonly queryType: string;
}

/**
 * Paging input shared by list queries.
 */
export interface PaginationParams {
  /** 1-based page number. */
  page: number;
  pageSize: number;
  sortBy?: string;
  sortOrder?: 'asc' | 'desc';
}

/**
 * Page of results returned by list queries.
 */
export interface PaginatedResult<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

/**
 * Build a {@link PaginatedResult} from one page of items.
 *
 * @example
 * ```typescript
 * paginate(['a', 'b'], 5, { page: 2, pageSize: 2 });
 * // { items: ['a', 'b'], total: 5, page: 2, pageSize: 2, totalPages: 3,
 * //   hasNext: true, hasPrevious: true }
 * ```
 */
export function paginate<T>(
  items: T[],
  total: number,
  params: PaginationParams,
): PaginatedResult<T> {
  const totalPages = params.pageSize > 0 ? Math.ceil(total / params.pageSize) : 0;
  return {
    items,
    total,
    page: params.page,
    pageSize: params.pageSize,
    totalPages,
    hasNext: params.page < totalPages,
    hasPrevious: params.page > 1,
  };
}
