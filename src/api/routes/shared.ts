import type { FastifyRequest } from 'fastify';
import type { ResourceStore } from '../store/store.ts';
import { requestPath } from '../gatekeeper.ts';

/** Options every route plugin is registered with. */
export interface RouteOptions {
  store: ResourceStore;
  apiBasePath: string;
}

/** Raw query string values; repeated keys arrive as arrays. */
export type ApiQuery = Record<string, string | string[] | undefined>;

/** First value of a query parameter, if any. */
export function queryValue(query: ApiQuery, key: string): string | undefined {
  const value = query[key];
  return Array.isArray(value) ? value[0] : value;
}

/** Comma-separated `include` parameter. */
export function includes(query: ApiQuery, relationship: string): boolean {
  const value = queryValue(query, 'include');
  return value !== undefined && value.split(',').map((s) => s.trim()).includes(relationship);
}

/** Absolute URL of the requested collection, without its query string. */
export function collectionUrl(req: FastifyRequest): string {
  return `${req.protocol}://${req.host}${requestPath(req)}`;
}

/**
 * Sort a copy of the items by `sort=field` or `sort=-field`. Unknown fields
 * keep the original order.
 */
export function sortBy<T>(
  items: readonly T[],
  sort: string | undefined,
  keys: Record<string, (item: T) => string | number>,
): T[] {
  const sorted = [...items];
  if (!sort) return sorted;

  const descending = sort.startsWith('-');
  const key = keys[descending ? sort.slice(1) : sort];
  if (!key) return sorted;

  sorted.sort((a, b) => {
    const left = key(a);
    const right = key(b);
    const order = left < right ? -1 : left > right ? 1 : 0;
    return descending ? -order : order;
  });
  return sorted;
}

/** `{ data: { type: 'actions', ... } }` body returned by action endpoints. */
export function actionResult(id: string, message: string) {
  return {
    data: {
      type: 'actions',
      id,
      attributes: { status: 'success', message },
    },
  };
}
