/**
 * JSON:API document assembly: resource objects, collections with pagination
 * meta and links, sparse fieldsets, and the empty-collection size padding the
 * real service exhibits.
 */

import { ValidationError } from '../errors.ts';

/** Size in bytes the real service returns for empty collections. */
export const TARGET_EMPTY_RESPONSE_SIZE = 2472;
/** Slack left for the punctuation the padding field itself adds. */
const PADDING_SLACK = 20;

export const DEFAULT_PAGE_SIZE = 100;

export type Attributes = Record<string, unknown>;

export interface RelationshipObject {
  data: { type: string; id: string } | Array<{ type: string; id: string }> | null;
  links?: Record<string, string>;
  meta?: Record<string, unknown>;
}

export interface ResourceObject {
  type: string;
  id: string;
  attributes?: Attributes;
  relationships?: Record<string, RelationshipObject>;
  links?: Record<string, string>;
  meta?: Record<string, unknown>;
}

export interface CollectionMeta {
  totalCount: number;
  pageCount: number;
  currentPage: number;
  pageSize: number;
  totalPages: number;
  [key: string]: unknown;
}

export interface JsonApiDocument<TData> {
  data: TData;
  included?: ResourceObject[];
  meta?: Record<string, unknown>;
  links?: Record<string, string>;
  jsonapi: { version: string };
}

export interface PageParams {
  pageNumber: number;
  pageSize: number;
}

/** ISO timestamp with microsecond precision: `2024-01-02T03:04:05.678000Z`. */
export function formatDateTime(date: Date): string {
  return date.toISOString().replace(/Z$/, '000Z');
}

/**
 * Build a resource object, leaving out every optional group that is absent.
 */
export function resourceObject(input: ResourceObject): ResourceObject {
  const resource: ResourceObject = { type: input.type, id: input.id };
  if (input.attributes !== undefined) resource.attributes = input.attributes;
  if (input.relationships !== undefined) resource.relationships = input.relationships;
  if (input.links !== undefined) resource.links = input.links;
  if (input.meta !== undefined) resource.meta = input.meta;
  return resource;
}

export function buildDocument<TData>(
  data: TData,
  extras: { included?: ResourceObject[]; meta?: Record<string, unknown>; links?: Record<string, string> } = {},
): JsonApiDocument<TData> {
  return {
    data,
    ...(extras.included && extras.included.length > 0 ? { included: extras.included } : {}),
    ...(extras.meta ? { meta: extras.meta } : {}),
    ...(extras.links ? { links: extras.links } : {}),
    jsonapi: { version: '1.0' },
  };
}

function parsePositiveInt(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}

/** Read `page[number]` and `page[size]` from a parsed query string. */
export function parsePageParams(query: Record<string, unknown>): PageParams {
  const number = query['page[number]'];
  const size = query['page[size]'];
  return {
    pageNumber: parsePositiveInt(typeof number === 'string' ? number : undefined, 'page[number]', 1),
    pageSize: parsePositiveInt(typeof size === 'string' ? size : undefined, 'page[size]', DEFAULT_PAGE_SIZE),
  };
}

export function paginate<T>(items: readonly T[], page: PageParams): T[] {
  const start = (page.pageNumber - 1) * page.pageSize;
  return items.slice(start, start + page.pageSize);
}

export function totalPagesFor(totalCount: number, pageSize: number): number {
  return Math.ceil(totalCount / pageSize);
}

/**
 * `self`, `first` and `last` always; `prev` only after page 1 and `next`
 * only before the last page.
 */
export function paginationLinks(baseUrl: string, pageNumber: number, totalPages: number, pageSize: number): Record<string, string> {
  const pageUrl = (n: number) => `${baseUrl}?page[number]=${n}&page[size]=${pageSize}`;
  const links: Record<string, string> = {
    self: pageUrl(pageNumber),
    first: pageUrl(1),
    last: pageUrl(totalPages),
  };
  if (pageNumber > 1) links.prev = pageUrl(pageNumber - 1);
  if (pageNumber < totalPages) links.next = pageUrl(pageNumber + 1);
  return links;
}

export interface CollectionInput {
  /** The page of resources, in output order. */
  resources: ResourceObject[];
  /** Size of the whole collection before pagination. */
  totalCount: number;
  page: PageParams;
  /** Collection URL without query string. */
  baseUrl: string;
  included?: ResourceObject[];
  meta?: Record<string, unknown>;
}

export function buildCollection(input: CollectionInput): JsonApiDocument<ResourceObject[]> {
  const { resources, totalCount, page } = input;
  const totalPages = totalPagesFor(totalCount, page.pageSize);
  const meta: CollectionMeta = {
    ...input.meta,
    totalCount,
    pageCount: resources.length,
    currentPage: page.pageNumber,
    pageSize: page.pageSize,
    totalPages,
  };
  return buildDocument(resources, {
    included: input.included,
    meta,
    links: paginationLinks(input.baseUrl, page.pageNumber, totalPages, page.pageSize),
  });
}

/** Split a `fields[type]` value into field names. */
export function parseFieldList(value: unknown): string[] | null {
  if (typeof value !== 'string' || value.trim() === '') return null;
  return value
    .split(',')
    .map((field) => field.trim())
    .filter(Boolean);
}

/**
 * Keep only the requested attributes. Requested names the resource does not
 * have are dropped without complaint.
 */
export function applySparseFieldset(resource: ResourceObject, fields: readonly string[] | null): ResourceObject {
  if (!fields || fields.length === 0 || !resource.attributes) return resource;
  const attributes: Attributes = {};
  for (const field of fields) {
    if (Object.hasOwn(resource.attributes, field)) {
      attributes[field] = resource.attributes[field];
    }
  }
  return { ...resource, attributes };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pad a serialized empty collection towards the size the real service
 * returns. Anything that is not an empty collection comes back unchanged.
 */
export function padEmptyCollection(payload: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return payload;
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.data) || parsed.data.length !== 0) return payload;
  const meta = parsed.meta;
  if (!isRecord(meta) || meta.totalCount !== 0) return payload;

  const compact = JSON.stringify(parsed);
  const currentSize = Buffer.byteLength(compact, 'utf8');
  if (currentSize >= TARGET_EMPTY_RESPONSE_SIZE) return compact;

  meta._padding = ' '.repeat(Math.max(0, TARGET_EMPTY_RESPONSE_SIZE - currentSize - PADDING_SLACK));
  return JSON.stringify(parsed);
}
