/**
 * Parsing of JSON:API request documents. Shape problems surface as
 * ValidationError so the error handler renders them like any other 400.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.ts';

export const DescriptionSchema = z.object({
  type: z.string().default('text/plain'),
  value: z.string(),
});

const IdentifierSchema = z.object({
  type: z.string().optional(),
  id: z.string().optional(),
});

const RelationshipSchema = z.object({
  data: IdentifierSchema.nullable().optional(),
});

export const ResourceInputSchema = z.object({
  type: z.string().optional(),
  id: z.string().optional(),
  attributes: z.record(z.unknown()).optional(),
  relationships: z.record(RelationshipSchema).optional(),
});

export type ResourceInput = z.infer<typeof ResourceInputSchema>;

const EnvelopeSchema = z.object({ data: z.unknown() });

function describeIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Parse a value with a zod schema, raising ValidationError on failure. When
 * the failing path starts with an attribute name, the error points at it.
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, context?: string): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const message = issue ? describeIssue(issue) : 'Invalid request';
  const field = issue && typeof issue.path[0] === 'string' ? issue.path[0] : undefined;
  throw new ValidationError(context ? `${context}: ${message}` : message, field);
}

function envelopeData(body: unknown, kind: 'array' | 'object'): unknown {
  const result = EnvelopeSchema.safeParse(body);
  if (!result.success || result.data.data === undefined || result.data.data === null) {
    throw new ValidationError(`Request must contain 'data' ${kind}`);
  }
  return result.data.data;
}

/** `{ data: [...] }` as used by every batch create call. */
export function parseResourceArray(body: unknown): ResourceInput[] {
  const data = envelopeData(body, 'array');
  if (!Array.isArray(data)) {
    throw new ValidationError("'data' must be an array");
  }
  return data.map((item: unknown, index) => parseWith(ResourceInputSchema, item, `data[${index}]`));
}

/** `{ data: {...} }` as used by single-resource create and update calls. */
export function parseResourceObject(body: unknown): ResourceInput {
  const data = envelopeData(body, 'object');
  if (Array.isArray(data)) {
    throw new ValidationError("'data' must be an object");
  }
  return parseWith(ResourceInputSchema, data, 'data');
}

/** Id of a to-one relationship, if the resource carries one. */
export function relationshipId(resource: ResourceInput, name: string): string | undefined {
  return resource.relationships?.[name]?.data?.id;
}

export function relationshipPresent(resource: ResourceInput, name: string): boolean {
  return resource.relationships?.[name] !== undefined;
}
