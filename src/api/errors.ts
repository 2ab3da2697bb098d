/**
 * Error types for the mock API and their JSON:API rendering.
 *
 * Every failure reaches the client as `{ errors: [...] }`. Not-found errors
 * render two ways: a sentence for projects, null detail/source for
 * everything else.
 */

/** Where a validation error points into the request document. */
export interface ErrorSource {
  pointer?: string;
  resource?: { type: string; id: string };
}

/** A single JSON:API error object. */
export interface JsonApiError {
  status: string;
  title: string;
  detail?: string | null;
  source?: ErrorSource | null;
  meta?: Record<string, unknown>;
}

/**
 * Base class for errors that map onto an HTTP status.
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly title: string;
  readonly source?: ErrorSource;
  readonly meta?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    options?: {
      title?: string;
      source?: ErrorSource;
      meta?: Record<string, unknown>;
    },
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.title = options?.title ?? 'Error';
    this.source = options?.source;
    this.meta = options?.meta;
  }

  toJsonApi(): JsonApiError {
    const error: JsonApiError = {
      status: String(this.statusCode),
      title: this.title,
      detail: this.message,
    };
    if (this.source) error.source = this.source;
    if (this.meta) error.meta = this.meta;
    return error;
  }
}

/** Malformed request, type mismatch, missing relationship or module mismatch. */
export class ValidationError extends ApiError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 400, {
      title: 'Validation',
      source: field ? { pointer: `/data/attributes/${field}` } : undefined,
    });
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class NotFoundError extends ApiError {
  readonly resourceType: string;
  readonly resourceId: string;

  constructor(resourceType: string, resourceId: string) {
    const message =
      resourceType === 'projects'
        ? `Project id ${resourceId} does not exist.`
        : `${resourceType} with id '${resourceId}' not found`;
    super(message, 404, {
      title: 'Not Found',
      source: { resource: { type: resourceType, id: resourceId } },
    });
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }

  override toJsonApi(): JsonApiError {
    if (this.resourceType === 'projects') {
      return { status: '404', title: 'Not Found', detail: this.message };
    }
    return { status: '404', title: 'Not Found', detail: null, source: null };
  }
}

export class ConflictError extends ApiError {
  constructor(message: string) {
    super(message, 409, { title: 'Conflict' });
    this.name = 'ConflictError';
  }
}

export class AuthError extends ApiError {
  constructor(message: string) {
    super(message, 401, { title: 'Unauthorized' });
    this.name = 'AuthError';
  }
}

/** A path the real service does not serve. */
export class ResourceNotAvailableError extends ApiError {
  constructor(path: string) {
    super(`The requested resource [${path}] is not available`, 404, { title: 'Not Found' });
    this.name = 'ResourceNotAvailableError';
  }
}

export class MethodNotAllowedError extends ApiError {
  constructor(method: string) {
    super(`${method} method is not allowed for this endpoint`, 405, { title: 'Method Not Allowed' });
    this.name = 'MethodNotAllowedError';
  }
}

/** Wrap one or more error objects into a JSON:API error document. */
export function buildErrorDocument(errors: JsonApiError[]): { errors: JsonApiError[] } {
  return { errors };
}
