/**
 * Inputs of the document-parts service, already lifted out of the JSON:API
 * request body. Fields stay optional here: the service itself decides what a
 * missing value means, so the HTTP layer does no semantic validation.
 */

export interface AddPartRequest {
  /** JSON:API resource type; must be `document_parts`. */
  resourceType?: string;
  /** Part subtype from `attributes.type`; defaults to `workitem`. */
  partType?: string;
  workItemId?: string;
  /** Part to insert after. Unknown ids append. */
  previousPartId?: string | null;
}

export interface LinkWorkItemRequest {
  /** JSON:API resource type; must be `linkedworkitems`. */
  resourceType?: string;
  /** Link role; defaults to `parent`. */
  role?: string;
  targetWorkItemId?: string;
}

/** Outcome of placing one work item, for logging. */
export interface PlacementResult {
  partId: string;
  workItemId: string;
  position: number;
  outlineNumber: string;
}
