/**
 * Document-parts service: listing a document's visible structure and the
 * "add part" call that makes associated work items visible.
 *
 * Callers hold the store's write lock around addParts() and
 * linkWorkItems(), and at least the read lock around listParts().
 */

import { NotFoundError, ValidationError } from '../errors.ts';
import {
  computeOutline,
  computePosition,
  countHeadingChildren,
  headingWorkItemId,
} from '../outline/calculator.ts';
import { shortWorkItemId, type ResourceStore } from '../store/store.ts';
import type { Document, DocumentPart, LinkedWorkItem, WorkItem } from '../store/types.ts';
import { placeInDocument } from '../visibility/state-machine.ts';
import type { AddPartRequest, LinkWorkItemRequest, PlacementResult } from './types.ts';

const PART_RESOURCE_TYPE = 'document_parts';
const LINK_RESOURCE_TYPE = 'linkedworkitems';

/**
 * Parts of a document in order. Work-item parts show only while their item
 * is in the document; heading and other parts always show.
 */
export function listParts(store: ResourceStore, documentId: string): DocumentPart[] {
  const document = store.requireDocument(documentId);
  return document.parts.filter((part) => {
    if (part.partType !== 'workitem' || !part.workItemId) return true;
    return store.workItems.get(part.workItemId)?.isInDocument === true;
  });
}

/**
 * Place work items into a document, one request at a time in request order.
 *
 * There is no rollback: when request N fails, requests 1..N-1 stay applied
 * and the error propagates.
 */
export function addParts(
  store: ResourceStore,
  documentId: string,
  requests: readonly AddPartRequest[],
  onPlaced?: (result: PlacementResult) => void,
): DocumentPart[] {
  const document = store.requireDocument(documentId);
  const created: DocumentPart[] = [];

  for (const request of requests) {
    const part = addPart(store, document, request);
    created.push(part);
    if (onPlaced && part.workItemId) {
      const workItem = store.requireWorkItem(part.workItemId);
      onPlaced({
        partId: part.id,
        workItemId: workItem.id,
        position: part.position,
        outlineNumber: workItem.outlineNumber ?? '',
      });
    }
  }

  return created;
}

function addPart(store: ResourceStore, document: Document, request: AddPartRequest): DocumentPart {
  if (request.resourceType !== PART_RESOURCE_TYPE) {
    throw new ValidationError(`Resource type must be '${PART_RESOURCE_TYPE}'`);
  }
  const partType = request.partType ?? 'workitem';
  if (partType !== 'workitem') {
    throw new ValidationError(`Unsupported part type: ${partType}`);
  }
  if (!request.workItemId) {
    throw new ValidationError('workItem relationship is required');
  }

  const workItem = store.requireWorkItem(request.workItemId);
  if (workItem.module === null) {
    throw new ValidationError(`WorkItem ${workItem.id} has no module relationship`);
  }
  if (workItem.module !== document.id) {
    throw new ValidationError(`WorkItem module (${workItem.module}) does not match document (${document.id})`);
  }

  // Re-placing a visible item moves it: drop its old slot before ranking.
  if (workItem.isInDocument) {
    store.removePartsForWorkItem(document, workItem.id);
  }

  const previousPartId = request.previousPartId ?? null;
  const position = computePosition(document.parts, previousPartId);
  const outlineNumber = outlineFor(store, document, workItem, position, previousPartId);

  placeInDocument(workItem, document.id, position, outlineNumber);

  const isHeading = workItem.attributes.type === 'heading';
  const part: DocumentPart = {
    id: `${document.id}/${isHeading ? 'heading' : 'workitem'}_${shortWorkItemId(workItem.id)}`,
    documentId: document.id,
    partType: isHeading ? 'heading' : 'workitem',
    workItemId: workItem.id,
    position,
    previousPartId,
    createdAt: new Date(),
  };
  store.insertPart(document, part);
  return part;
}

function outlineFor(
  store: ResourceStore,
  document: Document,
  workItem: WorkItem,
  position: number,
  previousPartId: string | null,
): string {
  if (previousPartId) {
    const headingId = headingWorkItemId(previousPartId, document.projectId);
    const heading = headingId ? store.workItems.get(headingId) : undefined;
    if (heading?.outlineNumber) {
      const siblings = [...store.workItems.values()]
        .filter((wi) => wi.isInDocument && wi.id !== workItem.id)
        .map((wi) => wi.outlineNumber);
      return computeOutline({
        position,
        workItemType: workItem.attributes.type,
        headingOutline: heading.outlineNumber,
        headingChildCount: countHeadingChildren(siblings, heading.outlineNumber),
      });
    }
  }

  const parent = workItem.parentWorkItemId ? store.workItems.get(workItem.parentWorkItemId) : undefined;
  return computeOutline({
    position,
    workItemType: workItem.attributes.type,
    parentOutline: parent?.outlineNumber ?? null,
  });
}

/**
 * Record links from a work item to others. A `parent` link sets the item's
 * structural parent, which later placements nest under. Visibility is not
 * touched.
 */
export function linkWorkItems(
  store: ResourceStore,
  workItemId: string,
  requests: readonly LinkWorkItemRequest[],
): LinkedWorkItem[] {
  const workItem = store.requireWorkItem(workItemId);
  const created: LinkedWorkItem[] = [];

  for (const request of requests) {
    if (request.resourceType !== LINK_RESOURCE_TYPE) {
      throw new ValidationError(`Resource type must be '${LINK_RESOURCE_TYPE}'`);
    }
    if (!request.targetWorkItemId) {
      throw new ValidationError('workItem relationship is required');
    }
    if (!store.workItems.has(request.targetWorkItemId)) {
      throw new NotFoundError('workitems', request.targetWorkItemId);
    }

    const role = request.role ?? 'parent';
    if (role === 'parent') {
      workItem.parentWorkItemId = request.targetWorkItemId;
    }

    created.push(
      store.addLink({
        id: `${workItem.id}/${role}/${request.targetWorkItemId}`,
        workItemId: workItem.id,
        role,
        targetId: request.targetWorkItemId,
      }),
    );
  }

  return created;
}
