/**
 * Work item visibility transitions.
 *
 *   unassociated --declareModule--> hidden --placeInDocument--> visible
 *                <--clearModule---          (visible --placeInDocument--> visible)
 *
 * A hidden item is what the real service calls "in the recycle bin": it
 * belongs to a document but does not appear in it. The recycle bin is never
 * stored; it is read off the work item with isInRecycleBin().
 */

import { ValidationError } from '../errors.ts';
import type { WorkItem } from '../store/types.ts';

export type VisibilityState = 'unassociated' | 'hidden' | 'visible';

export function visibilityState(workItem: WorkItem): VisibilityState {
  if (workItem.isInDocument) return 'visible';
  if (workItem.module !== null) return 'hidden';
  return 'unassociated';
}

/** A work item is in the recycle bin iff it has a module but is not placed. */
export function isInRecycleBin(workItem: WorkItem): boolean {
  return visibilityState(workItem) === 'hidden';
}

/**
 * Declare the document a work item is meant to live in.
 * Re-declaring the same module is a no-op; a different one must be cleared first.
 */
export function declareModule(workItem: WorkItem, documentId: string): void {
  if (workItem.module === documentId) return;
  if (workItem.module !== null) {
    throw new ValidationError(
      `WorkItem ${workItem.id} already has module ${workItem.module}; clear it before declaring ${documentId}`,
    );
  }
  workItem.module = documentId;
}

export function clearModule(workItem: WorkItem): void {
  if (workItem.isInDocument) {
    throw new ValidationError(`WorkItem ${workItem.id} is placed in ${workItem.module ?? 'a document'}; its module cannot be cleared`);
  }
  workItem.module = null;
}

/**
 * Make a work item visible at the given rank with the given outline label.
 * Also used to re-place an item that is already visible.
 */
export function placeInDocument(workItem: WorkItem, documentId: string, position: number, outlineNumber: string): void {
  if (workItem.module === null) {
    throw new ValidationError(`WorkItem ${workItem.id} has no module relationship`);
  }
  if (workItem.module !== documentId) {
    throw new ValidationError(`WorkItem module (${workItem.module}) does not match document (${documentId})`);
  }
  if (!Number.isInteger(position) || position < 1) {
    throw new ValidationError(`Invalid document position: ${position}`);
  }

  workItem.isInDocument = true;
  workItem.documentPosition = position;
  workItem.outlineNumber = outlineNumber;
}
