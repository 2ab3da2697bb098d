/**
 * Position and outline-number arithmetic for document placement.
 *
 * Pure functions: callers gather the inputs from the store and apply the
 * results. All arithmetic is integer; positions are 1-based.
 */

import type { DocumentPart } from '../store/types.ts';

const HEADING_TAG = 'heading_';

/**
 * Rank a new part takes in a document.
 *
 * Without a previous part it is appended. With one, it goes directly after
 * it. A previous part that is not in the document also appends.
 */
export function computePosition(parts: readonly Pick<DocumentPart, 'id'>[], previousPartId?: string | null): number {
  if (previousPartId) {
    const index = parts.findIndex((part) => part.id === previousPartId);
    if (index !== -1) return index + 2;
  }
  return parts.length + 1;
}

export interface OutlineInput {
  position: number;
  workItemType: string;
  /** Outline of the item's structural parent, when that parent is placed. */
  parentOutline?: string | null;
  /** Outline of the heading the item is inserted directly after. */
  headingOutline?: string | null;
  /** Placed items already numbered under `headingOutline`. */
  headingChildCount?: number;
}

/**
 * Outline label for a newly placed item.
 *
 *   after heading "4.1" with 1 child   -> "4.1-2"
 *   parent "FC-1.1-1", position 4      -> "FC-1.1-1.4"
 *   parent "2.3", position 4           -> "2.3-4"
 *   heading at position 13             -> "2.3"
 *   requirement at position 13         -> "FC-1.2-3"
 */
export function computeOutline(input: OutlineInput): string {
  const { position, workItemType, parentOutline, headingOutline } = input;
  if (!Number.isInteger(position) || position < 1) {
    throw new RangeError(`position must be a positive integer, got ${position}`);
  }

  if (headingOutline) {
    return `${headingOutline}-${(input.headingChildCount ?? 0) + 1}`;
  }

  if (parentOutline) {
    return parentOutline.includes('-') ? `${parentOutline}.${position}` : `${parentOutline}-${position}`;
  }

  const zeroBased = position - 1;

  if (workItemType === 'heading') {
    const major = Math.floor(zeroBased / 10) + 1;
    const minor = (zeroBased % 10) + 1;
    return `${major}.${minor}`;
  }

  const section = Math.floor(zeroBased / 100) + 1;
  const subsection = Math.floor((zeroBased % 100) / 10) + 1;
  const itemNum = (zeroBased % 10) + 1;
  return `FC-${section}.${subsection}-${itemNum}`;
}

export function isHeadingPartId(partId: string): boolean {
  return partId.includes(HEADING_TAG);
}

/**
 * Work item id a heading-tagged part id refers to.
 *
 * `.../heading_PYTH-9397` and `heading_PYTH-9397` both resolve to
 * `{projectId}/PYTH-9397`; a tag followed by a full `project/id` is used as is.
 */
export function headingWorkItemId(partId: string, projectId: string): string | null {
  const index = partId.lastIndexOf(HEADING_TAG);
  if (index === -1) return null;
  const ref = partId.slice(index + HEADING_TAG.length);
  if (!ref) return null;
  return ref.includes('/') ? ref : `${projectId}/${ref}`;
}

/** Number of outlines already nested directly under `headingOutline`. */
export function countHeadingChildren(outlines: Iterable<string | null>, headingOutline: string): number {
  const prefix = `${headingOutline}-`;
  let count = 0;
  for (const outline of outlines) {
    if (outline && outline.startsWith(prefix)) count++;
  }
  return count;
}
