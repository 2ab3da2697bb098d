/**
 * Entity types held by the in-memory resource store.
 *
 * Optional attributes are explicit optional fields, never probed at runtime.
 * Work item visibility fields are internal and only rendered by the debug
 * endpoints; `outlineNumber` reaches the public attributes only while the
 * item is visible.
 */

/** Rich text value (`text/plain` or `text/html`). */
export interface Description {
  type: string;
  value: string;
}

export interface ProjectAttributes {
  id: string;
  name: string;
  description?: Description;
  created: Date;
  updated: Date;
  active: boolean;
  trackerPrefix: string;
  version?: string;
  location?: string;
}

export interface Project {
  id: string;
  attributes: ProjectAttributes;
}

export interface UserAttributes {
  id: string;
  name: string;
  email?: string;
  description?: string;
  disabled: boolean;
  created: Date;
  updated: Date;
}

export interface User {
  id: string;
  attributes: UserAttributes;
}

export interface DocumentAttributes {
  title: string;
  name: string;
  type: string;
  status: string;
  created: Date;
  updated: Date;
  author?: string;
  homePageContent?: Description;
  structureLinkRole?: string;
}

/** Kind of slot a part occupies in a document. */
export type DocumentPartType = 'workitem' | 'heading';

export interface DocumentPart {
  /** `{documentId}/workitem_{shortId}` or `{documentId}/heading_{shortId}` */
  id: string;
  documentId: string;
  partType: DocumentPartType;
  workItemId: string | null;
  /** Dense 1-based rank inside the document. */
  position: number;
  /** Only used to compute `position` when the part was created. */
  previousPartId: string | null;
  createdAt: Date;
}

export interface Document {
  /** `{projectId}/{spaceId}/{name}` */
  id: string;
  projectId: string;
  spaceId: string;
  attributes: DocumentAttributes;
  /** Ordered; the order is the document's visible structure. */
  parts: DocumentPart[];
}

export interface WorkItemAttributes {
  /** Local id without the project prefix. */
  id: string;
  title: string;
  description?: Description;
  type: string;
  status: string;
  priority?: string;
  severity?: string;
  created: Date;
  updated: Date;
  author?: string;
  assignee?: string[];
  categories?: string[];
  dueDate?: string;
  plannedIn?: string[];
  resolution?: string;
  resolvedOn?: string;
  hyperlinks?: Array<Record<string, string>>;
  customFields?: string;
}

export interface WorkItem {
  /** `{projectId}/{localId}` */
  id: string;
  projectId: string;
  attributes: WorkItemAttributes;
  /** Declared document membership (document id). Weak reference. */
  module: string | null;
  /** Hierarchy parent (work item id). Weak reference. */
  parentWorkItemId: string | null;
  isInDocument: boolean;
  documentPosition: number | null;
  outlineNumber: string | null;
}

/** Recorded `linkedworkitems` relationship. */
export interface LinkedWorkItem {
  /** `{workItemId}/{role}/{targetId}` */
  id: string;
  workItemId: string;
  role: string;
  targetId: string;
}

export interface ResourceIdentifier {
  type: string;
  id: string;
}
