/**
 * In-memory resource store.
 *
 * Owns every entity in id-keyed maps (Map keeps insertion order, which the
 * list endpoints rely on). Nothing survives a restart. Callers serialise
 * access through `read()` / `write()`; the helpers themselves are synchronous
 * and assume the caller already holds the right side of the lock.
 */

import { ConflictError, NotFoundError } from '../errors.ts';
import { isInRecycleBin } from '../visibility/state-machine.ts';
import { ReadWriteLock } from './lock.ts';
import type {
  Description,
  Document,
  DocumentAttributes,
  DocumentPart,
  LinkedWorkItem,
  Project,
  ProjectAttributes,
  User,
  WorkItem,
  WorkItemAttributes,
} from './types.ts';

export interface NewProjectInput {
  id: string;
  name: string;
  description?: string;
  trackerPrefix?: string;
  active?: boolean;
  version?: string;
  location?: string;
}

export interface NewDocumentInput {
  projectId: string;
  spaceId: string;
  name: string;
  title: string;
  type?: string;
  status?: string;
  author?: string;
  homePageContent?: Description;
  structureLinkRole?: string;
}

export type NewWorkItemAttributes = Omit<WorkItemAttributes, 'id' | 'created' | 'updated' | 'type' | 'status'> & {
  type?: string;
  status?: string;
};

export interface NewUserInput {
  id: string;
  name: string;
  email?: string;
}

export function newProject(input: NewProjectInput): Project {
  const now = new Date();
  const attributes: ProjectAttributes = {
    id: input.id,
    name: input.name,
    description: { type: 'text/plain', value: input.description ?? `Description for ${input.name}` },
    created: now,
    updated: now,
    active: input.active ?? true,
    trackerPrefix: input.trackerPrefix ?? input.id.toUpperCase(),
    version: input.version ?? '1.0.0',
  };
  if (input.location !== undefined) attributes.location = input.location;
  return { id: input.id, attributes };
}

export function documentId(projectId: string, spaceId: string, name: string): string {
  return `${projectId}/${spaceId}/${name}`;
}

export function newDocument(input: NewDocumentInput): Document {
  const now = new Date();
  const attributes: DocumentAttributes = {
    title: input.title,
    name: input.name,
    type: input.type ?? 'generic',
    status: input.status ?? 'draft',
    created: now,
    updated: now,
    structureLinkRole: input.structureLinkRole ?? 'parent',
  };
  if (input.author !== undefined) attributes.author = input.author;
  if (input.homePageContent !== undefined) attributes.homePageContent = input.homePageContent;

  return {
    id: documentId(input.projectId, input.spaceId, input.name),
    projectId: input.projectId,
    spaceId: input.spaceId,
    attributes,
    parts: [],
  };
}

export function newWorkItem(projectId: string, localId: string, input: NewWorkItemAttributes): WorkItem {
  const now = new Date();
  const { type, status, ...rest } = input;
  return {
    id: `${projectId}/${localId}`,
    projectId,
    attributes: {
      ...rest,
      id: localId,
      type: type ?? 'task',
      status: status ?? 'proposed',
      created: now,
      updated: now,
    },
    module: null,
    parentWorkItemId: null,
    isInDocument: false,
    documentPosition: null,
    outlineNumber: null,
  };
}

export function newUser(input: NewUserInput): User {
  const now = new Date();
  return {
    id: input.id,
    attributes: {
      id: input.id,
      name: input.name,
      email: input.email ?? `${input.id}@example.com`,
      disabled: false,
      created: now,
      updated: now,
    },
  };
}

/** Local part of a `project/localId` work item id. */
export function shortWorkItemId(workItemId: string): string {
  const slash = workItemId.lastIndexOf('/');
  return slash === -1 ? workItemId : workItemId.slice(slash + 1);
}

export class ResourceStore {
  readonly projects = new Map<string, Project>();
  readonly users = new Map<string, User>();
  readonly documents = new Map<string, Document>();
  readonly workItems = new Map<string, WorkItem>();
  readonly links = new Map<string, LinkedWorkItem>();

  private readonly lock = new ReadWriteLock();
  private readonly workItemCounters = new Map<string, number>();

  read<T>(fn: (store: ResourceStore) => T | Promise<T>): Promise<T> {
    return this.lock.read(() => fn(this));
  }

  write<T>(fn: (store: ResourceStore) => T | Promise<T>): Promise<T> {
    return this.lock.write(() => fn(this));
  }

  // ---------- projects ----------

  requireProject(projectId: string): Project {
    const project = this.projects.get(projectId);
    if (!project) throw new NotFoundError('projects', projectId);
    return project;
  }

  addProject(project: Project): Project {
    if (this.projects.has(project.id)) {
      throw new ConflictError(`Project with id '${project.id}' already exists`);
    }
    this.projects.set(project.id, project);
    return project;
  }

  deleteProject(projectId: string): void {
    this.requireProject(projectId);
    this.projects.delete(projectId);
    this.workItemCounters.delete(projectId);
  }

  // ---------- users ----------

  requireUser(userId: string): User {
    const user = this.users.get(userId);
    if (!user) throw new NotFoundError('users', userId);
    return user;
  }

  addUser(user: User): User {
    this.users.set(user.id, user);
    return user;
  }

  // ---------- documents ----------

  requireDocument(id: string): Document {
    const document = this.documents.get(id);
    if (!document) throw new NotFoundError('documents', id);
    return document;
  }

  addDocument(document: Document): Document {
    if (this.documents.has(document.id)) {
      throw new ConflictError(`Document ${document.id} already exists`);
    }
    this.documents.set(document.id, document);
    return document;
  }

  /**
   * Insert a part at its recorded rank. Parts already at that rank or later
   * move down by one, and so do their work items' document positions.
   * Outline numbers are left untouched.
   */
  insertPart(document: Document, part: DocumentPart): void {
    const index = Math.min(Math.max(part.position - 1, 0), document.parts.length);
    for (const existing of document.parts.slice(index)) {
      existing.position += 1;
      this.shiftWorkItemPosition(existing, 1);
    }
    part.position = index + 1;
    document.parts.splice(index, 0, part);
  }

  /**
   * Remove every part referencing the work item and close the gaps so the
   * remaining ranks stay dense. Returns the number of parts removed.
   */
  removePartsForWorkItem(document: Document, workItemId: string): number {
    const before = document.parts.length;
    const kept = document.parts.filter((part) => part.workItemId !== workItemId);
    if (kept.length === before) return 0;

    document.parts.splice(0, document.parts.length, ...kept);
    document.parts.forEach((part, index) => {
      const rank = index + 1;
      if (part.position !== rank) {
        this.shiftWorkItemPosition(part, rank - part.position);
        part.position = rank;
      }
    });
    return before - kept.length;
  }

  private shiftWorkItemPosition(part: DocumentPart, delta: number): void {
    if (!part.workItemId) return;
    const workItem = this.workItems.get(part.workItemId);
    if (workItem && workItem.documentPosition !== null) {
      workItem.documentPosition += delta;
    }
  }

  /** Work items associated with the document but not placed in it. */
  recycleBin(documentId: string): WorkItem[] {
    return [...this.workItems.values()].filter((wi) => wi.module === documentId && isInRecycleBin(wi));
  }

  // ---------- work items ----------

  requireWorkItem(workItemId: string): WorkItem {
    const workItem = this.workItems.get(workItemId);
    if (!workItem) throw new NotFoundError('workitems', workItemId);
    return workItem;
  }

  addWorkItem(workItem: WorkItem): WorkItem {
    if (this.workItems.has(workItem.id)) {
      throw new ConflictError(`Work item ${workItem.id} already exists`);
    }
    this.workItems.set(workItem.id, workItem);

    // Keep a cached id counter ahead of client-supplied ids.
    const counter = this.workItemCounters.get(workItem.projectId);
    const project = this.projects.get(workItem.projectId);
    if (counter !== undefined && project) {
      const n = trackerNumber(workItem.attributes.id, project.attributes.trackerPrefix);
      if (n !== null && n > counter) this.workItemCounters.set(workItem.projectId, n);
    }
    return workItem;
  }

  deleteWorkItem(workItemId: string): void {
    const workItem = this.requireWorkItem(workItemId);
    if (workItem.module) {
      const document = this.documents.get(workItem.module);
      if (document) this.removePartsForWorkItem(document, workItemId);
    }
    this.workItems.delete(workItemId);
    for (const [id, link] of this.links) {
      if (link.workItemId === workItemId) this.links.delete(id);
    }
  }

  /**
   * Next `{trackerPrefix}-{n}` id for a project. The counter starts after the
   * highest numeric id already using the prefix.
   */
  nextWorkItemId(projectId: string): string {
    const project = this.requireProject(projectId);
    const prefix = project.attributes.trackerPrefix;

    let counter = this.workItemCounters.get(projectId);
    if (counter === undefined) {
      counter = 0;
      for (const workItem of this.workItems.values()) {
        if (workItem.projectId !== projectId) continue;
        const n = trackerNumber(workItem.attributes.id, prefix);
        if (n !== null) counter = Math.max(counter, n);
      }
    }

    counter += 1;
    this.workItemCounters.set(projectId, counter);
    return `${prefix}-${counter}`;
  }

  /**
   * Filter work items with the small query language clients use for
   * discovery: `module.id:<documentId>`, `type:<type>` or `status:<status>`.
   * Anything else matches every item.
   */
  queryWorkItems(query?: string, projectId?: string): WorkItem[] {
    let results = [...this.workItems.values()];
    if (projectId) {
      results = results.filter((wi) => wi.projectId === projectId);
    }
    if (!query) return results;

    if (query.includes('module.id:')) {
      const moduleId = query.split('module.id:')[1]?.trim() ?? '';
      return results.filter((wi) => wi.module === moduleId);
    }
    if (query.includes('type:')) {
      const type = firstToken(query.split('type:')[1]);
      return results.filter((wi) => wi.attributes.type === type);
    }
    if (query.includes('status:')) {
      const status = firstToken(query.split('status:')[1]);
      return results.filter((wi) => wi.attributes.status === status);
    }
    return results;
  }

  // ---------- links ----------

  addLink(link: LinkedWorkItem): LinkedWorkItem {
    this.links.set(link.id, link);
    return link;
  }

  linksFor(workItemId: string): LinkedWorkItem[] {
    return [...this.links.values()].filter((link) => link.workItemId === workItemId);
  }
}

function firstToken(value: string | undefined): string {
  return (value ?? '').trim().split(/\s+/)[0] ?? '';
}

/** `DEMO-12` with prefix `DEMO` -> 12; null when the id is not `{prefix}-{n}`. */
function trackerNumber(localId: string, prefix: string): number | null {
  const match = /^(.+)-(\d+)$/.exec(localId);
  if (!match || match[1] !== prefix) return null;
  return Number.parseInt(match[2] ?? '', 10);
}
