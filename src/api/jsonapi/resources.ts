/**
 * Renders store entities as JSON:API resource objects.
 *
 * Attribute order follows the real service's payloads. Internal work item
 * state (visibility flags, document position) is never rendered here; only
 * the outline number leaks out, and only while the item is visible.
 */

import type { Description, Document, DocumentPart, LinkedWorkItem, Project, User, WorkItem } from '../store/types.ts';
import { formatDateTime, resourceObject, type Attributes, type RelationshipObject, type ResourceObject } from './builder.ts';

/** Drop undefined values so absent attributes are left out rather than nulled. */
function defined(entries: Array<[string, unknown]>): Attributes {
  const result: Attributes = {};
  for (const [key, value] of entries) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function description(value: Description | undefined): Description | undefined {
  return value ? { type: value.type, value: value.value } : undefined;
}

/** `/polarion/rest/v1` -> `/polarion/#` */
export function portalBase(apiBasePath: string): string {
  return `${apiBasePath.replace(/\/rest\/v\d+$/, '')}/#`;
}

export function renderProject(project: Project, apiBasePath: string): ResourceObject {
  const a = project.attributes;
  return resourceObject({
    type: 'projects',
    id: project.id,
    attributes: defined([
      ['id', a.id],
      ['name', a.name],
      ['description', description(a.description)],
      ['created', formatDateTime(a.created)],
      ['updated', formatDateTime(a.updated)],
      ['active', a.active],
      ['trackerPrefix', a.trackerPrefix],
      ['version', a.version],
      ['location', a.location],
    ]),
    links: {
      self: `${apiBasePath}/projects/${project.id}`,
      portal: `${portalBase(apiBasePath)}/project/${project.id}`,
    },
  });
}

export function renderUser(user: User, apiBasePath: string): ResourceObject {
  const a = user.attributes;
  return resourceObject({
    type: 'users',
    id: user.id,
    attributes: defined([
      ['id', a.id],
      ['name', a.name],
      ['email', a.email],
      ['description', a.description],
      ['disabled', a.disabled],
      ['created', formatDateTime(a.created)],
      ['updated', formatDateTime(a.updated)],
    ]),
    links: {
      self: `${apiBasePath}/users/${user.id}`,
      portal: `${portalBase(apiBasePath)}/user/${user.id}`,
    },
  });
}

export function renderDocument(document: Document, apiBasePath: string): ResourceObject {
  const a = document.attributes;
  return resourceObject({
    type: 'documents',
    id: document.id,
    attributes: defined([
      ['title', a.title],
      ['name', a.name],
      ['type', a.type],
      ['status', a.status],
      ['created', formatDateTime(a.created)],
      ['updated', formatDateTime(a.updated)],
      ['author', a.author],
      ['homePageContent', description(a.homePageContent)],
      ['structureLinkRole', a.structureLinkRole],
    ]),
    links: {
      self: `${apiBasePath}/projects/${encodeURIComponent(document.projectId)}/spaces/${encodeURIComponent(document.spaceId)}/documents/${encodeURIComponent(a.name)}`,
      portal: `${portalBase(apiBasePath)}/project/${encodeURIComponent(document.projectId)}/wiki/${encodeURIComponent(a.name)}`,
    },
  });
}

export function renderWorkItem(workItem: WorkItem, apiBasePath: string): ResourceObject {
  const a = workItem.attributes;
  const attributes = defined([
    ['id', a.id],
    ['title', a.title],
    ['description', description(a.description)],
    ['type', a.type],
    ['status', a.status],
    ['priority', a.priority],
    ['severity', a.severity],
    ['created', formatDateTime(a.created)],
    ['updated', formatDateTime(a.updated)],
    ['author', a.author],
    ['assignee', a.assignee],
    ['categories', a.categories],
    ['dueDate', a.dueDate],
    ['plannedIn', a.plannedIn],
    ['resolution', a.resolution],
    ['resolvedOn', a.resolvedOn],
    // Items in the recycle bin have no outline in the real service.
    ['outlineNumber', workItem.isInDocument ? (workItem.outlineNumber ?? undefined) : undefined],
    ['hyperlinks', a.hyperlinks],
    ['customFields', a.customFields],
  ]);

  const relationships: Record<string, RelationshipObject> = {};
  if (workItem.module !== null) {
    relationships.module = { data: { type: 'documents', id: workItem.module } };
  }
  if (workItem.parentWorkItemId !== null) {
    relationships.parent = { data: { type: 'workitems', id: workItem.parentWorkItemId } };
  }

  return resourceObject({
    type: 'workitems',
    id: workItem.id,
    attributes,
    relationships: Object.keys(relationships).length > 0 ? relationships : undefined,
    links: {
      self: `${apiBasePath}/projects/${workItem.projectId}/workitems/${a.id}`,
      portal: `${portalBase(apiBasePath)}/project/${workItem.projectId}/workitem?id=${a.id}`,
    },
  });
}

export function renderPart(part: DocumentPart, apiBasePath: string): ResourceObject {
  return resourceObject({
    type: 'document_parts',
    id: part.id,
    relationships: part.workItemId
      ? { workItem: { data: { type: 'workitems', id: part.workItemId } } }
      : undefined,
    links: { self: `${apiBasePath}/parts/${part.id}` },
  });
}

export function renderLink(link: LinkedWorkItem): ResourceObject {
  return resourceObject({ type: 'linkedworkitems', id: link.id });
}
