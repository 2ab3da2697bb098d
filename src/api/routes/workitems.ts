/**
 * Work item endpoints.
 *
 * Creating a work item with a `module` relationship only declares its
 * document: the item stays in the recycle bin until it is placed through the
 * document-parts endpoint. The generic update call never touches placement.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../errors.ts';
import {
  DescriptionSchema,
  applySparseFieldset,
  buildCollection,
  buildDocument,
  paginate,
  parseFieldList,
  parsePageParams,
  parseResourceArray,
  parseResourceObject,
  parseWith,
  relationshipId,
  relationshipPresent,
  renderDocument,
  renderWorkItem,
  type ResourceObject,
} from '../jsonapi/index.ts';
import { newWorkItem, type ResourceStore } from '../store/index.ts';
import type { WorkItem } from '../store/types.ts';
import { clearModule, declareModule } from '../visibility/state-machine.ts';
import { actionResult, collectionUrl, includes, queryValue, sortBy, type ApiQuery, type RouteOptions } from './shared.ts';

interface ProjectParams {
  projectId: string;
}

interface WorkItemParams extends ProjectParams {
  workItemId: string;
}

const StringList = z.array(z.string());

const WorkItemAttributesInput = z.object({
  title: z.string().min(1),
  type: z.string().optional(),
  description: DescriptionSchema.optional(),
  status: z.string().optional(),
  priority: z.string().optional(),
  severity: z.string().optional(),
  assignee: StringList.optional(),
  categories: StringList.optional(),
  dueDate: z.string().optional(),
  plannedIn: StringList.optional(),
  resolution: z.string().optional(),
  resolvedOn: z.string().optional(),
  hyperlinks: z.array(z.record(z.string())).optional(),
  customFields: z.string().optional(),
});

const WorkItemUpdateInput = WorkItemAttributesInput.partial().extend({
  parentWorkItemId: z.string().min(1).nullable().optional(),
});

const MoveToDocumentBody = z.object({
  targetDocument: z.string({ required_error: 'targetDocument is required' }).min(1, 'targetDocument is required'),
});

const SetParentBody = z.object({
  parentId: z.string({ required_error: 'parentId is required' }).min(1, 'parentId is required'),
});

const WORK_ITEM_SORT_KEYS = {
  created: (wi: WorkItem) => wi.attributes.created.getTime(),
  updated: (wi: WorkItem) => wi.attributes.updated.getTime(),
  title: (wi: WorkItem) => wi.attributes.title,
};

/** Attribute keys that PATCH may copy straight onto the work item. */
const PATCHABLE_KEYS = [
  'title',
  'type',
  'description',
  'status',
  'priority',
  'severity',
  'assignee',
  'categories',
  'dueDate',
  'plannedIn',
  'resolution',
  'resolvedOn',
  'hyperlinks',
  'customFields',
] as const;

/**
 * Point a work item at a document. Unknown documents are accepted as a weak
 * reference, as the real service does, but logged.
 */
function assignModule(req: FastifyRequest, store: ResourceStore, workItem: WorkItem, moduleId: string): void {
  if (!store.documents.has(moduleId)) {
    req.log.warn({ workItemId: workItem.id, moduleId }, 'module document not found; keeping reference');
  }
  declareModule(workItem, moduleId);
}

function collectionPage(
  req: FastifyRequest<{ Querystring: ApiQuery }>,
  store: ResourceStore,
  workItems: WorkItem[],
  apiBasePath: string,
) {
  const page = parsePageParams(req.query);
  const fields = parseFieldList(queryValue(req.query, 'fields[workitems]'));
  const sorted = sortBy(workItems, queryValue(req.query, 'sort'), WORK_ITEM_SORT_KEYS);
  const pageItems = paginate(sorted, page);

  const included: ResourceObject[] = [];
  if (includes(req.query, 'module')) {
    const seen = new Set<string>();
    for (const wi of pageItems) {
      const document = wi.module ? store.documents.get(wi.module) : undefined;
      if (document && !seen.has(document.id)) {
        seen.add(document.id);
        included.push(renderDocument(document, apiBasePath));
      }
    }
  }

  return buildCollection({
    resources: pageItems.map((wi) => applySparseFieldset(renderWorkItem(wi, apiBasePath), fields)),
    totalCount: sorted.length,
    page,
    baseUrl: collectionUrl(req),
    included,
  });
}

export async function workItemRoutesPlugin(app: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { store, apiBasePath } = opts;

  // GET /projects/:projectId/workitems
  app.get<{ Params: ProjectParams; Querystring: ApiQuery }>('/projects/:projectId/workitems', async (req) => {
    return store.read((s) => {
      s.requireProject(req.params.projectId);
      const workItems = s.queryWorkItems(queryValue(req.query, 'query'), req.params.projectId);
      const body = collectionPage(req, s, workItems, apiBasePath);
      req.log.info({ projectId: req.params.projectId, count: body.data.length }, 'listed work items');
      return body;
    });
  });

  // GET /all/workitems
  app.get<{ Querystring: ApiQuery }>('/all/workitems', async (req) => {
    return store.read((s) => collectionPage(req, s, s.queryWorkItems(queryValue(req.query, 'query')), apiBasePath));
  });

  // GET /projects/:projectId/workitems/:workItemId
  app.get<{ Params: WorkItemParams; Querystring: ApiQuery }>('/projects/:projectId/workitems/:workItemId', async (req) => {
    const fields = parseFieldList(queryValue(req.query, 'fields[workitems]'));
    return store.read((s) => {
      const workItem = s.requireWorkItem(`${req.params.projectId}/${req.params.workItemId}`);
      return buildDocument(applySparseFieldset(renderWorkItem(workItem, apiBasePath), fields));
    });
  });

  // POST /projects/:projectId/workitems
  app.post<{ Params: ProjectParams }>('/projects/:projectId/workitems', async (req, reply) => {
    const { projectId } = req.params;
    const resources = parseResourceArray(req.body);
    const author = req.user?.userId ?? 'admin';

    const created = await store.write((s) => {
      s.requireProject(projectId);
      const items: WorkItem[] = [];

      for (const resource of resources) {
        if (resource.type !== 'workitems') {
          throw new ValidationError("Resource type must be 'workitems'");
        }
        if (typeof resource.attributes?.title !== 'string') {
          throw new ValidationError('Work item title is required', 'title');
        }
        const attributes = parseWith(WorkItemAttributesInput, resource.attributes);
        const localId = resource.id ?? s.nextWorkItemId(projectId);

        const workItem = newWorkItem(projectId, localId, {
          ...attributes,
          type: attributes.type ?? 'task',
          status: attributes.status ?? 'open',
          priority: attributes.priority ?? 'medium',
          author,
        });

        const moduleId = relationshipId(resource, 'module');
        if (moduleId) assignModule(req, s, workItem, moduleId);
        const parentId = relationshipId(resource, 'parent');
        if (parentId) workItem.parentWorkItemId = parentId;

        items.push(s.addWorkItem(workItem));
      }
      return items;
    });

    req.log.info({ projectId, count: created.length }, 'created work items');
    return reply.code(201).send(buildDocument(created.map((wi) => renderWorkItem(wi, apiBasePath))));
  });

  // PATCH /projects/:projectId/workitems/:workItemId
  app.patch<{ Params: WorkItemParams }>('/projects/:projectId/workitems/:workItemId', async (req, reply) => {
    const fullId = `${req.params.projectId}/${req.params.workItemId}`;
    const resource = parseResourceObject(req.body);
    const rawAttributes = resource.attributes ?? {};
    if ('outlineNumber' in rawAttributes) {
      throw new ValidationError('outlineNumber is assigned by document placement and cannot be updated', 'outlineNumber');
    }
    const updates = parseWith(WorkItemUpdateInput, rawAttributes);

    await store.write((s) => {
      const workItem = s.requireWorkItem(fullId);
      const a = workItem.attributes;

      // Module transitions can throw; they run before any other change.
      if (relationshipPresent(resource, 'module')) {
        const moduleId = relationshipId(resource, 'module');
        if (moduleId) {
          assignModule(req, s, workItem, moduleId);
        } else {
          clearModule(workItem);
        }
      }

      for (const key of PATCHABLE_KEYS) {
        const value = updates[key];
        if (value !== undefined) Object.assign(a, { [key]: value });
      }
      if (updates.parentWorkItemId !== undefined) {
        workItem.parentWorkItemId = updates.parentWorkItemId;
      }
      if (relationshipPresent(resource, 'parent')) {
        workItem.parentWorkItemId = relationshipId(resource, 'parent') ?? null;
      }

      a.updated = new Date();
    });

    req.log.info({ workItemId: fullId }, 'updated work item');
    return reply.code(204).send();
  });

  // DELETE /projects/:projectId/workitems/:workItemId
  app.delete<{ Params: WorkItemParams }>('/projects/:projectId/workitems/:workItemId', async (req, reply) => {
    const fullId = `${req.params.projectId}/${req.params.workItemId}`;
    await store.write((s) => s.deleteWorkItem(fullId));
    req.log.info({ workItemId: fullId }, 'deleted work item');
    return reply.code(204).send();
  });

  // POST .../actions/moveToDocument
  app.post<{ Params: WorkItemParams }>(
    '/projects/:projectId/workitems/:workItemId/actions/moveToDocument',
    async (req) => {
      const { workItemId } = req.params;
      const fullId = `${req.params.projectId}/${workItemId}`;
      const { targetDocument } = parseWith(MoveToDocumentBody, req.body ?? {});

      await store.write((s) => {
        const workItem = s.requireWorkItem(fullId);
        s.requireDocument(targetDocument);
        // A hidden item may switch documents; a placed one cannot.
        if (workItem.module !== null && workItem.module !== targetDocument) {
          clearModule(workItem);
        }
        declareModule(workItem, targetDocument);
        workItem.attributes.updated = new Date();
      });

      req.log.info({ workItemId: fullId, targetDocument }, 'moved work item to document');
      return actionResult('moveToDocument', `Work item ${workItemId} moved to document ${targetDocument}`);
    },
  );

  // POST .../actions/setParent
  app.post<{ Params: WorkItemParams }>('/projects/:projectId/workitems/:workItemId/actions/setParent', async (req) => {
    const fullId = `${req.params.projectId}/${req.params.workItemId}`;
    const { parentId } = parseWith(SetParentBody, req.body ?? {});

    await store.write((s) => {
      const workItem = s.requireWorkItem(fullId);
      workItem.parentWorkItemId = parentId;
      workItem.attributes.updated = new Date();
    });

    req.log.info({ workItemId: fullId, parentId }, 'set parent work item');
    return actionResult('setParent', `Parent work item set to ${parentId}`);
  });
}
