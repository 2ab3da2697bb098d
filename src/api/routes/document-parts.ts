/**
 * Document structure endpoints: the part listing, the "add part" call that
 * makes work items visible, and work item links.
 */

import type { FastifyInstance } from 'fastify';
import { addParts, linkWorkItems, listParts } from '../document-parts/service.ts';
import type { AddPartRequest, LinkWorkItemRequest } from '../document-parts/types.ts';
import {
  buildCollection,
  buildDocument,
  paginate,
  parsePageParams,
  parseResourceArray,
  relationshipId,
  renderLink,
  renderPart,
  renderWorkItem,
  type ResourceInput,
  type ResourceObject,
} from '../jsonapi/index.ts';
import { documentId } from '../store/index.ts';
import { collectionUrl, includes, type ApiQuery, type RouteOptions } from './shared.ts';

interface DocumentParams {
  projectId: string;
  spaceId: string;
  documentName: string;
}

interface WorkItemParams {
  projectId: string;
  workItemId: string;
}

function optionalString(value: unknown): string | undefined {
  return value === undefined || value === null ? undefined : String(value);
}

function toAddPartRequest(resource: ResourceInput): AddPartRequest {
  return {
    resourceType: resource.type,
    partType: optionalString(resource.attributes?.type),
    workItemId: relationshipId(resource, 'workItem'),
    previousPartId: relationshipId(resource, 'previousPart') ?? null,
  };
}

function toLinkRequest(resource: ResourceInput): LinkWorkItemRequest {
  return {
    resourceType: resource.type,
    role: optionalString(resource.attributes?.role),
    targetWorkItemId: relationshipId(resource, 'workItem'),
  };
}

export async function documentPartRoutesPlugin(app: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { store, apiBasePath } = opts;
  const partsPath = '/projects/:projectId/spaces/:spaceId/documents/:documentName/parts';

  app.get<{ Params: DocumentParams; Querystring: ApiQuery }>(partsPath, async (req) => {
    const { projectId, spaceId, documentName } = req.params;
    const docId = documentId(projectId, spaceId, documentName);
    const page = parsePageParams(req.query);

    return store.read((s) => {
      const parts = listParts(s, docId);
      const pageParts = paginate(parts, page);

      const included: ResourceObject[] = [];
      if (includes(req.query, 'workItem')) {
        for (const part of pageParts) {
          const workItem = part.workItemId ? s.workItems.get(part.workItemId) : undefined;
          if (workItem) included.push(renderWorkItem(workItem, apiBasePath));
        }
      }

      req.log.info({ documentId: docId, count: parts.length }, 'listed document parts');
      return buildCollection({
        resources: pageParts.map((part) => renderPart(part, apiBasePath)),
        totalCount: parts.length,
        page,
        baseUrl: collectionUrl(req),
        included,
      });
    });
  });

  app.post<{ Params: DocumentParams }>(partsPath, async (req, reply) => {
    const { projectId, spaceId, documentName } = req.params;
    const docId = documentId(projectId, spaceId, documentName);
    const requests = parseResourceArray(req.body).map(toAddPartRequest);

    const created = await store.write((s) =>
      addParts(s, docId, requests, (placed) => {
        req.log.info(placed, 'placed work item in document');
      }),
    );

    return reply.code(201).send(buildDocument(created.map((part) => renderPart(part, apiBasePath))));
  });

  app.post<{ Params: WorkItemParams }>('/projects/:projectId/workitems/:workItemId/linkedworkitems', async (req, reply) => {
    const fullId = `${req.params.projectId}/${req.params.workItemId}`;
    const requests = parseResourceArray(req.body).map(toLinkRequest);

    const links = await store.write((s) => linkWorkItems(s, fullId, requests));
    for (const link of links) {
      req.log.info({ workItemId: link.workItemId, role: link.role, targetId: link.targetId }, 'linked work items');
    }

    return reply.code(201).send(buildDocument(links.map(renderLink)));
  });
}
