/**
 * Document endpoints, including the listing endpoints the real REST API
 * does not offer. Those answer with the same 404/405 errors the real
 * service gives, so clients discover documents through work item modules.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { MethodNotAllowedError, NotFoundError, ResourceNotAvailableError, ValidationError } from '../errors.ts';
import {
  DescriptionSchema,
  buildCollection,
  buildDocument,
  paginate,
  parsePageParams,
  parseResourceArray,
  parseResourceObject,
  parseWith,
  renderDocument,
  renderWorkItem,
} from '../jsonapi/index.ts';
import { requestPath } from '../gatekeeper.ts';
import { documentId, newDocument, type Document } from '../store/index.ts';
import { collectionUrl, type ApiQuery, type RouteOptions } from './shared.ts';

interface ProjectParams {
  projectId: string;
}

interface SpaceParams extends ProjectParams {
  spaceId: string;
}

interface DocumentParams extends SpaceParams {
  documentName: string;
}

interface WildcardParams {
  '*': string;
}

const CreateDocumentAttributes = z.object({
  title: z.string().min(1),
  moduleName: z.string().min(1),
  type: z.string().optional(),
  status: z.string().optional(),
  author: z.string().optional(),
  homePageContent: DescriptionSchema.optional(),
  structureLinkRole: z.string().optional(),
});

const UpdateDocumentAttributes = CreateDocumentAttributes.omit({ moduleName: true }).partial();

const WORKITEMS_SUFFIX = '/workitems';

export async function documentRoutesPlugin(app: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { store, apiBasePath } = opts;

  const notAvailable = async (req: FastifyRequest): Promise<never> => {
    throw new ResourceNotAvailableError(requestPath(req));
  };

  app.get('/all/documents', notAvailable);
  app.get('/projects/:projectId/documents', notAvailable);
  app.get('/projects/:projectId/spaces', notAvailable);

  app.get('/projects/:projectId/spaces/:spaceId/documents', async () => {
    throw new MethodNotAllowedError('GET');
  });

  // GET /documents/<projectId>/<spaceId>/<name>[/workitems]
  app.get<{ Params: WildcardParams; Querystring: ApiQuery }>('/documents/*', async (req) => {
    const path = req.params['*'];

    return store.read((s) => {
      const document = s.documents.get(path);
      if (document) {
        req.log.info({ documentId: document.id }, 'retrieved document');
        return buildDocument(renderDocument(document, apiBasePath));
      }

      if (path.endsWith(WORKITEMS_SUFFIX)) {
        const owner = s.requireDocument(path.slice(0, -WORKITEMS_SUFFIX.length));
        const workItems = s.queryWorkItems(`module.id:${owner.id}`);
        const page = parsePageParams(req.query);
        return buildCollection({
          resources: paginate(workItems, page).map((wi) => renderWorkItem(wi, apiBasePath)),
          totalCount: workItems.length,
          page,
          baseUrl: collectionUrl(req),
        });
      }

      throw new NotFoundError('documents', path);
    });
  });

  // GET /projects/:projectId/spaces/:spaceId/documents/:documentName
  app.get<{ Params: DocumentParams }>('/projects/:projectId/spaces/:spaceId/documents/:documentName', async (req) => {
    const { projectId, spaceId, documentName } = req.params;
    return store.read((s) => {
      const document = s.requireDocument(documentId(projectId, spaceId, documentName));
      return buildDocument(renderDocument(document, apiBasePath));
    });
  });

  // POST /projects/:projectId/spaces/:spaceId/documents
  app.post<{ Params: SpaceParams }>('/projects/:projectId/spaces/:spaceId/documents', async (req, reply) => {
    const { projectId, spaceId } = req.params;
    const resources = parseResourceArray(req.body);

    const created = await store.write((s) => {
      s.requireProject(projectId);
      const documents: Document[] = [];

      for (const resource of resources) {
        if (resource.type !== 'documents') {
          throw new ValidationError("Resource type must be 'documents'");
        }
        const attributes = resource.attributes ?? {};
        if (typeof attributes.title !== 'string') {
          throw new ValidationError('Document title is required', 'title');
        }
        if (typeof attributes.moduleName !== 'string') {
          throw new ValidationError('Document module name is required', 'moduleName');
        }
        const input = parseWith(CreateDocumentAttributes, attributes);

        documents.push(
          s.addDocument(
            newDocument({
              projectId,
              spaceId,
              name: input.moduleName,
              title: input.title,
              type: input.type,
              status: input.status,
              author: input.author ?? req.user?.userId,
              homePageContent: input.homePageContent,
              structureLinkRole: input.structureLinkRole,
            }),
          ),
        );
      }
      return documents;
    });

    req.log.info({ projectId, spaceId, count: created.length }, 'created documents');
    return reply.code(201).send(buildDocument(created.map((d) => renderDocument(d, apiBasePath))));
  });

  // PATCH /projects/:projectId/spaces/:spaceId/documents/:documentName
  app.patch<{ Params: DocumentParams }>('/projects/:projectId/spaces/:spaceId/documents/:documentName', async (req) => {
    const { projectId, spaceId, documentName } = req.params;
    const resource = parseResourceObject(req.body);
    const updates = parseWith(UpdateDocumentAttributes, resource.attributes ?? {});

    return store.write((s) => {
      const document = s.requireDocument(documentId(projectId, spaceId, documentName));
      const a = document.attributes;
      if (updates.title !== undefined) a.title = updates.title;
      if (updates.type !== undefined) a.type = updates.type;
      if (updates.status !== undefined) a.status = updates.status;
      if (updates.author !== undefined) a.author = updates.author;
      if (updates.homePageContent !== undefined) a.homePageContent = updates.homePageContent;
      if (updates.structureLinkRole !== undefined) a.structureLinkRole = updates.structureLinkRole;
      a.updated = new Date();

      req.log.info({ documentId: document.id }, 'updated document');
      return buildDocument(renderDocument(document, apiBasePath));
    });
  });
}
