/**
 * Project endpoints: list, read, create, update, delete and the two
 * mark/unmark actions.
 *
 * ```ts
 * app.register(projectRoutesPlugin, { prefix: apiBasePath, store, apiBasePath });
 * ```
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../errors.ts';
import {
  applySparseFieldset,
  buildCollection,
  buildDocument,
  paginate,
  parseFieldList,
  parsePageParams,
  parseResourceObject,
  parseWith,
  DescriptionSchema,
  renderProject,
} from '../jsonapi/index.ts';
import { newProject } from '../store/index.ts';
import type { Project } from '../store/types.ts';
import { actionResult, collectionUrl, queryValue, sortBy, type ApiQuery, type RouteOptions } from './shared.ts';

interface ProjectParams {
  projectId: string;
}

const DescriptionInput = z.union([z.string(), DescriptionSchema]);

const CreateProjectAttributes = z.object({
  name: z.string({ required_error: 'Project name is required' }).min(1),
  description: DescriptionInput.optional(),
  trackerPrefix: z.string().min(1).optional(),
  active: z.boolean().optional(),
  version: z.string().optional(),
  location: z.string().optional(),
});

const UpdateProjectAttributes = CreateProjectAttributes.partial();

const PROJECT_SORT_KEYS = {
  name: (p: Project) => p.attributes.name,
  created: (p: Project) => p.attributes.created.getTime(),
  id: (p: Project) => p.id,
};

function descriptionText(value: z.infer<typeof DescriptionInput> | undefined): string | undefined {
  return typeof value === 'string' ? value : value?.value;
}

export async function projectRoutesPlugin(app: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { store, apiBasePath } = opts;

  // GET /projects
  app.get<{ Querystring: ApiQuery }>('/projects', async (req) => {
    const page = parsePageParams(req.query);
    const fields = parseFieldList(queryValue(req.query, 'fields[projects]'));

    return store.read((s) => {
      const projects = sortBy([...s.projects.values()], queryValue(req.query, 'sort'), PROJECT_SORT_KEYS);
      const resources = paginate(projects, page).map((p) => applySparseFieldset(renderProject(p, apiBasePath), fields));
      req.log.info({ count: resources.length, page: page.pageNumber }, 'listed projects');
      return buildCollection({ resources, totalCount: projects.length, page, baseUrl: collectionUrl(req) });
    });
  });

  // GET /projects/:projectId
  app.get<{ Params: ProjectParams; Querystring: ApiQuery }>('/projects/:projectId', async (req) => {
    const fields = parseFieldList(queryValue(req.query, 'fields[projects]'));
    return store.read((s) => {
      const project = s.requireProject(req.params.projectId);
      return buildDocument(applySparseFieldset(renderProject(project, apiBasePath), fields));
    });
  });

  // POST /projects
  app.post('/projects', async (req, reply) => {
    const resource = parseResourceObject(req.body);
    if (resource.type !== 'projects') {
      throw new ValidationError("Resource type must be 'projects'");
    }
    if (!resource.id) {
      throw new ValidationError('Project ID is required');
    }
    if (!resource.attributes) {
      throw new ValidationError('Project attributes are required');
    }
    const projectId = resource.id;
    const attributes = parseWith(CreateProjectAttributes, resource.attributes);

    const project = await store.write((s) =>
      s.addProject(
        newProject({
          id: projectId,
          name: attributes.name,
          description: descriptionText(attributes.description),
          trackerPrefix: attributes.trackerPrefix,
          active: attributes.active,
          version: attributes.version,
          location: attributes.location,
        }),
      ),
    );

    req.log.info({ projectId: project.id }, 'created project');
    return reply.code(201).send(buildDocument(renderProject(project, apiBasePath)));
  });

  // PATCH /projects/:projectId
  app.patch<{ Params: ProjectParams }>('/projects/:projectId', async (req) => {
    const { projectId } = req.params;
    const resource = parseResourceObject(req.body);
    if (resource.type !== undefined && resource.type !== 'projects') {
      throw new ValidationError("Resource type must be 'projects'");
    }
    if (resource.id !== undefined && resource.id !== projectId) {
      throw new ValidationError('Project ID in URL and body must match');
    }
    const updates = parseWith(UpdateProjectAttributes, resource.attributes ?? {});

    return store.write((s) => {
      const project = s.requireProject(projectId);
      const a = project.attributes;
      if (updates.name !== undefined) a.name = updates.name;
      if (updates.description !== undefined) {
        a.description =
          typeof updates.description === 'string'
            ? { type: 'text/plain', value: updates.description }
            : updates.description;
      }
      if (updates.trackerPrefix !== undefined) a.trackerPrefix = updates.trackerPrefix;
      if (updates.active !== undefined) a.active = updates.active;
      if (updates.version !== undefined) a.version = updates.version;
      if (updates.location !== undefined) a.location = updates.location;
      a.updated = new Date();

      req.log.info({ projectId }, 'updated project');
      return buildDocument(renderProject(project, apiBasePath));
    });
  });

  // DELETE /projects/:projectId
  app.delete<{ Params: ProjectParams }>('/projects/:projectId', async (req, reply) => {
    await store.write((s) => s.deleteProject(req.params.projectId));
    req.log.info({ projectId: req.params.projectId }, 'deleted project');
    return reply.code(204).send();
  });

  app.post<{ Params: ProjectParams }>('/projects/:projectId/actions/markProject', async (req) => {
    const { projectId } = req.params;
    await store.read((s) => s.requireProject(projectId));
    req.log.info({ projectId }, 'marked project');
    return actionResult('markProject', `Project ${projectId} marked successfully`);
  });

  app.post<{ Params: ProjectParams }>('/projects/:projectId/actions/unmarkProject', async (req) => {
    const { projectId } = req.params;
    await store.read((s) => s.requireProject(projectId));
    req.log.info({ projectId }, 'unmarked project');
    return actionResult('unmarkProject', `Project ${projectId} unmarked successfully`);
  });
}
