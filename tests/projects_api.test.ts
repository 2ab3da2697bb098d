import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { API, buildTestServer } from './helpers/app.ts';

describe('Projects API', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildTestServer();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /projects', () => {
    it('lists the seeded projects with pagination meta', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/projects` });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.data).toHaveLength(6);
      expect(body.meta).toEqual({ totalCount: 6, pageCount: 6, currentPage: 1, pageSize: 100, totalPages: 1 });
      expect(body.links.self.endsWith(`${API}/projects?page[number]=1&page[size]=100`)).toBe(true);
    });

    it('pages through the list', async () => {
      const res = await app.inject({
        method: 'GET',
        url: `${API}/projects`,
        query: { 'page[number]': '2', 'page[size]': '2', sort: 'id' },
      });
      const body = res.json();

      expect(body.data.map((p: { id: string }) => p.id)).toEqual(['elibrary', 'medical']);
      expect(body.meta.totalPages).toBe(3);
      expect(body.links.prev.endsWith(`${API}/projects?page[number]=1&page[size]=2`)).toBe(true);
      expect(body.links.next.endsWith(`${API}/projects?page[number]=3&page[size]=2`)).toBe(true);
    });

    it('sorts descending with a minus prefix', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/projects`, query: { sort: '-id' } });
      expect(res.json().data.map((p: { id: string }) => p.id)).toEqual([
        'testing',
        'myproject',
        'medical',
        'elibrary',
        'automotive',
        'Python',
      ]);
    });

    it('applies sparse fieldsets', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/projects`, query: { 'fields[projects]': 'name' } });
      expect(res.json().data[0].attributes).toEqual({ name: 'eLibrary' });
    });

    it('rejects a bad page size', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/projects`, query: { 'page[size]': 'ten' } });

      expect(res.statusCode).toBe(400);
      expect(res.json().errors[0].detail).toBe("page[size] must be a positive integer, got 'ten'");
    });
  });

  describe('GET /projects/:projectId', () => {
    it('returns the project', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/projects/elibrary` });
      const body = res.json();

      expect(body.data.type).toBe('projects');
      expect(body.data.id).toBe('elibrary');
      expect(body.data.attributes.name).toBe('eLibrary');
      expect(body.data.attributes.trackerPrefix).toBe('ELIB');
      expect(body.data.attributes.description).toEqual({ type: 'text/plain', value: 'Electronic Library System' });
      expect(body.data.attributes.created).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{6}Z$/);
      expect(body.data.links).toEqual({ self: `${API}/projects/elibrary`, portal: '/polarion/#/project/elibrary' });
    });

    it('returns a sentence for an unknown project', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/projects/nope` });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ errors: [{ status: '404', title: 'Not Found', detail: 'Project id nope does not exist.' }] });
    });
  });

  describe('POST /projects', () => {
    const create = (data: unknown) => app.inject({ method: 'POST', url: `${API}/projects`, payload: { data } });

    it('creates a project', async () => {
      const res = await create({ type: 'projects', id: 'demo', attributes: { name: 'Demo', description: 'A demo' } });
      const body = res.json();

      expect(res.statusCode).toBe(201);
      expect(body.data.id).toBe('demo');
      expect(body.data.attributes.trackerPrefix).toBe('DEMO');
      expect(body.data.attributes.description).toEqual({ type: 'text/plain', value: 'A demo' });

      const list = await app.inject({ method: 'GET', url: `${API}/projects` });
      expect(list.json().meta.totalCount).toBe(7);
    });

    it('refuses a duplicate id', async () => {
      const res = await create({ type: 'projects', id: 'elibrary', attributes: { name: 'Again' } });

      expect(res.statusCode).toBe(409);
      expect(res.json().errors[0]).toEqual({ status: '409', title: 'Conflict', detail: "Project with id 'elibrary' already exists" });
    });

    it('validates the resource', async () => {
      const wrongType = await create({ type: 'users', id: 'x', attributes: { name: 'X' } });
      expect(wrongType.json().errors[0].detail).toBe("Resource type must be 'projects'");

      const noId = await create({ type: 'projects', attributes: { name: 'X' } });
      expect(noId.json().errors[0].detail).toBe('Project ID is required');

      const noAttributes = await create({ type: 'projects', id: 'x' });
      expect(noAttributes.json().errors[0].detail).toBe('Project attributes are required');

      const noName = await create({ type: 'projects', id: 'x', attributes: {} });
      expect(noName.statusCode).toBe(400);
      expect(noName.json().errors[0]).toEqual({
        status: '400',
        title: 'Validation',
        detail: 'name: Project name is required',
        source: { pointer: '/data/attributes/name' },
      });
    });

    it('requires a data member', async () => {
      const res = await app.inject({ method: 'POST', url: `${API}/projects`, payload: { project: {} } });
      expect(res.json().errors[0].detail).toBe("Request must contain 'data' object");
    });
  });

  describe('PATCH /projects/:projectId', () => {
    it('updates attributes', async () => {
      const res = await app.inject({
        method: 'PATCH',
        url: `${API}/projects/elibrary`,
        payload: { data: { type: 'projects', id: 'elibrary', attributes: { name: 'eLibrary 2', active: false } } },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.attributes.name).toBe('eLibrary 2');
      expect(res.json().data.attributes.active).toBe(false);
    });

    it('rejects an id that does not match the URL', async () => {
      const res = await app.inject({
        method: 'PATCH',
        url: `${API}/projects/elibrary`,
        payload: { data: { type: 'projects', id: 'medical', attributes: { name: 'x' } } },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().errors[0].detail).toBe('Project ID in URL and body must match');
    });
  });

  describe('DELETE /projects/:projectId', () => {
    it('removes the project', async () => {
      const res = await app.inject({ method: 'DELETE', url: `${API}/projects/medical` });
      expect(res.statusCode).toBe(204);

      const after = await app.inject({ method: 'GET', url: `${API}/projects/medical` });
      expect(after.statusCode).toBe(404);
    });
  });

  describe('project actions', () => {
    it('marks and unmarks a project', async () => {
      const mark = await app.inject({ method: 'POST', url: `${API}/projects/elibrary/actions/markProject` });
      expect(mark.statusCode).toBe(200);
      expect(mark.json()).toEqual({
        data: { type: 'actions', id: 'markProject', attributes: { status: 'success', message: 'Project elibrary marked successfully' } },
      });

      const unmark = await app.inject({ method: 'POST', url: `${API}/projects/elibrary/actions/unmarkProject` });
      expect(unmark.json().data.attributes.message).toBe('Project elibrary unmarked successfully');
    });

    it('fails for an unknown project', async () => {
      const res = await app.inject({ method: 'POST', url: `${API}/projects/nope/actions/markProject` });
      expect(res.statusCode).toBe(404);
    });
  });
});
