import type { FastifyInstance } from 'fastify';
import { buildCollection, buildDocument, paginate, parsePageParams, renderUser } from '../jsonapi/index.ts';
import { collectionUrl, type ApiQuery, type RouteOptions } from './shared.ts';

interface UserParams {
  userId: string;
}

export async function userRoutesPlugin(app: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { store, apiBasePath } = opts;

  app.get<{ Querystring: ApiQuery }>('/users', async (req) => {
    const page = parsePageParams(req.query);
    return store.read((s) => {
      const users = [...s.users.values()];
      return buildCollection({
        resources: paginate(users, page).map((u) => renderUser(u, apiBasePath)),
        totalCount: users.length,
        page,
        baseUrl: collectionUrl(req),
      });
    });
  });

  app.get<{ Params: UserParams }>('/users/:userId', async (req) => {
    return store.read((s) => buildDocument(renderUser(s.requireUser(req.params.userId), apiBasePath)));
  });
}
