import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { STATUS_CODES } from 'node:http';
import { createAuthHook } from './auth/hook.ts';
import { getConfig, type ServerConfig } from './config.ts';
import { registerCors } from './cors.ts';
import { ApiError, ResourceNotAvailableError, buildErrorDocument } from './errors.ts';
import { createGatekeeperHook, isApiPath, requestPath } from './gatekeeper.ts';
import { API_VERSION, SERVER_VERSION, healthResponse } from './health.ts';
import { buildDocument, padEmptyCollection } from './jsonapi/index.ts';
import { debugRoutesPlugin } from './routes/debug.ts';
import { documentPartRoutesPlugin } from './routes/document-parts.ts';
import { documentRoutesPlugin } from './routes/documents.ts';
import { projectRoutesPlugin } from './routes/projects.ts';
import type { RouteOptions } from './routes/shared.ts';
import { userRoutesPlugin } from './routes/users.ts';
import { workItemRoutesPlugin } from './routes/workitems.ts';
import { createSeededStore, type ResourceStore } from './store/index.ts';

export type MockServerOptions = {
  logger?: boolean;
  /** Defaults to a freshly seeded store. */
  store?: ResourceStore;
  /** Defaults to the environment configuration. */
  config?: ServerConfig;
};

export function buildServer(options: MockServerOptions = {}): FastifyInstance {
  const config = options.config ?? getConfig();
  const app = Fastify({ logger: options.logger ? { level: config.logLevel } : false });
  const store = options.store ?? createSeededStore();
  const base = config.apiBasePath;

  registerCors(app, config.corsOrigins);

  app.decorateRequest('user', null);

  // Order matters: header checks answer before authentication does.
  app.addHook('onRequest', createGatekeeperHook(base));
  app.addHook(
    'onRequest',
    createAuthHook({ apiBasePath: base, jwtSecret: config.jwtSecret, authDisabled: config.authDisabled }),
  );

  // Empty collections are padded to the size the real service returns.
  app.addHook('onSend', async (req, reply, payload) => {
    if (typeof payload !== 'string' || !isApiPath(requestPath(req), base)) return payload;
    const contentType = reply.getHeader('content-type');
    if (typeof contentType !== 'string' || !contentType.startsWith('application/json')) return payload;
    return padEmptyCollection(payload);
  });

  app.setErrorHandler((error: FastifyError | ApiError, req, reply) => {
    if (error instanceof ApiError) {
      if (error.statusCode >= 500) req.log.error({ err: error }, error.message);
      return reply.code(error.statusCode).send(buildErrorDocument([error.toJsonApi()]));
    }

    // Framework errors (malformed JSON, oversized body) keep their status.
    const statusCode = error.statusCode;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send(
        buildErrorDocument([{ status: String(statusCode), title: STATUS_CODES[statusCode] ?? 'Error', detail: error.message }]),
      );
    }

    req.log.error({ err: error }, 'unhandled error');
    return reply
      .code(500)
      .send(buildErrorDocument([{ status: '500', title: 'Internal Server Error', detail: 'An unexpected error occurred' }]));
  });

  app.setNotFoundHandler((req, reply) => {
    const error = new ResourceNotAvailableError(requestPath(req));
    return reply.code(404).send(buildErrorDocument([error.toJsonApi()]));
  });

  app.get('/', async () => ({
    name: 'ALM REST Mock Server',
    version: SERVER_VERSION,
    api_base: base,
    health: '/health',
  }));

  app.get('/health', async () => healthResponse());
  app.get(`${base}/health`, async () => healthResponse());

  app.get(base, async () =>
    buildDocument({
      type: 'api-info',
      id: API_VERSION,
      attributes: {
        version: API_VERSION,
        name: 'ALM REST API Mock',
        description: 'In-memory mock of an ALM REST API',
        json_api_version: '1.0',
      },
      links: {
        self: base,
        projects: `${base}/projects`,
        workitems: `${base}/all/workitems`,
        users: `${base}/users`,
      },
    }),
  );

  const routeOptions: RouteOptions & { prefix: string } = { prefix: base, store, apiBasePath: base };
  app.register(projectRoutesPlugin, routeOptions);
  app.register(workItemRoutesPlugin, routeOptions);
  app.register(documentRoutesPlugin, routeOptions);
  app.register(documentPartRoutesPlugin, routeOptions);
  app.register(userRoutesPlugin, routeOptions);
  app.register(debugRoutesPlugin, routeOptions);

  return app;
}
