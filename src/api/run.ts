import { getConfig } from './config.ts';
import { buildServer } from './server.ts';

const config = getConfig();
const app = buildServer({ logger: true, config });

await app.listen({ port: config.port, host: config.host });
app.log.info({ apiBasePath: config.apiBasePath, authDisabled: config.authDisabled }, 'mock server ready');
