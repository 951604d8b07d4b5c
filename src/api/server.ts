import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { errorHandler } from './middleware';
import { registerAccuracyRoutes, registerDocumentsRoutes, registerReviewRoutes } from './routes';
import type { ApiDependencies } from './types/api';
import { loadPipelineConfig } from '../config/pipelineConfig';
import { createDatabaseClient } from '../db/client';
import { loadRecordSchema } from '../schema/recordSchema';

async function buildServer(deps: ApiDependencies) {
  const fastify = Fastify({
    logger: {
      level: process.env.LOG_LEVEL || 'info',
      transport:
        process.env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
    },
  });

  await fastify.register(cors, {
    origin: process.env.CORS_ORIGIN || '*',
    credentials: true,
  });

  fastify.setErrorHandler(errorHandler);

  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerDocumentsRoutes(fastify, deps);
  registerReviewRoutes(fastify, deps);
  registerAccuracyRoutes(fastify, deps);

  return fastify;
}

async function start() {
  try {
    const config = loadPipelineConfig();
    const schema = await loadRecordSchema(config.schemaFile);
    const store = createDatabaseClient(schema, config.supabaseUrl, config.supabaseServiceRoleKey);
    const server = await buildServer({ store, schema });

    const port = parseInt(process.env.PORT || process.env.API_PORT || '3000', 10);
    const host = process.env.API_HOST || '0.0.0.0';

    await server.listen({ port, host });
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

if (require.main === module) {
  void start();
}

export { buildServer };
