import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import fastifySwagger from '@fastify/swagger';
import fastifySwaggerUI  from '@fastify/swagger-ui';
import {
  ZodTypeProvider,
  jsonSchemaTransform,
  jsonSchemaTransformObject,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import redisPlugin from './plugins/redis.js';
import storePlugin from './plugins/store.js';
import errorHandlerPlugin from './plugins/error-handler.js';
import logger from './plugins/logger.js';
import registerModules from './modules/index.js';
import { config } from './config/env.js';
import type { PartnerStore } from './modules/partners/partner.store.js';

export type CreateAppOptions = {
  store?: PartnerStore;
};

// Factory that creates and configures Fastify instance (app-level setup)
export async function createApp(options: CreateAppOptions = {}) {
  const app = Fastify({
      loggerInstance: logger,
      trustProxy: true
  }).withTypeProvider<ZodTypeProvider>();
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  await app.register(errorHandlerPlugin);

  const allowedOrigins = new Set(config.CORS_ORIGINS);
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      return cb(null, allowedOrigins.has(origin));
    },
  });
  await app.register(rateLimit, { max: config.RATE_LIMIT_MAX, timeWindow: '1 minute' });
  await app.register(fastifySwagger, {
    openapi: {
      info: {
        title: config.SWAGGER_TITLE,
        version: config.SWAGGER_VERSION,
        description: 'Delivery partners API. This OpenAPI document is generated from Zod schemas and Fastify route metadata.',
      },
      servers: [
        { url: '/', description: 'Current host' },
      ],
      tags: [
        { name: 'system', description: 'Health and service info' },
        { name: 'partners', description: 'Partner registration and coverage lookups' },
      ],
    },
    transform: jsonSchemaTransform,
    transformObject: jsonSchemaTransformObject,
  });
  // Swagger UI serves the generated document itself at /docs/json
  await app.register(fastifySwaggerUI, {
      routePrefix: '/docs',
      uiConfig: {
          docExpansion: 'list',
      }
  });

  await app.register(redisPlugin);
  await app.register(storePlugin, { store: options.store });

  // Register all domain modules (routes)
  await app.register(registerModules);

  return app;
}
