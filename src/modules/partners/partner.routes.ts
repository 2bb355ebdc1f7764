import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { CacheService } from '../cache/cache.service.js';
import { PartnerService } from './partner.service.js';
import {
    createPartnerBodySchema,
    errorResponseSchema,
    nearestQuerySchema,
    partnerCreatedSchema,
    partnerParamsSchema,
    partnerSchema,
} from './partner.schemas.js';

export default async function partnerRoutes(app: FastifyInstance) {
    const zodApp = app.withTypeProvider<ZodTypeProvider>();
    const service = new PartnerService(app.partnerStore, new CacheService(app.redis), app.log);

    // Empty path: the route is exactly the '/partners' prefix
    zodApp.post(
        '',
        {
            schema: {
                description: 'Creates a partner. The id is assigned when the body carries none.',
                tags: ['partners'],
                body: createPartnerBodySchema,
                response: {
                    201: partnerCreatedSchema,
                    400: errorResponseSchema,
                    409: errorResponseSchema,
                    503: errorResponseSchema,
                },
            },
        },
        async (req, reply) => {
            const created = await service.createPartner(req.body);
            reply.code(201);
            return created;
        }
    );

    // Static segment: matched before '/:id'
    zodApp.get(
        '/nearest',
        {
            schema: {
                description: 'Returns the partner closest to the point among those whose coverage area contains it',
                tags: ['partners'],
                querystring: nearestQuerySchema,
                response: {
                    200: partnerSchema,
                    400: errorResponseSchema,
                    404: errorResponseSchema,
                },
            },
        },
        async (req) => service.findNearestPartner([req.query.lng, req.query.lat])
    );

    zodApp.get(
        '/:id',
        {
            schema: {
                description: 'Returns partner by id',
                tags: ['partners'],
                params: partnerParamsSchema,
                response: {
                    200: partnerSchema,
                    404: errorResponseSchema,
                },
            },
        },
        async (req) => service.getPartner(req.params.id)
    );
}
