// Maps every failure to the JSON error shape { statusCode, code, message, details? }
import fp from 'fastify-plugin';
import { hasZodFastifySchemaValidationErrors } from 'fastify-type-provider-zod';
import { toErrorResponse } from '../shared/errors.js';

const errorHandlerPlugin = fp(async (app) => {
    app.setErrorHandler((err, req, reply) => {
        if (hasZodFastifySchemaValidationErrors(err)) {
            req.log.debug({ validation: err.validation }, 'Request validation failed');
            return reply.code(400).send({
                statusCode: 400,
                code: 'VALIDATION_ERROR',
                message: `Invalid ${err.validationContext ?? 'request'}`,
                details: err.validation.map((issue) => ({ path: issue.instancePath, message: issue.message })),
            });
        }

        const { statusCode, body } = toErrorResponse(err);
        if (statusCode >= 500) {
            req.log.error({ err }, 'Request failed');
        } else {
            req.log.debug({ code: body.code, message: body.message }, 'Request rejected');
        }
        return reply.code(statusCode).send(body);
    });

    app.setNotFoundHandler((req, reply) => {
        return reply.code(404).send({
            statusCode: 404,
            code: 'NOT_FOUND',
            message: `Route ${req.method}:${req.url} not found`,
        });
    });
}, { name: 'error-handler' });

export default errorHandlerPlugin;
