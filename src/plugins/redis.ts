// Fastify plugin to expose an optional Redis client via app.redis
import fp from 'fastify-plugin';
import Redis from 'ioredis';
import type { Redis as RedisClient } from 'ioredis';
import { config } from '../config/env.js';

declare module 'fastify' {
    interface FastifyInstance {
        redis: RedisClient | null;
    }
}

const redisPlugin = fp(async (app) => {
    const url = config.REDIS_URL;
    if (!url) {
        app.log.info('REDIS_URL is not set, partner lookup cache disabled');
        app.decorate('redis', null);
        return;
    }

    const redis = new Redis(url);
    redis.on('error', (err) => {
        app.log.error({ err }, 'Redis connection error');
    });

    app.decorate('redis', redis);

    app.addHook('onClose', async () => {
        await redis.quit();
    });
}, { name: 'redis' });

export default redisPlugin;
