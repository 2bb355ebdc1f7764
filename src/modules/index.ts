import { FastifyInstance } from 'fastify';
import healthRoutes from './system/health.routes.js';
import partnerRoutes from './partners/partner.routes.js';

// Registers all domain modules and their route prefixes
export default async function registerModules(app: FastifyInstance) {
  await app.register(healthRoutes);
  await app.register(partnerRoutes, { prefix: '/partners' });
}
