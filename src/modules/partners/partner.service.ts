import type { FastifyBaseLogger } from 'fastify';
import { CacheService, roundGeo } from '../cache/cache.service.js';
import { CACHE_TAG_PARTNERS, CACHE_TTL_NEAREST } from '../../config/cache.js';
import { NotFoundError } from '../../shared/errors.js';
import { multiPolygonContains, planarDistance, type Position } from '../../shared/geo.js';
import type { PartnerStore } from './partner.store.js';
import { partnerSchema, type CreatePartnerInput, type Partner } from './partner.schemas.js';

export type PartnerCreated = { status: 'created'; id: string };

// Closest address among partners whose coverage area contains the point.
// Candidates are expected oldest first; ties keep the older partner.
export function pickNearest(candidates: Partner[], point: Position): Partner | null {
    let best: Partner | null = null;
    let bestDistance = Infinity;
    for (const partner of candidates) {
        if (!multiPolygonContains(partner.coverageArea.coordinates, point)) continue;
        const distance = planarDistance(point, partner.address.coordinates);
        if (distance < bestDistance) {
            best = partner;
            bestDistance = distance;
        }
    }
    return best;
}

export class PartnerService {
    constructor(
        private readonly store: PartnerStore,
        private readonly cache: CacheService,
        private readonly log: FastifyBaseLogger,
    ) {}

    async createPartner(input: CreatePartnerInput): Promise<PartnerCreated> {
        const id = await this.store.save(input);
        this.log.info({ partnerId: id, document: input.document }, 'Partner created');
        // A new coverage area can change the answer for any cached point
        await this.invalidateLookups();
        return { status: 'created', id };
    }

    async getPartner(id: string): Promise<Partner> {
        const partner = await this.store.findById(id);
        if (!partner) throw new NotFoundError('partner not found');
        return partner;
    }

    async findNearestPartner(point: Position): Promise<Partner> {
        const key = await this.lookupKey(point);
        if (key) {
            const cached = await this.readCache(key);
            if (cached) return cached;
        }

        const nearest = pickNearest(await this.store.findCandidates(point), point);
        if (!nearest) throw new NotFoundError('no partner covers this location');

        if (key) await this.writeCache(key, nearest);
        return nearest;
    }

    async countPartners(): Promise<number> {
        return this.store.count();
    }

    // Keyed by the partners generation read before the lookup, so an answer
    // computed before a create lands under a key nobody reads any more.
    private async lookupKey(point: Position): Promise<string | null> {
        if (!this.cache.isEnabled()) return null;
        try {
            const generation = await this.cache.getGeneration(CACHE_TAG_PARTNERS);
            return this.cache.buildKey('partners:nearest', { generation, lng: roundGeo(point[0]), lat: roundGeo(point[1]) });
        } catch (err) {
            this.log.warn({ err }, 'Partner cache generation read failed');
            return null;
        }
    }

    private async readCache(key: string): Promise<Partner | null> {
        if (!this.cache.isEnabled()) return null;
        try {
            return await this.cache.getJSON(key, partnerSchema);
        } catch (err) {
            this.log.warn({ err, key }, 'Nearest partner cache read failed');
            return null;
        }
    }

    private async writeCache(key: string, partner: Partner): Promise<void> {
        if (!this.cache.isEnabled()) return;
        try {
            await this.cache.setJSON(key, partner, { ttlSeconds: CACHE_TTL_NEAREST, tags: [CACHE_TAG_PARTNERS] });
        } catch (err) {
            this.log.warn({ err, key }, 'Nearest partner cache write failed');
        }
    }

    private async invalidateLookups(): Promise<void> {
        if (!this.cache.isEnabled()) return;
        try {
            const generation = await this.cache.bumpGeneration(CACHE_TAG_PARTNERS);
            const deleted = await this.cache.invalidateByTags([CACHE_TAG_PARTNERS]);
            this.log.debug({ generation, deleted }, 'Partner lookup cache invalidated');
        } catch (err) {
            this.log.error({ err }, 'Partner lookup cache invalidation failed');
        }
    }
}
