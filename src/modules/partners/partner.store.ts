import { randomUUID } from 'node:crypto';
import { bboxOf, type Position } from '../../shared/geo.js';
import { AppError, ConflictError } from '../../shared/errors.js';
import { SpatialIndex } from './spatial.index.js';
import type { CreatePartnerInput, Partner } from './partner.schemas.js';

/**
 * Persistence contract for partners.
 *
 * `save` assigns an id when the input carries none and rejects duplicate
 * ids or documents with a ConflictError, leaving the store unchanged.
 */
export interface PartnerStore {
    save(input: CreatePartnerInput): Promise<string>;
    findById(id: string): Promise<Partner | null>;
    /** Partners whose coverage bounding box contains the point, oldest first. */
    findCandidates(point: Position): Promise<Partner[]>;
    count(): Promise<number>;
    close(): Promise<void>;
}

export type PartnerStoreOptions = {
    cellDegrees?: number;
    generateId?: () => string;
};

export class InMemoryPartnerStore implements PartnerStore {
    protected readonly partners = new Map<string, Partner>();
    private readonly documents = new Map<string, string>();
    // Ids and documents claimed by saves that are not visible yet
    private readonly reservedIds = new Set<string>();
    private readonly reservedDocuments = new Set<string>();
    private readonly index: SpatialIndex;
    private readonly generateId: () => string;

    constructor(opts?: PartnerStoreOptions) {
        this.index = new SpatialIndex(opts?.cellDegrees);
        this.generateId = opts?.generateId ?? randomUUID;
    }

    async save(input: CreatePartnerInput): Promise<string> {
        const partner = this.reserve(input);
        this.publish(partner);
        return partner.id;
    }

    async findById(id: string): Promise<Partner | null> {
        return this.partners.get(id) ?? null;
    }

    async findCandidates(point: Position): Promise<Partner[]> {
        const out: Partner[] = [];
        for (const id of this.index.search(point)) {
            const partner = this.partners.get(id);
            if (partner) out.push(partner);
        }
        return out;
    }

    async count(): Promise<number> {
        return this.partners.size;
    }

    async close(): Promise<void> {}

    // Synchronous so that the uniqueness checks and the claim cannot interleave.
    // The partner stays invisible to reads until publish().
    protected reserve(input: CreatePartnerInput): Partner {
        const id = input.id ?? this.generateId();
        if (this.partners.has(id) || this.reservedIds.has(id)) {
            throw new ConflictError('id already exists', { id });
        }
        if (this.documents.has(input.document) || this.reservedDocuments.has(input.document)) {
            throw new ConflictError('document must be unique', { document: input.document });
        }
        if (!bboxOf(input.coverageArea.coordinates)) {
            throw new AppError('coverageArea geometry is empty', 400, { code: 'VALIDATION_ERROR' });
        }
        this.reservedIds.add(id);
        this.reservedDocuments.add(input.document);
        return {
            id,
            tradingName: input.tradingName,
            ownerName: input.ownerName,
            document: input.document,
            coverageArea: input.coverageArea,
            address: input.address,
        };
    }

    protected publish(partner: Partner): void {
        const box = bboxOf(partner.coverageArea.coordinates);
        this.release(partner);
        if (!box) return;
        this.partners.set(partner.id, partner);
        this.documents.set(partner.document, partner.id);
        this.index.insert(partner.id, box);
    }

    protected release(partner: Partner): void {
        this.reservedIds.delete(partner.id);
        this.reservedDocuments.delete(partner.document);
    }
}
