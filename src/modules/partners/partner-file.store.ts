/*
 JSON file backed partner store.
 - the whole collection lives in memory and is indexed there;
 - every insert rewrites the file (temp file + rename), one write at a time,
   and the partner becomes readable only once its write has landed;
 - on open, unreadable files and invalid records are logged and skipped.
*/

import fs from 'node:fs/promises';
import path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';
import { AppError, StoreUnavailableError } from '../../shared/errors.js';
import { InMemoryPartnerStore, type PartnerStoreOptions } from './partner.store.js';
import { partnerSchema, type CreatePartnerInput, type Partner } from './partner.schemas.js';

export type FilePartnerStoreOptions = PartnerStoreOptions & {
    filePath: string;
    logger: FastifyBaseLogger;
};

function isMissingFile(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export class FilePartnerStore extends InMemoryPartnerStore {
    private readonly filePath: string;
    private readonly logger: FastifyBaseLogger;
    private writes: Promise<void> = Promise.resolve();

    private constructor(opts: FilePartnerStoreOptions) {
        super(opts);
        this.filePath = path.resolve(opts.filePath);
        this.logger = opts.logger;
    }

    static async open(opts: FilePartnerStoreOptions): Promise<FilePartnerStore> {
        const store = new FilePartnerStore(opts);
        await store.load();
        return store;
    }

    async close(): Promise<void> {
        await this.writes;
    }

    async save(input: CreatePartnerInput): Promise<string> {
        const partner = this.reserve(input);
        try {
            await this.enqueue(async () => {
                // Snapshot of what is visible now plus this partner: other pending saves stay out
                await this.writeSnapshot([...this.partners.values(), partner]);
                this.publish(partner);
            });
        } catch (err) {
            this.release(partner);
            this.logger.error({ err, partnerId: partner.id, file: this.filePath }, 'Failed to persist partner');
            throw new StoreUnavailableError('Failed to persist partner', err);
        }
        return partner.id;
    }

    private enqueue(task: () => Promise<void>): Promise<void> {
        const run = this.writes.then(task);
        // The caller receives failures through `run`; the queue only needs to keep going
        this.writes = run.catch(() => undefined);
        return run;
    }

    private async writeSnapshot(partners: Partner[]): Promise<void> {
        const data = JSON.stringify(partners, null, 2);
        const tmp = `${this.filePath}.tmp`;
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(tmp, data, 'utf8');
        await fs.rename(tmp, this.filePath);
    }

    private async load(): Promise<void> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, 'utf8');
        } catch (err) {
            if (isMissingFile(err)) {
                this.logger.info({ file: this.filePath }, 'Partner data file not found, starting empty');
                return;
            }
            throw new StoreUnavailableError('Failed to read partner data file', err);
        }

        let items: unknown;
        try {
            items = JSON.parse(raw);
        } catch (err) {
            this.logger.warn({ err, file: this.filePath }, 'Partner data file is not valid JSON, starting empty');
            return;
        }
        if (!Array.isArray(items)) {
            this.logger.warn({ file: this.filePath }, 'Partner data file does not hold an array, starting empty');
            return;
        }

        let skipped = 0;
        for (const item of items) {
            const parsed = partnerSchema.safeParse(item);
            if (!parsed.success) {
                skipped++;
                continue;
            }
            try {
                this.publish(this.reserve(parsed.data));
            } catch (err) {
                if (!(err instanceof AppError)) throw err;
                this.logger.warn({ partnerId: parsed.data.id, reason: err.message }, 'Skipping stored partner');
                skipped++;
            }
        }
        this.logger.info({ file: this.filePath, loaded: this.partners.size, skipped }, 'Partner data loaded');
    }
}
