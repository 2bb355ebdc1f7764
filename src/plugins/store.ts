// Fastify plugin to expose the partner store via app.partnerStore
import fp from 'fastify-plugin';
import { config } from '../config/env.js';
import { InMemoryPartnerStore, type PartnerStore } from '../modules/partners/partner.store.js';
import { FilePartnerStore } from '../modules/partners/partner-file.store.js';

declare module 'fastify' {
    interface FastifyInstance {
        partnerStore: PartnerStore;
    }
}

export type StorePluginOptions = {
    // Replaces the configured store, e.g. with an in-memory one in tests
    store?: PartnerStore;
};

const storePlugin = fp<StorePluginOptions>(async (app, opts) => {
    let store: PartnerStore;
    if (opts.store) {
        store = opts.store;
    } else if (config.PARTNERS_STORE === 'memory') {
        store = new InMemoryPartnerStore({ cellDegrees: config.SPATIAL_CELL_DEGREES });
    } else {
        store = await FilePartnerStore.open({
            filePath: config.PARTNERS_DATA_FILE,
            cellDegrees: config.SPATIAL_CELL_DEGREES,
            logger: app.log,
        });
    }

    app.decorate('partnerStore', store);

    app.addHook('onClose', async () => {
        await store.close();
    });
}, { name: 'partner-store' });

export default storePlugin;
