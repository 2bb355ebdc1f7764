import { config } from './env.js';

export const CACHE_ENABLED = config.CACHE_ENABLED;

// TTLs (seconds)
export const CACHE_TTL_NEAREST = config.CACHE_TTL_NEAREST;

// Cache version (bump to invalidate all)
export const CACHE_NAMESPACE_VERSION = config.CACHE_NS_VERSION;

// Tag attached to every partner-derived cache entry; cleared on each write
export const CACHE_TAG_PARTNERS = 'partners';
