import { getLogger, parseTemplate, type Template } from '@partial-format/syntax';
import { envConfig } from './config.js';

const logger = getLogger('cache');

/**
 * Parsed templates keyed by their source text. Insertion-ordered, so the
 * first key is the oldest entry when the cache is full.
 */
const cache = new Map<string, Template>();
let maxSize = envConfig.cacheSize;

export function getTemplate(source: string, useCache = true): Template {
    if (!useCache || maxSize === 0) {
        return parseTemplate(source);
    }

    const hit = cache.get(source);
    if (hit) {
        logger.trace(`template cache hit: ${source}`);
        return hit;
    }

    logger.debug(`template cache miss: ${source}`);
    const template = parseTemplate(source);
    if (cache.size >= maxSize) {
        const oldest = cache.keys().next();
        if (!oldest.done) cache.delete(oldest.value);
    }
    cache.set(source, template);
    return template;
}

export function clearTemplateCache(): void {
    cache.clear();
}

export function setTemplateCacheSize(size: number): void {
    maxSize = Math.max(0, Math.floor(size));
    while (cache.size > maxSize) {
        const oldest = cache.keys().next();
        if (oldest.done) break;
        cache.delete(oldest.value);
    }
}

export function templateCacheSize(): number {
    return cache.size;
}
