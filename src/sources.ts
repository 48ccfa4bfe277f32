import fs from 'fs-extra';
import ini from 'ini';
import { z } from 'zod';
import { CONFIG } from './config.js';
import { SourceError, isSourceError } from './utils/errors.js';
import { logger } from './utils/logger.js';

/**
 * Source name → URL, as stored in the global section of `sources.ini`.
 */
export type SourceRegistry = Readonly<Record<string, string>>;

// Sections parse to nested objects and bare keys to `true`; neither is a source.
const registrySchema = z.record(z.string());

const urlSchema = z.string().url();

// Names the INI codec writes but cannot read back unchanged: `[]` marks an
// array key, `=` ends the key, and `__proto__` is dropped on parse.
const nameSchema = z.string()
    .min(1)
    .refine(name => !name.endsWith('[]'))
    .refine(name => !name.includes('='))
    .refine(name => !/[\r\n]/.test(name))
    .refine(name => name !== '__proto__');

export function isValidSourceName(name: string): boolean {
    return nameSchema.safeParse(name).success;
}

export function isValidUrl(value: string): boolean {
    return urlSchema.safeParse(value).success;
}

export function createSources(): SourceRegistry {
    return { [CONFIG.localSourceName]: CONFIG.localSourceValue };
}

export function parseSources(text: string, file = 'sources.ini'): SourceRegistry {
    const result = registrySchema.safeParse(ini.parse(text));
    if (!result.success) {
        const keys = result.error.issues.map(issue => issue.path.join('.')).filter(Boolean);
        throw new SourceError('SOURCES_MALFORMED', `Unexpected entries: ${keys.join(', ') || 'unknown'}`, { file });
    }
    return { ...result.data };
}

export function serializeSources(registry: SourceRegistry): string {
    return ini.stringify(registry);
}

export async function readSources(file: string): Promise<SourceRegistry> {
    let text: string;
    try {
        text = await fs.readFile(file, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new SourceError('SOURCES_NOT_FOUND', `No sources file at ${file}`, { file });
        }
        throw error;
    }
    logger.debug(`Loaded sources from ${file}`);
    return parseSources(text, file);
}

/**
 * Reads the registry, starting a fresh one when the file does not exist yet.
 * A file that exists but cannot be parsed is still an error.
 */
export async function loadOrCreateSources(file: string): Promise<SourceRegistry> {
    try {
        return await readSources(file);
    } catch (error) {
        if (isSourceError(error, 'SOURCES_NOT_FOUND')) {
            logger.debug(`No sources file at ${file}, starting a new registry`);
            return createSources();
        }
        throw error;
    }
}

export async function writeSources(file: string, registry: SourceRegistry): Promise<void> {
    await fs.outputFile(file, serializeSources(registry));
    logger.debug(`Wrote ${Object.keys(registry).length} source(s) to ${file}`);
}

export function hasSource(registry: SourceRegistry, name: string): boolean {
    return Object.prototype.hasOwnProperty.call(registry, name);
}

export function addSource(registry: SourceRegistry, name: string, url: string): SourceRegistry {
    if (!isValidSourceName(name)) {
        throw new SourceError('SOURCE_NAME_INVALID', 'Name empty or invalid', { name });
    }
    if (hasSource(registry, name)) {
        throw new SourceError('SOURCE_EXISTS', 'Already exists', { name });
    }
    return { ...registry, [name]: url };
}

export function setSource(registry: SourceRegistry, name: string, url: string): SourceRegistry {
    if (!hasSource(registry, name)) {
        throw new SourceError('SOURCE_NOT_FOUND', 'Does not exist', { name });
    }
    return { ...registry, [name]: url };
}

export function removeSource(registry: SourceRegistry, name: string): SourceRegistry {
    if (name === CONFIG.localSourceName) {
        throw new SourceError('SOURCE_RESERVED', 'Reserved source', { name });
    }
    if (!hasSource(registry, name)) {
        throw new SourceError('SOURCE_NOT_FOUND', 'Does not exist', { name });
    }
    const { [name]: _removed, ...rest } = registry;
    return rest;
}
