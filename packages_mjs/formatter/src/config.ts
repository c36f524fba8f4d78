import { z } from 'zod';
import { getLogger } from '@partial-format/syntax';
import { InvalidOptionsError } from './errors.js';

const logger = getLogger('config');

export const MODES = ['partial', 'glob', 'default'] as const;
export type Mode = (typeof MODES)[number];

export const ModeSchema = z.enum(MODES);

export const RenderOptionsSchema = z.object({
    args: z.array(z.unknown()).optional(),
    globMarker: z.string().optional(),
    enforceConstraints: z.boolean().optional(),
    cache: z.boolean().optional()
}).strict();

export interface RenderOptions {
    /** Positional arguments for `{}` and `{0}` fields */
    args?: readonly unknown[];
    /** Replacement for missing fields in glob mode */
    globMarker?: string;
    /** Reject resolved values that do not match their inline constraint */
    enforceConstraints?: boolean;
    /** Use the shared template cache (default true) */
    cache?: boolean;
}

export interface ResolvedOptions {
    args: readonly unknown[];
    globMarker: string;
    enforceConstraints: boolean;
    cache: boolean;
}

/** An empty variable counts as unset */
const unsetIfEmpty = (value: unknown): unknown => (value === '' ? undefined : value);

export const EnvConfigSchema = z.object({
    PARTIAL_FORMAT_GLOB_MARKER: z.preprocess(unsetIfEmpty, z.string().min(1).default('*')),
    PARTIAL_FORMAT_CACHE_SIZE: z.preprocess(unsetIfEmpty, z.coerce.number().int().nonnegative().default(256))
});

export interface EnvConfig {
    globMarker: string;
    cacheSize: number;
}

const DEFAULT_ENV_CONFIG: EnvConfig = { globMarker: '*', cacheSize: 256 };

function describeIssues(error: z.ZodError): string {
    return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join(', ');
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const result = EnvConfigSchema.safeParse(env);
    if (!result.success) {
        logger.warn(`Ignoring invalid environment configuration: ${describeIssues(result.error)}`);
        return DEFAULT_ENV_CONFIG;
    }
    return {
        globMarker: result.data.PARTIAL_FORMAT_GLOB_MARKER,
        cacheSize: result.data.PARTIAL_FORMAT_CACHE_SIZE
    };
}

export const envConfig: EnvConfig = loadEnvConfig();

export function validateMode(mode: unknown): Mode {
    const result = ModeSchema.safeParse(mode);
    if (!result.success) {
        throw new InvalidOptionsError(`Invalid mode '${String(mode)}', expected one of: ${MODES.join(', ')}`);
    }
    return result.data;
}

export function resolveOptions(options: RenderOptions = {}): ResolvedOptions {
    const result = RenderOptionsSchema.safeParse(options);
    if (!result.success) {
        throw new InvalidOptionsError(`Invalid render options: ${describeIssues(result.error)}`);
    }
    const data = result.data;
    return {
        args: data.args ?? [],
        globMarker: data.globMarker ?? envConfig.globMarker,
        enforceConstraints: data.enforceConstraints ?? false,
        cache: data.cache ?? true
    };
}
