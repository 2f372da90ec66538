import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type ImpactConfig } from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { envLogLevel, getLogger } from './logger.js';

const configSchema = z.object({
    publicationsFile: z.string().min(1),
    snapshotFile: z.string().min(1),
    reportDb: z.string().min(1),
    dates: z.array(z.string()).optional(),
    citationsPerPublication: z.number().int().positive().max(200),
    requestDelayMs: z.number().int().min(0),
    concurrency: z.number().int().positive(),
    httpTimeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0),
    openalexEmail: z.string().email().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
    jsonLogs: z.boolean(),
});

const fileConfigSchema = configSchema.partial().strict();

/**
 * Load configuration from impact.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<ImpactConfig> | null> {
    const explorer = cosmiconfig('impact', {
        searchPlaces: ['impact.config.json'],
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        throw new ConfigurationError('Failed to read impact.config.json', error);
    }

    if (!result || result.isEmpty) {
        return null;
    }

    const parsed = fileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid config file ${result.filepath}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
            parsed.error.issues
        );
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 * API keys are read by the adapters directly and never stored in config.
 */
function loadEnvVars(): Partial<ImpactConfig> {
    const env: Partial<ImpactConfig> = {};

    const level = envLogLevel();
    if (level) env.logLevel = level;

    const email = process.env['OPENALEX_EMAIL'];
    if (email) env.openalexEmail = email;

    return env;
}

/**
 * Drop undefined entries so that unset CLI flags do not shadow lower layers.
 */
function defined(partial: object): Record<string, unknown> {
    return Object.fromEntries(
        Object.entries(partial).filter(([, value]) => value !== undefined)
    );
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<ImpactConfig>,
    options: { searchFrom?: string } = {}
): Promise<ImpactConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    const merged = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...defined(cliFlags),
    };

    const parsed = configSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid configuration: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
            parsed.error.issues
        );
    }

    return parsed.data;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name] || undefined;
}
