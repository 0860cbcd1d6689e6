import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const DEFAULT_OVERPASS_URLS = [
    'https://overpass-api.de/api/interpreter',
    'https://overpass.kumi.systems/api/interpreter',
    'https://z.overpass-api.de/api/interpreter'
];

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform(v => v === 'true' || v === '1');

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8000),
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    LOG_PRETTY: booleanFlag,

    LLM_PROVIDER: z.string().default('openai').transform(v => v.toLowerCase()),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    NOMINATIM_URL: z.string().url().default('https://nominatim.openstreetmap.org/search'),
    GEOCODE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    OVERPASS_URLS: z
        .string()
        .optional()
        .transform(v => (v ? v.split(',').map(u => u.trim()).filter(Boolean) : DEFAULT_OVERPASS_URLS))
        .pipe(z.array(z.string().url()).min(1)),
    OVERPASS_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    POI_RADIUS_METERS: z.coerce.number().int().positive().default(1500),
    HTTP_USER_AGENT: z.string().min(1).default('area-insight-server/1.0'),

    ANALYSIS_STRICT_SUMMARY: booleanFlag
});

export interface AppConfig {
    port: number;
    env: 'development' | 'test' | 'production';
    logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
    logPretty: boolean;
    llmProvider: string;
    openaiApiKey: string | undefined;
    openaiModel: string;
    llmTimeoutMs: number;
    nominatimUrl: string;
    geocodeTimeoutMs: number;
    overpassUrls: string[];
    overpassTimeoutMs: number;
    poiRadiusMeters: number;
    userAgent: string;
    strictSummary: boolean;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

let cached: AppConfig | null = null;

/**
 * Parse an environment map into the application config.
 * Empty strings are treated as unset so `.env` placeholders fall back to defaults.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') cleaned[key] = value;
    }

    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
    }

    const e = parsed.data;
    return {
        port: e.PORT,
        env: e.NODE_ENV,
        logLevel: e.LOG_LEVEL,
        logPretty: e.LOG_PRETTY,
        llmProvider: e.LLM_PROVIDER,
        openaiApiKey: e.OPENAI_API_KEY,
        openaiModel: e.OPENAI_MODEL,
        llmTimeoutMs: e.LLM_TIMEOUT_MS,
        nominatimUrl: e.NOMINATIM_URL,
        geocodeTimeoutMs: e.GEOCODE_TIMEOUT_MS,
        overpassUrls: e.OVERPASS_URLS,
        overpassTimeoutMs: e.OVERPASS_TIMEOUT_MS,
        poiRadiusMeters: e.POI_RADIUS_METERS,
        userAgent: e.HTTP_USER_AGENT,
        strictSummary: e.ANALYSIS_STRICT_SUMMARY
    };
}

export function getConfig(): AppConfig {
    if (!cached) cached = parseConfig(process.env);
    return cached;
}

export function resetConfigForTests(): void {
    cached = null;
}
