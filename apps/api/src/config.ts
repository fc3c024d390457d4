import { z } from 'zod';
import { ConfigError } from '@facility-pulse/contracts';
import { SNAPSHOT_RETENTION_LIMIT } from '@facility-pulse/database';

const booleanFromEnv = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    HOST: z.string().min(1).default('0.0.0.0'),
    SERVICE_NAME: z.string().min(1).default('facility-pulse'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().min(1).default('postgresql://localhost:5432/facility_pulse'),

    SNAPSHOT_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
    SNAPSHOT_RETENTION_LIMIT: z.coerce.number().int().positive().default(SNAPSHOT_RETENTION_LIMIT),
    SNAPSHOT_RANDOM_SEED: z.coerce.number().int().optional(),
    SNAPSHOT_AUTOSTART: booleanFromEnv,

    BASIC_AUTH_USER: z.string().min(1).default('admin'),
    BASIC_AUTH_PASS: z.string().min(1).default('admin'),
    API_KEY: z.string().min(1).default('dev-api-key'),
    BEARER_TOKEN: z.string().min(1).default('dev-bearer-token'),
    ADMIN_TOKEN: z.string().min(1).optional(),
});

export interface AuthSecrets {
    basicUser: string;
    basicPass: string;
    apiKey: string;
    bearerToken: string;
}

export interface AppConfig {
    port: number;
    host: string;
    serviceName: string;
    logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
    storage: { driver: 'postgres' | 'memory'; databaseUrl: string };
    snapshots: {
        intervalMs: number;
        retentionLimit: number;
        randomSeed?: number;
        autostart: boolean;
    };
    auth: AuthSecrets;
    adminToken?: string;
}

// Empty strings in .env mean "unset".
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') result[key] = value;
    }
    return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }
    const e = parsed.data;

    return {
        port: e.PORT,
        host: e.HOST,
        serviceName: e.SERVICE_NAME,
        logLevel: e.LOG_LEVEL,
        storage: { driver: e.STORAGE_DRIVER, databaseUrl: e.DATABASE_URL },
        snapshots: {
            intervalMs: e.SNAPSHOT_INTERVAL_MS,
            retentionLimit: e.SNAPSHOT_RETENTION_LIMIT,
            randomSeed: e.SNAPSHOT_RANDOM_SEED,
            autostart: e.SNAPSHOT_AUTOSTART,
        },
        auth: {
            basicUser: e.BASIC_AUTH_USER,
            basicPass: e.BASIC_AUTH_PASS,
            apiKey: e.API_KEY,
            bearerToken: e.BEARER_TOKEN,
        },
        adminToken: e.ADMIN_TOKEN,
    };
}
