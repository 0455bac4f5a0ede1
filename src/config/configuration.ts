import { z } from 'zod';

const booleanFlag = z
    .union([z.boolean(), z.string()])
    .transform(value => value === true || value === 'true' || value === '1');

export const environmentSchema = z.object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().default(8787),
    CORS_ORIGINS: z
        .string()
        .default('http://localhost:3000')
        .transform(value => value.split(',').map(origin => origin.trim()).filter(Boolean)),

    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(3306),
    DB_USERNAME: z.string().default('root'),
    DB_PASSWORD: z.string().default(''),
    DB_DATABASE: z.string().default('filings_chat'),

    ELASTIC_URL: z.string().url().default('http://localhost:9200'),
    ELASTIC_API_KEY: z.string().default(''),
    // Elastic index prefix shared by every conversation's persisted indices
    STORAGE_NAMESPACE: z
        .string()
        .regex(/^[a-z0-9][a-z0-9_-]*$/, 'must be a lowercase Elasticsearch index prefix')
        .default('filings-chat'),

    GEMINI_API_KEY: z.string().min(1),
    GEMINI_CHAT_MODEL: z.string().default('gemini-2.5-flash'),
    GEMINI_EMBED_MODEL: z.string().default('text-embedding-004'),

    POLYGON_API_KEY: z.string().default(''),
    POLYGON_BASE_URL: z.string().url().default('https://api.polygon.io'),

    VERBOSE: booleanFlag.default(false),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * Passed to `ConfigModule.forRoot({ validate })`. Throws with every failing
 * variable listed so a misconfigured deployment stops at boot.
 */
export function validateEnvironment(raw: Record<string, unknown>): Environment {
    const parsed = environmentSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${issues}`);
    }
    return parsed.data;
}

/**
 * Allowed CORS origins. Gateway decorators are evaluated before the config
 * module loads, so they parse the raw variable through the same schema field.
 */
export function corsOrigins(raw: string | undefined): string[] {
    return environmentSchema.shape.CORS_ORIGINS.parse(raw);
}
