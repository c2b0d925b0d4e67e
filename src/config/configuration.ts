import { z } from 'zod';

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

// Largest delay setTimeout honours; longer ones fire after 1 ms.
const MAX_TIMER_MS = 2_147_483_647;

const integer = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const decimal = (fallback: number, min: number, max: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().min(min).max(max).default(fallback));

const flag = (fallback: boolean) =>
    z.preprocess(
        value => (typeof value === 'string' ? ['true', '1', 'yes'].includes(value.trim().toLowerCase()) : value),
        z.boolean(),
    ).default(fallback);

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const csv = z.preprocess(
    blankToUndefined,
    z.string().default('').transform(raw => raw.split(',').map(part => part.trim()).filter(Boolean)),
);

export const configSchema = z.object({
    PORT: integer(8787, 1, 65535),
    CORS_ORIGIN: csv,

    GEMINI_API_KEY: text(''),
    GEMINI_CHAT_MODEL: text('gemini-2.5-flash-lite'),
    GEMINI_EMBED_MODEL: text('text-embedding-004'),
    DEFAULT_TEMPERATURE: decimal(0.5, 0, 2),
    ENABLE_INTERNET_SEARCH: flag(false),

    ELASTIC_URL: text(''),
    ELASTIC_API_KEY: text(''),
    ELASTIC_INDEX: text('rag_passages'),
    EMBEDDING_DIMENSIONS: integer(768, 1),
    RETRIEVAL_TOP_K: integer(3, 1, 10),

    WEB_SEARCH_MAX_RESULTS: integer(3, 1, 10),
    WEB_SEARCH_MIN_INTERVAL_MS: integer(1000, 0, MAX_TIMER_MS),
    WIKIPEDIA_LANGUAGE: text('en'),

    DB_TYPE: z.preprocess(blankToUndefined, z.enum(['mysql', 'better-sqlite3']).default('better-sqlite3')),
    DB_HOST: text('localhost'),
    DB_PORT: integer(3306, 1, 65535),
    DB_USERNAME: text('root'),
    DB_PASSWORD: text(''),
    DB_DATABASE: text('rag_router'),
    CHAT_HISTORY_DB_PATH: text('db/chat_history.sqlite'),
    MAX_MESSAGES_PER_USER: integer(500, 2),

    REQUEST_TIMEOUT_MS: integer(120_000, 1, MAX_TIMER_MS),

    APPROVED_USER_IDS: csv,
    AUTHORIZED_TOKEN_IPS: csv,
    JWT_SECRET_KEY: text(''),
    JWT_ALGORITHM: z.preprocess(blankToUndefined, z.enum(['HS256', 'HS384', 'HS512']).default('HS256')),
    JWT_ISSUER: text('rag-router-api'),
    JWT_EXPIRY_HOURS: z.preprocess(blankToUndefined, z.coerce.number().positive().optional()),

    ENCRYPTION_KEY: z.preprocess(
        blankToUndefined,
        z.string().regex(/^[0-9a-fA-F]{64}$/, 'must be 64 hex characters (32 bytes)').optional(),
    ),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * `ConfigModule.forRoot({ validate })` hook. Fails start-up with every
 * offending key listed.
 */
export function validateConfig(env: Record<string, unknown>): AppConfig {
    const parsed = configSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }
    return parsed.data;
}
