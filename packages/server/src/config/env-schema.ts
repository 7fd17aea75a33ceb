import { z } from 'zod';

const booleanFlag = (fallback: 'true' | 'false') =>
    z
        .enum(['true', 'false'])
        .default(fallback)
        .transform((v) => v === 'true');

const LoggingEnvSchema = z.object({
    NODE_ENV: z
        .enum(['development', 'test', 'production'])
        .default('development'),

    LOG_LEVEL: z
        .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
        .default('info'),
});

const EnvSchema = LoggingEnvSchema
    .extend({
        // Storage
        STORAGE_MODE: z.enum(['memory', 'sqlite', 'postgres']).default('memory'),
        POLICY_TABLE_PREFIX: z
            .string()
            .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'must be a valid SQL identifier')
            .default('acl_policy'),

        // SQLite
        DB_PATH: z.string().min(1).default('./tessera.db'),
        SQLITE_VERBOSE: booleanFlag('false'),

        // PostgreSQL
        DATABASE_URL: z.string().url().optional(),
        DB_HOST: z.string().optional(),
        DB_PORT: z.coerce
            .number()
            .int()
            .min(1)
            .max(65535)
            .default(5432),
        DB_USER: z.string().optional(),
        DB_PASSWORD: z.string().optional(),
        DB_NAME: z.string().optional(),
    })
    .superRefine((data, ctx) => {
        if (data.STORAGE_MODE === 'postgres' && !data.DATABASE_URL && !data.DB_HOST) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'DATABASE_URL or DB_HOST is required when STORAGE_MODE=postgres',
                path: ['DATABASE_URL'],
            });
        }
    });

export type EnvConfig = z.infer<typeof EnvSchema>;
export type LoggingConfig = z.infer<typeof LoggingEnvSchema>;

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: NodeJS.ProcessEnv): z.infer<S> {
    const result = schema.safeParse(env);
    if (!result.success) {
        const errors = result.error.issues
            .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
            .join('\n');
        throw new Error(`Environment validation failed:\n${errors}`);
    }
    return result.data;
}

/**
 * Parses and validates the environment. Throws with every issue listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    return parseEnv(EnvSchema, env);
}

/**
 * The logging subset of the environment, which the shared logger reads at
 * startup without requiring storage settings.
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
    return parseEnv(LoggingEnvSchema, env);
}
