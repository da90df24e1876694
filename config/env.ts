import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// Load environment variables from the package root .env file
dotenv.config({ path: path.resolve(__dirname, '../.env') });

const booleanString = z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true');

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug', 'silent']).default('info'),
    ENABLE_FILE_LOGGING: booleanString,
    LOG_DIR: z.string().min(1).optional(),

    // IANA zone the CLI reads "now" in; the library itself always uses the zone of the supplied instant
    HUMAN_TIME_ZONE: z.string().min(1).optional(),
});

// Same fields, but a value the host set for its own purposes falls back to the default
const lenientEnvSchema = envSchema.extend({
    NODE_ENV: envSchema.shape.NODE_ENV.catch('development'),
    LOG_LEVEL: envSchema.shape.LOG_LEVEL.catch('info'),
    ENABLE_FILE_LOGGING: z
        .enum(['true', 'false'])
        .default('false')
        .catch('false')
        .transform((value) => value === 'true'),
    LOG_DIR: envSchema.shape.LOG_DIR.catch(undefined),
    HUMAN_TIME_ZONE: envSchema.shape.HUMAN_TIME_ZONE.catch(undefined),
});

export type LogLevelSetting = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface Config {
    env: 'development' | 'production' | 'test';
    logLevel: LogLevelSetting;
    enableFileLogging: boolean;
    logDir: string;
    cli: {
        zone?: string;
    };
    /** Variables that were set but not understood, so their defaults were used */
    ignoredSettings: string[];
}

/**
 * Build the config from an environment. Never throws: importing the library
 * must not fail because of how the host application set its environment.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Config {
    const strict = envSchema.safeParse(source);
    const ignoredSettings = strict.success
        ? []
        : [...new Set(strict.error.issues.map((issue) => issue.path.join('.')))];
    const parsed = lenientEnvSchema.parse(source);

    return {
        env: parsed.NODE_ENV,
        logLevel: parsed.LOG_LEVEL,
        enableFileLogging: parsed.ENABLE_FILE_LOGGING,
        logDir: parsed.LOG_DIR || path.join(__dirname, '../logs'),
        cli: {
            zone: parsed.HUMAN_TIME_ZONE,
        },
        ignoredSettings,
    };
}

const config = parseEnv(process.env);

export default config;
