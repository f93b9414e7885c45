/**
 * ⚙️ ENVIRONMENT CONFIGURATION
 * `.env` is loaded once, then every variable is validated with zod. An
 * invalid value stops the run before any lookup is attempted.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import type { LogLevel } from '../types';

dotenv.config();

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const EnvSchema = z.object({
    WORKERS: z.string().optional(),

    WHOIS_SERVER: z.string().min(1).default('whois.iana.org'),
    WHOIS_PORT: z.string().optional(),
    WHOIS_TIMEOUT_MS: z.string().optional(),
    WHOIS_FOLLOW_REFERRALS: z.enum(['true', 'false']).optional(),

    PROGRESS_LOG_EVERY: z.string().optional(),
    LOG_LEVEL: LogLevelSchema.default('info'),
    LOG_DIR: z.string().optional(),
    NODE_ENV: z.string().optional(),
});

export type WhoisConfig = {
    server: string;
    port: number;
    timeoutMs: number;
    followReferrals: boolean;
};

export type AppConfig = {
    workers: number;
    progressEvery: number;
    whois: WhoisConfig;
    logging: {
        level: LogLevel;
        dir?: string;
    };
};

function parseInteger(
    value: string | undefined,
    fallback: number,
    name: string,
    opts?: { min?: number; max?: number }
): number {
    if (value === undefined || value === '') {
        return fallback;
    }

    const n = Number(value);
    if (!Number.isInteger(n)) {
        throw new ConfigurationError(`${name} must be an integer`);
    }
    if (opts?.min !== undefined && n < opts.min) {
        throw new ConfigurationError(`${name} must be >= ${opts.min}`);
    }
    if (opts?.max !== undefined && n > opts.max) {
        throw new ConfigurationError(`${name} must be <= ${opts.max}`);
    }
    return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);

    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Invalid environment configuration:\n${issues}`);
    }

    const vars = parsed.data;

    return {
        workers: parseInteger(vars.WORKERS, 10, 'WORKERS', { min: 1 }),
        progressEvery: parseInteger(vars.PROGRESS_LOG_EVERY, 25, 'PROGRESS_LOG_EVERY', { min: 1 }),
        whois: {
            server: vars.WHOIS_SERVER,
            port: parseInteger(vars.WHOIS_PORT, 43, 'WHOIS_PORT', { min: 1, max: 65535 }),
            timeoutMs: parseInteger(vars.WHOIS_TIMEOUT_MS, 10000, 'WHOIS_TIMEOUT_MS', { min: 100 }),
            followReferrals: vars.WHOIS_FOLLOW_REFERRALS !== 'false',
        },
        logging: {
            level: vars.LOG_LEVEL,
            dir: vars.LOG_DIR || undefined,
        },
    };
}

let configInstance: AppConfig | null = null;

export const getConfig = (): AppConfig => {
    if (!configInstance) {
        configInstance = loadConfig();
    }
    return configInstance;
};
