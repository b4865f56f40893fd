import { z } from 'zod';
import { Env, GuardRule } from '../config-guard.js';
import { DB_CONFIG_GUARDS } from './db-config.js';
import { IdentitySchema } from '../../validation/schema.js';

/**
 * Rent-exempt minimum for a 256-byte allocation: (128 + 256) * 3480 * 2.
 */
export const DEFAULT_ALLOCATION_DEPOSIT = 2_672_640;

export const REGISTRY_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'REGISTRY_PROGRAM_ID' },
    {
        type: 'forbidIf',
        name: 'REGISTRY_STORE',
        when: (env) => env.REGISTRY_STORE !== undefined && !['memory', 'postgres'].includes(env.REGISTRY_STORE),
        message: 'REGISTRY_STORE must be "memory" or "postgres"',
    },
    {
        type: 'forbidIf',
        name: 'InMemoryLedger',
        when: (env) => env.NODE_ENV === 'production' && (env.REGISTRY_STORE ?? 'memory') === 'memory',
        message: 'The in-memory ledger must never back a production deployment',
    },
    {
        type: 'assert',
        check: (env) => !['production', 'staging'].includes(env.NODE_ENV ?? '') || !!env.REGISTRY_AUDIT_LOG_PATH,
        message: 'REGISTRY_AUDIT_LOG_PATH is required in production/staging',
    },
    ...DB_CONFIG_GUARDS
];

const numberFromEnv = (fallback: number) =>
    z.string().regex(/^\d+$/).transform(Number).optional().transform((value) => value ?? fallback);

const RegistryEnvSchema = z.object({
    REGISTRY_PROGRAM_ID: IdentitySchema,
    REGISTRY_STORE: z.enum(['memory', 'postgres']).default('memory'),
    REGISTRY_ALLOCATION_DEPOSIT: numberFromEnv(DEFAULT_ALLOCATION_DEPOSIT),
    REGISTRY_AUDIT_LOG_PATH: z.string().min(1).optional(),
    PORT: numberFromEnv(8080),
    DB_HOST: z.string().optional(),
    DB_PORT: numberFromEnv(5432),
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().optional(),
    DB_CA_CERT: z.string().optional(),
    DB_POOL_MAX: numberFromEnv(20)
});

export interface DatabaseConfig {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
    readonly caCert?: string;
    readonly poolMax: number;
}

export interface RegistryConfig {
    readonly programId: string;
    readonly store: 'memory' | 'postgres';
    readonly allocationDeposit: number;
    readonly auditLogPath?: string;
    readonly port: number;
    readonly database?: DatabaseConfig;
}

/**
 * Parses the environment into a typed configuration.
 * Callers run ConfigGuard over REGISTRY_CONFIG_GUARDS first; a parse failure here still throws.
 */
export function loadRegistryConfig(env: Env = process.env): RegistryConfig {
    const parsed = RegistryEnvSchema.parse(env);

    let database: DatabaseConfig | undefined;
    if (parsed.REGISTRY_STORE === 'postgres') {
        if (!parsed.DB_HOST || !parsed.DB_USER || !parsed.DB_PASSWORD || !parsed.DB_NAME) {
            throw new Error('Database configuration incomplete for REGISTRY_STORE=postgres');
        }
        database = {
            host: parsed.DB_HOST,
            port: parsed.DB_PORT,
            user: parsed.DB_USER,
            password: parsed.DB_PASSWORD,
            database: parsed.DB_NAME,
            poolMax: parsed.DB_POOL_MAX,
            ...(parsed.DB_CA_CERT ? { caCert: parsed.DB_CA_CERT } : {})
        };
    }

    return {
        programId: parsed.REGISTRY_PROGRAM_ID,
        store: parsed.REGISTRY_STORE,
        allocationDeposit: parsed.REGISTRY_ALLOCATION_DEPOSIT,
        port: parsed.PORT,
        ...(parsed.REGISTRY_AUDIT_LOG_PATH ? { auditLogPath: parsed.REGISTRY_AUDIT_LOG_PATH } : {}),
        ...(database ? { database } : {})
    };
}
