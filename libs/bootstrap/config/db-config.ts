import { Env, GuardRule } from '../config-guard.js';

const usesPostgres = (env: Env) => env.REGISTRY_STORE === 'postgres';

/**
 * DB Configuration Guards
 * Connection parameters are mandatory once the PostgreSQL ledger is selected.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST', when: usesPostgres },
    { type: 'required', name: 'DB_PORT', when: usesPostgres },
    { type: 'required', name: 'DB_USER', when: usesPostgres },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true, when: usesPostgres },
    { type: 'required', name: 'DB_NAME', when: usesPostgres },

    {
        type: 'assert',
        check: (env) =>
            !usesPostgres(env) ||
            !['production', 'staging'].includes(env.NODE_ENV ?? '') ||
            !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    }
];
