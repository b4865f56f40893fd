import { AuditEventLog } from "../audit/eventLog.js";
import { createDb } from "../db/index.js";
import { asClientPool, createPool } from "../db/pool.js";
import { ComboHost } from "../host/host.js";
import { InMemoryComboHost } from "../host/memoryHost.js";
import { PostgresComboHost } from "../host/postgresHost.js";
import { logger } from "../logging/logger.js";
import { ConfigGuard, Env } from "./config-guard.js";
import { loadRegistryConfig, REGISTRY_CONFIG_GUARDS, RegistryConfig } from "./config/registry-config.js";

export interface RegistryRuntime {
    readonly config: RegistryConfig;
    readonly host: ComboHost;
    readonly auditLog: AuditEventLog;
    close(): Promise<void>;
}

export async function bootstrap(serviceName: string, env: Env = process.env): Promise<RegistryRuntime> {
    logger.info({ serviceName }, "Bootstrapping service");

    ConfigGuard.enforce(REGISTRY_CONFIG_GUARDS, env);
    const config = loadRegistryConfig(env);

    const auditLog = new AuditEventLog(config.auditLogPath ? { filePath: config.auditLogPath } : {});

    if (config.store === 'postgres' && config.database) {
        const pool = createPool(config.database);
        const db = createDb(asClientPool(pool));

        // Fail fast on an unreachable database
        await db.query('SELECT 1');

        logger.info({ serviceName, store: config.store }, "Startup checks passed");
        return {
            config,
            auditLog,
            host: new PostgresComboHost({
                db,
                programId: config.programId,
                deposit: config.allocationDeposit,
                events: auditLog
            }),
            close: () => pool.end()
        };
    }

    logger.info({ serviceName, store: config.store }, "Startup checks passed");
    return {
        config,
        auditLog,
        host: new InMemoryComboHost({
            programId: config.programId,
            deposit: config.allocationDeposit,
            events: auditLog
        }),
        close: async () => undefined
    };
}
