import crypto from "crypto";
import fs from "fs";
import path from "path";
import { ComboEvent, EventSink } from "../combo/events.js";
import { logger } from "../logging/logger.js";
import { hashAuditContents, verifyAuditChain } from "./integrity.js";
import { ComboAuditRecordV1, GENESIS_HASH } from "./schema.js";

export interface AuditEventLogOptions {
    /** JSONL mirror; appended synchronously before emit() returns */
    readonly filePath?: string;
    /** Size of the in-memory window served by recent() */
    readonly recentLimit?: number;
}

const DEFAULT_RECENT_LIMIT = 100;

/**
 * Hash-chained, append-only notification log.
 * Only the chain head and a bounded window of recent records stay in memory;
 * the JSONL file is the full log.
 * A failed file append is fatal to the emit and leaves the head unchanged.
 */
export class AuditEventLog implements EventSink {
    private readonly window: ComboAuditRecordV1[] = [];
    private readonly recentLimit: number;
    private lastHash = GENESIS_HASH;
    private nextSequence = 0;

    constructor(private readonly options: AuditEventLogOptions = {}) {
        this.recentLimit = options.recentLimit ?? DEFAULT_RECENT_LIMIT;
        if (options.filePath) {
            fs.mkdirSync(path.dirname(options.filePath), { recursive: true });
            this.resumeFromFile(options.filePath);
        }
    }

    emit(event: ComboEvent): void {
        const contents: Omit<ComboAuditRecordV1, 'integrity'> = {
            version: 'v1',
            sequence: this.nextSequence,
            eventId: crypto.randomUUID(),
            recordedAt: new Date().toISOString(),
            event
        };

        const prevHash = this.lastHash;
        const hash = hashAuditContents(contents, prevHash);
        const record: ComboAuditRecordV1 = { ...contents, integrity: { prevHash, hash } };

        if (this.options.filePath) {
            try {
                fs.appendFileSync(this.options.filePath, JSON.stringify(record) + "\n");
            } catch (error) {
                logger.error({ error, eventType: event.type }, "CRITICAL: Audit log write failed");
                throw new Error("Audit log failure - event not recorded");
            }
        }

        this.advance(record);

        logger.debug({
            auditEvent: event.type,
            sequence: record.sequence,
            integrityHash: hash.substring(0, 16) + '...'
        }, "Audit event committed");
    }

    /** The most recent records, oldest first, at most `recentLimit` of them. */
    recent(): readonly ComboAuditRecordV1[] {
        return [...this.window];
    }

    headHash(): string {
        return this.lastHash;
    }

    /** Number of records in the chain, including any resumed from file. */
    size(): number {
        return this.nextSequence;
    }

    private advance(record: ComboAuditRecordV1): void {
        this.lastHash = record.integrity.hash;
        this.nextSequence = record.sequence + 1;
        this.window.push(record);
        if (this.window.length > this.recentLimit) {
            this.window.shift();
        }
    }

    /**
     * Continues an existing chain instead of starting a second genesis in the same file.
     * Refuses to append to a chain that does not verify.
     */
    private resumeFromFile(filePath: string): void {
        if (!fs.existsSync(filePath)) return;

        const verification = verifyAuditChain(filePath);
        if (!verification.valid) {
            throw new Error(`Audit chain in ${filePath} is not intact, refusing to append: ${verification.reason}`);
        }

        const lines = fs.readFileSync(filePath, "utf8").split("\n").filter((line) => line.trim() !== "");
        for (const line of lines.slice(-this.recentLimit)) {
            this.advance(JSON.parse(line) as ComboAuditRecordV1);
        }

        logger.info({ filePath, records: this.nextSequence }, "Audit chain resumed from file");
    }
}
