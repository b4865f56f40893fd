import { ComboAuditRecordV1, GENESIS_HASH } from "./schema.js";
import crypto from "crypto";
import fs from "fs";

export interface AuditChainVerification {
    valid: boolean;
    violationIndex?: number;
    reason?: string;
}

export function hashAuditContents(contents: Omit<ComboAuditRecordV1, 'integrity'>, prevHash: string): string {
    return crypto.createHash("sha256")
        .update(JSON.stringify(contents) + prevHash)
        .digest("hex");
}

/**
 * Validates the hash chain over records already in memory.
 */
export function verifyAuditRecords(records: readonly ComboAuditRecordV1[]): AuditChainVerification {
    let lastHash = GENESIS_HASH;

    for (let i = 0; i < records.length; i++) {
        const record = records[i];
        if (!record) continue;

        const failure = checkRecord(record, i, lastHash);
        if (failure) return failure;

        lastHash = record.integrity.hash;
    }

    return { valid: true };
}

/**
 * Audit Integrity Verifier
 * Validates the chain of a JSONL audit file, one record per line.
 */
export function verifyAuditChain(auditFilePath: string): AuditChainVerification {
    if (!fs.existsSync(auditFilePath)) {
        return { valid: true }; // No log written yet
    }

    const lines = fs.readFileSync(auditFilePath, "utf8").trim().split("\n");
    let lastHash = GENESIS_HASH;

    for (let i = 0; i < lines.length; i++) {
        try {
            const line = lines[i];
            if (!line) continue;
            const record = JSON.parse(line) as ComboAuditRecordV1;

            const failure = checkRecord(record, i, lastHash);
            if (failure) return failure;

            lastHash = record.integrity.hash;
        } catch (e) {
            const errorMessage = e instanceof Error ? e.message : 'Parse error';
            return {
                valid: false,
                violationIndex: i,
                reason: `Format error at record ${i}: ${errorMessage}`
            };
        }
    }

    return { valid: true };
}

function checkRecord(record: ComboAuditRecordV1, index: number, lastHash: string): AuditChainVerification | null {
    if (record.integrity.prevHash !== lastHash) {
        return {
            valid: false,
            violationIndex: index,
            reason: `Chain broken at record ${index}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
        };
    }

    const { integrity: _integrity, ...contentsOnly } = record;
    const computedHash = hashAuditContents(contentsOnly, record.integrity.prevHash);

    if (computedHash !== record.integrity.hash) {
        return {
            valid: false,
            violationIndex: index,
            reason: `Integrity violation at record ${index}: hash mismatch. Computed ${computedHash}, found ${record.integrity.hash}`
        };
    }

    return null;
}
