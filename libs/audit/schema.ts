/**
 * Combo Audit Schema v1
 *
 * Every notification the registry emits is stored as one hash-chained
 * record. hash = SHA-256(JSON of the record without `integrity` || prevHash).
 */

import { ComboEvent } from '../combo/events.js';

export const GENESIS_HASH = '0'.repeat(64);

export interface ComboAuditRecordV1 {
    version: 'v1';
    sequence: number;
    eventId: string;        // UUID
    recordedAt: string;     // ISO-8601
    event: ComboEvent;
    integrity: {
        prevHash: string;   // Hash of the immediately preceding record
        hash: string;
    };
}
