import { verifyAuditChain } from "../../libs/audit/integrity.js";

/**
 * Audit Chain Verification
 * Replays the hash chain of a combo event log and exits non-zero on the first break.
 *
 * Usage: verify_event_log.ts <path-to-jsonl>
 */
function runChainVerification() {
    const filePath = process.argv[2] ?? process.env.REGISTRY_AUDIT_LOG_PATH;
    if (!filePath) {
        console.error("Usage: verify_event_log.ts <path-to-jsonl> (or set REGISTRY_AUDIT_LOG_PATH)");
        process.exit(2);
    }

    console.log(`--- VERIFYING AUDIT CHAIN: ${filePath} ---`);
    const result = verifyAuditChain(filePath);

    if (result.valid) {
        console.log("✅ SUCCESS: Audit chain intact.");
        return;
    }

    console.error(`❌ FAILURE at record ${result.violationIndex}: ${result.reason}`);
    process.exit(1);
}

runChainVerification();
