/**
 * Combo Record Store
 *
 * Create / Verify / Destroy over a keyed allocation layer, one record per
 * owner. Every operation is synchronous and runs its guards before the first
 * write, so a failure leaves the ledger exactly as it was.
 */

import { logger } from '../logging/logger.js';
import { AllocationLayer } from '../ledger/allocation.js';
import { Clock } from '../ledger/clock.js';
import { AllocationError } from '../ledger/errors.js';
import { deriveComboAddress, DerivedAddress } from './address.js';
import { decodeComboAccount, encodeComboAccount, ComboAccountState } from './codec.js';
import {
    COMBO_ALLOCATION_SIZE,
    CloseComboResult,
    ComboRecord,
    CreateComboInput,
    Identity
} from './combo.js';
import { ComboError } from './errors.js';
import { EventSink } from './events.js';
import { fingerprintOf } from './fingerprint.js';
import { ComboGuardResult, onlyOwner, validateComboData, verifyMoveSequence } from './guards.js';

export interface ComboProgramOptions {
    readonly programId: Identity;
    readonly ledger: AllocationLayer;
    readonly clock: Clock;
    readonly events: EventSink;
}

export class ComboProgram {
    readonly programId: Identity;
    private readonly ledger: AllocationLayer;
    private readonly clock: Clock;
    private readonly events: EventSink;

    constructor(options: ComboProgramOptions) {
        this.programId = options.programId;
        this.ledger = options.ledger;
        this.clock = options.clock;
        this.events = options.events;
    }

    findComboAddress(owner: Identity): DerivedAddress {
        return deriveComboAddress(owner, this.programId);
    }

    createCombo(owner: Identity, input: CreateComboInput): ComboRecord {
        enforce(validateComboData(input));

        const { address, bump } = this.findComboAddress(owner);
        const state: ComboAccountState = {
            owner,
            characterId: input.characterId,
            name: input.name,
            damage: input.damage,
            meterGain: input.meterGain,
            moveCount: input.moveCount,
            createdAt: this.clock.now(),
            fingerprint: fingerprintOf(input),
            verificationCount: 0,
            bump
        };
        // Encoded before allocating: a value that does not fit its field fails here, not half-way.
        const data = encodeComboAccount(state);

        this.ledger.createIfAbsent({ address, programId: this.programId, space: COMBO_ALLOCATION_SIZE });
        this.ledger.write(address, data);

        this.events.emit({
            type: 'ComboCreated',
            address,
            owner,
            characterId: state.characterId,
            damage: state.damage,
            timestamp: state.createdAt
        });

        logger.info({ address, owner, fingerprint: state.fingerprint }, 'Combo created');
        return { address, ...state };
    }

    verifyCombo(verifier: Identity, address: Identity, moves: readonly number[]): ComboRecord {
        enforce(verifyMoveSequence(moves));

        const current = this.load(address);
        const timestamp = this.clock.now();
        const { address: _address, ...state } = current;
        const next: ComboAccountState = {
            ...state,
            verificationCount: current.verificationCount + 1,
            lastVerifiedAt: timestamp
        };

        this.ledger.write(address, encodeComboAccount(next));

        this.events.emit({
            type: 'ComboVerified',
            address,
            movesCount: moves.length,
            timestamp
        });

        logger.info({
            address,
            verifier,
            verificationCount: next.verificationCount
        }, 'Combo verified');

        return { address, ...next };
    }

    closeCombo(signer: Identity, address: Identity, destination: Identity): CloseComboResult {
        const record = this.load(address);
        enforce(onlyOwner(record, signer));

        const reclaimed = this.ledger.reclaim(address, destination);

        logger.info({ address, destination, reclaimed }, 'Combo closed');
        return { address, destination, reclaimed };
    }

    getCombo(address: Identity): ComboRecord | undefined {
        const allocation = this.ledger.get(address);
        if (!allocation) {
            return undefined;
        }
        return this.decodeOwned(address, allocation.programId, allocation.data);
    }

    getComboByOwner(owner: Identity): ComboRecord | undefined {
        return this.getCombo(this.findComboAddress(owner).address);
    }

    private load(address: Identity): ComboRecord {
        const record = this.getCombo(address);
        if (record) {
            return record;
        }
        throw new AllocationError('ACCOUNT_NOT_FOUND', address, `Allocation ${address} not found`);
    }

    private decodeOwned(address: Identity, programId: Identity, data: Buffer): ComboRecord {
        if (programId !== this.programId) {
            throw new ComboError('AccountDidNotDeserialize', `${address} is owned by ${programId}`);
        }
        return decodeComboAccount(address, data);
    }
}

function enforce(result: ComboGuardResult): void {
    if (!result.allowed) {
        throw new ComboError(result.reason, result.details);
    }
}
