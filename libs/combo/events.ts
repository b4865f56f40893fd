import { Identity } from './combo.js';

export interface ComboCreatedEvent {
    readonly type: 'ComboCreated';
    readonly address: Identity;
    readonly owner: Identity;
    readonly characterId: number;
    readonly damage: number;
    readonly timestamp: number;
}

export interface ComboVerifiedEvent {
    readonly type: 'ComboVerified';
    readonly address: Identity;
    readonly movesCount: number;
    readonly timestamp: number;
}

export type ComboEvent = ComboCreatedEvent | ComboVerifiedEvent;

/**
 * Append-only notification sink.
 */
export interface EventSink {
    emit(event: ComboEvent): void;
}

/**
 * Holds events until the surrounding instruction commits.
 */
export class BufferedEventSink implements EventSink {
    private readonly pending: ComboEvent[] = [];

    emit(event: ComboEvent): void {
        this.pending.push(event);
    }

    drain(): ComboEvent[] {
        return this.pending.splice(0, this.pending.length);
    }
}
