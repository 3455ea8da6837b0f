import { EventEmitter } from 'node:events';
import type { Address } from 'viem';
import type {
    LargePurchaseAttemptedEvent,
    LaunchpadEventName,
    LaunchpadEvents,
    PlatformFeeCollectedEvent,
    RecordedEvent,
    TokenGraduatedEvent,
    TokenLaunchedEvent,
    TokenTradedEvent,
} from './types.js';

/**
 * EventHub — platform-wide event sink.
 *
 * Curves and the factory report launches, trades, limit violations, fees
 * and graduations here. Only contracts the owner has authorized may emit.
 * Every accepted event is kept in an append-only log.
 */
export class EventHub {
    private readonly emitter = new EventEmitter();
    private readonly authorized = new Set<string>();
    private readonly log: RecordedEvent[] = [];

    constructor(readonly owner: Address) { }

    authorizeContract(caller: Address, contract: Address, authorized: boolean): void {
        this.assertOwner(caller);
        if (authorized) {
            this.authorized.add(contract.toLowerCase());
        } else {
            this.authorized.delete(contract.toLowerCase());
        }
    }

    batchAuthorizeContracts(caller: Address, contracts: Address[], authorized: boolean): void {
        this.assertOwner(caller);
        for (const contract of contracts) {
            this.authorizeContract(caller, contract, authorized);
        }
    }

    isAuthorized(contract: Address): boolean {
        return this.authorized.has(contract.toLowerCase());
    }

    emitTokenLaunched(emitter: Address, event: TokenLaunchedEvent): void {
        this.publish({ name: 'token:launched', emitter, payload: event });
    }

    emitTokenTraded(emitter: Address, event: TokenTradedEvent): void {
        this.publish({ name: 'token:traded', emitter, payload: event });
    }

    emitLargePurchaseAttempted(emitter: Address, event: LargePurchaseAttemptedEvent): void {
        this.publish({ name: 'purchase:limit-exceeded', emitter, payload: event });
    }

    emitPlatformFeeCollected(emitter: Address, event: PlatformFeeCollectedEvent): void {
        this.publish({ name: 'fee:collected', emitter, payload: event });
    }

    emitTokenGraduated(emitter: Address, event: TokenGraduatedEvent): void {
        this.publish({ name: 'token:graduated', emitter, payload: event });
    }

    /**
     * Subscribe to one event type. Returns the unsubscribe function.
     */
    on<K extends LaunchpadEventName>(name: K, listener: LaunchpadEvents[K]): () => void {
        this.emitter.on(name, listener);
        return () => { this.emitter.off(name, listener); };
    }

    getEvents(): RecordedEvent[];
    getEvents<K extends LaunchpadEventName>(name: K): Array<Extract<RecordedEvent, { name: K }>>;
    getEvents<K extends LaunchpadEventName>(name?: K): RecordedEvent[] {
        if (name === undefined) return [...this.log];
        return this.log.filter((r): r is Extract<RecordedEvent, { name: K }> => r.name === name);
    }

    private publish(record: RecordedEvent): void {
        if (!this.isAuthorized(record.emitter)) {
            throw new Error(`EventHub: ${record.emitter} is not authorized to emit ${record.name}`);
        }
        this.log.push(record);
        this.emitter.emit(record.name, record.payload);
    }

    private assertOwner(caller: Address): void {
        if (caller.toLowerCase() !== this.owner.toLowerCase()) {
            throw new Error(`EventHub: ${caller} is not the owner`);
        }
    }
}
