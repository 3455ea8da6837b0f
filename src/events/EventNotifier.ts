import type winston from 'winston';
import type { Address } from 'viem';
import type { EventHub } from './EventHub.js';
import type {
    LargePurchaseAttemptedEvent,
    PlatformFeeCollectedEvent,
    TokenGraduatedEvent,
    TokenLaunchedEvent,
    TokenTradedEvent,
} from './types.js';

/**
 * Fire-and-forget reporting from one contract (a curve or the factory) to
 * the hub.
 *
 * Delivery is skipped when no hub is wired or the curve has not been
 * authorized, and a failing hub is logged: notifications never decide the
 * outcome of the operation that reports them.
 */
export class EventNotifier {
    constructor(
        private readonly hub: EventHub | undefined,
        private readonly source: Address,
        private readonly logger: winston.Logger,
    ) { }

    tokenLaunched(event: TokenLaunchedEvent): void {
        this.deliver('TokenLaunched', (hub) => hub.emitTokenLaunched(this.source, event));
    }

    tokenTraded(event: TokenTradedEvent): void {
        this.deliver('TokenTraded', (hub) => hub.emitTokenTraded(this.source, event));
    }

    largePurchaseAttempted(event: LargePurchaseAttemptedEvent): void {
        this.deliver('LargePurchaseAttempted', (hub) => hub.emitLargePurchaseAttempted(this.source, event));
    }

    feeCollected(event: PlatformFeeCollectedEvent): void {
        this.deliver('PlatformFeeCollected', (hub) => hub.emitPlatformFeeCollected(this.source, event));
    }

    tokenGraduated(event: TokenGraduatedEvent): void {
        this.deliver('TokenGraduated', (hub) => hub.emitTokenGraduated(this.source, event));
    }

    private deliver(kind: string, send: (hub: EventHub) => void): void {
        const hub = this.hub;
        if (!hub) return;
        if (!hub.isAuthorized(this.source)) {
            this.logger.debug(`Skipping ${kind}: ${this.source} is not authorized on the event hub`);
            return;
        }
        try {
            send(hub);
        } catch (err) {
            this.logger.warn(`Event delivery failed`, {
                event: kind,
                error: err instanceof Error ? err.message : String(err),
            });
        }
    }
}
