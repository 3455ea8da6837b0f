import type winston from 'winston';
import type { Address } from 'viem';

export interface LiquiditySeedRequest {
    token: Address;
    curve: Address;
    /** Reserve set aside for the pool (the liquidity share of graduation). */
    reserveAmount: bigint;
    /** Tokens the curve still holds after graduation. */
    tokenAmount: bigint;
}

/**
 * Hands graduated reserves and leftover tokens to an external pool.
 * A throw aborts the graduation, and with it the buy that triggered it.
 */
export interface LiquiditySeeder {
    seed(request: LiquiditySeedRequest): Promise<void>;
}

/**
 * Placeholder seeder: no pool integration yet, so the liquidity share and the
 * leftover tokens stay with the curve. Keeps a record of every request.
 */
export class DeferredLiquiditySeeder implements LiquiditySeeder {
    private readonly requests: LiquiditySeedRequest[] = [];

    constructor(private readonly logger: winston.Logger) { }

    async seed(request: LiquiditySeedRequest): Promise<void> {
        this.requests.push(request);
        this.logger.info('Liquidity seeding deferred; funds remain with the curve', { ...request });
    }

    getRequests(): readonly LiquiditySeedRequest[] {
        return this.requests;
    }
}
