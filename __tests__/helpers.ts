import winston from 'winston';
import type { Address } from 'viem';
import { BondingCurve } from '../src/curve/BondingCurve.js';
import { SCALE, TOTAL_ISSUANCE } from '../src/curve/constants.js';
import { EventHub } from '../src/events/EventHub.js';
import { DeferredLiquiditySeeder, type LiquiditySeeder } from '../src/liquidity/LiquiditySeeder.js';
import { ReserveBank } from '../src/token/ReserveBank.js';
import { TokenLedger } from '../src/token/TokenLedger.js';

export const OWNER: Address = '0x00000000000000000000000000000000000000a1';
export const TREASURY: Address = '0x00000000000000000000000000000000000000f1';
export const CREATOR: Address = '0x00000000000000000000000000000000000000c1';
export const CURVE: Address = '0x0000000000000000000000000000000000000c0e';
export const TOKEN: Address = '0x0000000000000000000000000000000000000707';
export const FACTORY: Address = '0x00000000000000000000000000000000000000fa';
export const ALICE: Address = '0x1111111111111111111111111111111111111111';
export const BOB: Address = '0x2222222222222222222222222222222222222222';
export const CAROL: Address = '0x3333333333333333333333333333333333333333';
export const DAVE: Address = '0x4444444444444444444444444444444444444444';

/** Whole reserve units / whole tokens in fixed point. */
export const units = (whole: bigint): bigint => whole * SCALE;

export const quietLogger = (): winston.Logger => winston.createLogger({ silent: true });

export interface CurveFixture {
    curve: BondingCurve;
    token: TokenLedger;
    reserve: ReserveBank;
    hub: EventHub;
    seeder: DeferredLiquiditySeeder;
}

export interface CurveFixtureOptions {
    basePrice?: bigint;
    authorize?: boolean;
    liquiditySeeder?: LiquiditySeeder;
}

/**
 * A curve holding the full issuance, wired to a fresh reserve bank and hub.
 */
export async function createCurveFixture(options: CurveFixtureOptions = {}): Promise<CurveFixture> {
    const reserve = new ReserveBank();
    const token = new TokenLedger('TEST');
    await token.mint(CURVE, TOTAL_ISSUANCE);

    const hub = new EventHub(OWNER);
    if (options.authorize ?? true) {
        hub.authorizeContract(OWNER, CURVE, true);
    }

    const seeder = new DeferredLiquiditySeeder(quietLogger());
    const curve = new BondingCurve({
        address: CURVE,
        tokenAddress: TOKEN,
        token,
        reserve,
        creator: CREATOR,
        treasury: TREASURY,
        owner: OWNER,
        basePrice: options.basePrice,
        eventHub: hub,
        liquiditySeeder: options.liquiditySeeder ?? seeder,
        logger: quietLogger(),
    });
    return { curve, token, reserve, hub, seeder };
}
