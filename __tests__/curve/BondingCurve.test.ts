/**
 * BondingCurve Tests
 *
 * 1. Buys move reserve, tokens and fee, and report the trade
 * 2. Sells pay out net of fee and leave the cumulative raise untouched
 * 3. Per-wallet purchase limit of 4% of issuance
 * 4. Pause and ownership
 * 5. A failed settlement leaves no trace
 * 6. Reentrant calls are rejected; independent calls are serialized
 * 7. Reserve accounting holds across a random trade sequence
 * 8. The last buy before sellout fills only the remaining supply
 */
import type { Address } from 'viem';
import {
    MAX_PURCHASE_PER_WALLET,
    SCALE,
    TOTAL_ISSUANCE,
    TOTAL_SELLABLE_SUPPLY,
} from '../../src/curve/constants.js';
import { isCurveError } from '../../src/curve/CurveError.js';
import { LedgerError } from '../../src/token/LedgerError.js';
import {
    ALICE,
    BOB,
    CAROL,
    CURVE,
    DAVE,
    OWNER,
    TREASURY,
    createCurveFixture,
    units,
} from '../helpers.js';

const FIRST_BUY_UNITS = 9_779_953_436_398_765_600_000_000n;

const wallet = (n: number): Address => `0x${(0x1000 + n).toString(16).padStart(40, '0')}`;

describe('BondingCurve', () => {

    describe('buy', () => {
        test('should deliver tokens and split the payment between reserve and fee', async () => {
            const { curve, token, reserve, hub } = await createCurveFixture();
            await reserve.deposit(ALICE, units(10_000n));

            const receipt = await curve.buy(ALICE, units(1_000n));

            expect(receipt.unitsOut).toBe(FIRST_BUY_UNITS);
            expect(receipt.fee).toBe(units(10n));
            expect(receipt.totalRaised).toBe(units(990n));
            expect(receipt.graduated).toBe(false);
            expect(receipt.newPrice).toBe(102_459_933_279_290n);

            expect(await token.balanceOf(ALICE)).toBe(FIRST_BUY_UNITS);
            expect(await token.balanceOf(CURVE)).toBe(TOTAL_ISSUANCE - FIRST_BUY_UNITS);
            expect(await reserve.balanceOf(ALICE)).toBe(units(9_000n));
            expect(await reserve.balanceOf(CURVE)).toBe(units(990n));
            expect(await reserve.balanceOf(TREASURY)).toBe(units(10n));

            expect(curve.getUnitsSold()).toBe(FIRST_BUY_UNITS);
            expect(curve.getCurrentReserve()).toBe(units(990n));
            expect(curve.getPurchaseAmount(ALICE)).toBe(FIRST_BUY_UNITS);
            expect(curve.getCurrentPrice()).toBe(102_459_933_279_290n);

            const [traded] = hub.getEvents('token:traded');
            expect(traded.emitter).toBe(CURVE);
            expect(traded.payload).toMatchObject({
                trader: ALICE,
                isBuy: true,
                reserveAmount: units(1_000n),
                tokenAmount: FIRST_BUY_UNITS,
                fee: units(10n),
            });
            const [fee] = hub.getEvents('fee:collected');
            expect(fee.payload).toMatchObject({ feeType: 'trading', amount: units(10n) });
        });

        test('should reject zero, unaffordable and dust buys', async () => {
            const { curve, reserve } = await createCurveFixture();
            await reserve.deposit(ALICE, units(10n));

            await expect(curve.buy(ALICE, 0n)).rejects.toMatchObject({ code: 'INVALID_AMOUNT' });
            await expect(curve.buy(ALICE, units(11n))).rejects.toMatchObject({ code: 'INSUFFICIENT_BALANCE' });
            await expect(curve.buy(CAROL, 1n)).rejects.toMatchObject({ code: 'INSUFFICIENT_BALANCE' });
            // One wei moves the cube by less than one fixed-point step
            await expect(curve.buy(ALICE, 1n)).rejects.toMatchObject({ code: 'INVALID_AMOUNT' });

            expect(curve.getUnitsSold()).toBe(0n);
            expect(await reserve.balanceOf(ALICE)).toBe(units(10n));
        });

        test('should quote the same fill the buy delivers', async () => {
            const { curve, reserve } = await createCurveFixture();
            await reserve.deposit(ALICE, units(1_000n));

            const quote = curve.calculateTokensForReserve(units(1_000n));
            const receipt = await curve.buy(ALICE, units(1_000n));
            expect(receipt.unitsOut).toBe(quote.unitsOut);
        });
    });

    describe('sell', () => {
        test('should pay out net of fee and keep the cumulative raise', async () => {
            const { curve, token, reserve, hub } = await createCurveFixture();
            await reserve.deposit(ALICE, units(10_000n));
            await curve.buy(ALICE, units(1_000n));

            const half = FIRST_BUY_UNITS / 2n;
            await token.approve(ALICE, CURVE, half);
            const receipt = await curve.sell(ALICE, half);

            expect(receipt.grossReserve).toBe(498_007_254_116_013_040_000n);
            expect(receipt.fee).toBe(4_980_072_541_160_130_400n);
            expect(receipt.reserveOut).toBe(493_027_181_574_852_909_600n);
            expect(receipt.newPrice).toBe(101_226_230_409_597n);

            expect(curve.getTotalRaised()).toBe(units(990n));
            expect(curve.getCurrentReserve()).toBe(491_992_745_883_986_960_000n);
            expect(curve.getUnitsSold()).toBe(FIRST_BUY_UNITS - half);

            expect(await reserve.balanceOf(ALICE)).toBe(9_493_027_181_574_852_909_600n);
            expect(await reserve.balanceOf(TREASURY)).toBe(14_980_072_541_160_130_400n);
            expect(await reserve.balanceOf(CURVE)).toBe(491_992_745_883_986_960_000n);
            expect(await token.balanceOf(ALICE)).toBe(FIRST_BUY_UNITS - half);
            expect(await token.allowance(ALICE, CURVE)).toBe(0n);

            const sells = hub.getEvents('token:traded').filter((e) => !e.payload.isBuy);
            expect(sells).toHaveLength(1);
            expect(sells[0].payload.reserveAmount).toBe(493_027_181_574_852_909_600n);
        });

        test('should require an allowance and leave everything in place without one', async () => {
            const { curve, token, reserve } = await createCurveFixture();
            await reserve.deposit(ALICE, units(1_000n));
            await curve.buy(ALICE, units(1_000n));

            const err: unknown = await curve.sell(ALICE, SCALE).catch((e: unknown) => e);
            expect(isCurveError(err, 'TRANSFER_FAILED')).toBe(true);
            expect(await token.balanceOf(ALICE)).toBe(FIRST_BUY_UNITS);
            expect(curve.getUnitsSold()).toBe(FIRST_BUY_UNITS);
            expect(curve.getCurrentReserve()).toBe(units(990n));
            expect(await reserve.balanceOf(ALICE)).toBe(0n);
        });

        test('should reject sells beyond the balance or beyond what was sold', async () => {
            const { curve, token, reserve } = await createCurveFixture();
            await reserve.deposit(ALICE, units(1_000n));
            await curve.buy(ALICE, units(1_000n));

            await expect(curve.sell(ALICE, 0n)).rejects.toMatchObject({ code: 'INVALID_AMOUNT' });
            await expect(curve.sell(ALICE, FIRST_BUY_UNITS + 1n)).rejects.toMatchObject({ code: 'INSUFFICIENT_BALANCE' });

            // Tokens that never came from the curve cannot be sold into it
            await token.mint(BOB, FIRST_BUY_UNITS + SCALE);
            await token.approve(BOB, CURVE, FIRST_BUY_UNITS + SCALE);
            await expect(curve.sell(BOB, FIRST_BUY_UNITS + SCALE)).rejects.toMatchObject({ code: 'INVALID_AMOUNT' });
            expect(curve.getUnitsSold()).toBe(FIRST_BUY_UNITS);
        });
    });

    describe('purchase limit', () => {
        test('should reject a single buy above 4% of issuance and report it', async () => {
            const { curve, reserve, hub } = await createCurveFixture();
            await reserve.deposit(ALICE, units(10_000n));

            await expect(curve.buy(ALICE, units(5_000n))).rejects.toMatchObject({ code: 'PURCHASE_LIMIT' });

            const [attempt] = hub.getEvents('purchase:limit-exceeded');
            expect(attempt.payload).toMatchObject({
                buyer: ALICE,
                attemptedAmount: 46_718_605_806_478_964_800_000_000n,
                currentHoldings: 0n,
                maxAllowed: units(40_000_000n),
            });
            expect(await reserve.balanceOf(ALICE)).toBe(units(10_000n));
            expect(curve.getUnitsSold()).toBe(0n);
        });

        test('should count cumulative purchases, not current holdings', async () => {
            const { curve, token, reserve } = await createCurveFixture();
            await reserve.deposit(ALICE, units(10_000n));
            await reserve.deposit(BOB, units(1_000n));

            const first = await curve.buy(ALICE, units(4_000n));
            expect(first.unitsOut).toBe(37_787_070_224_016_646_400_000_000n);

            await token.approve(ALICE, CURVE, first.unitsOut);
            await curve.sell(ALICE, first.unitsOut);
            expect(await token.balanceOf(ALICE)).toBe(0n);

            await expect(curve.buy(ALICE, units(1_000n))).rejects.toMatchObject({ code: 'PURCHASE_LIMIT' });
            expect(curve.getPurchaseAmount(ALICE)).toBe(first.unitsOut);

            await expect(curve.buy(BOB, units(1_000n))).resolves.toMatchObject({ trader: BOB });
        });
    });

    describe('administration', () => {
        test('should let only the owner pause and resume trading', async () => {
            const { curve, token, reserve } = await createCurveFixture();
            await reserve.deposit(ALICE, units(100n));
            await curve.buy(ALICE, units(10n));
            const held = await token.balanceOf(ALICE);
            await token.approve(ALICE, CURVE, held);

            expect(() => curve.pause(ALICE)).toThrow(/not the platform owner/);
            curve.pause(OWNER);
            expect(curve.isPaused()).toBe(true);

            await expect(curve.buy(ALICE, units(10n))).rejects.toMatchObject({ code: 'PAUSED' });
            await expect(curve.sell(ALICE, held)).rejects.toMatchObject({ code: 'PAUSED' });

            curve.unpause(OWNER);
            await expect(curve.sell(ALICE, held)).resolves.toMatchObject({ unitsIn: held });
        });

        test('should report initial state', async () => {
            const { curve } = await createCurveFixture();
            expect(curve.getBasePrice()).toBe(100_000_000_000_000n);
            expect(curve.getGraduationThreshold()).toBe(units(116_589n));
            expect(curve.getDetailedState()).toEqual({
                currentPrice: 100_000_000_000_000n,
                totalRaised: 0n,
                currentReserve: 0n,
                unitsSold: 0n,
                graduated: false,
                graduationProgress: 0n,
            });
        });
    });

    describe('atomicity', () => {
        test('should undo every movement when the fee recipient rejects', async () => {
            const { curve, token, reserve, hub } = await createCurveFixture();
            await reserve.deposit(ALICE, units(1_000n));
            reserve.registerReceiver(TREASURY, () => { throw new Error('treasury offline'); });

            const err: unknown = await curve.buy(ALICE, units(1_000n)).catch((e: unknown) => e);

            expect(isCurveError(err, 'TRANSFER_FAILED')).toBe(true);
            if (!isCurveError(err)) return;
            expect(err.message).toMatch(/treasury offline/);
            expect(err.cause).toBeInstanceOf(LedgerError);

            expect(await reserve.balanceOf(ALICE)).toBe(units(1_000n));
            expect(await reserve.balanceOf(CURVE)).toBe(0n);
            expect(await reserve.balanceOf(TREASURY)).toBe(0n);
            expect(await token.balanceOf(ALICE)).toBe(0n);
            expect(await token.balanceOf(CURVE)).toBe(TOTAL_ISSUANCE);
            expect(curve.getDetailedState().totalRaised).toBe(0n);
            expect(curve.getUnitsSold()).toBe(0n);
            expect(curve.getPurchaseAmount(ALICE)).toBe(0n);
            expect(hub.getEvents('token:traded')).toHaveLength(0);
        });

        test('should restore the allowance when a sell payout is rejected', async () => {
            const { curve, token, reserve } = await createCurveFixture();
            await reserve.deposit(ALICE, units(1_000n));
            await curve.buy(ALICE, units(1_000n));
            await token.approve(ALICE, CURVE, FIRST_BUY_UNITS);
            reserve.registerReceiver(ALICE, () => { throw new Error('not accepting'); });

            await expect(curve.sell(ALICE, FIRST_BUY_UNITS)).rejects.toMatchObject({ code: 'TRANSFER_FAILED' });

            expect(await token.balanceOf(ALICE)).toBe(FIRST_BUY_UNITS);
            expect(await token.allowance(ALICE, CURVE)).toBe(FIRST_BUY_UNITS);
            expect(curve.getUnitsSold()).toBe(FIRST_BUY_UNITS);
            expect(curve.getCurrentReserve()).toBe(units(990n));
            expect(await reserve.balanceOf(CURVE)).toBe(units(990n));
        });

        test('should trade normally when the curve is not authorized on the hub', async () => {
            const { curve, reserve, hub } = await createCurveFixture({ authorize: false });
            await reserve.deposit(ALICE, units(10n));

            await curve.buy(ALICE, units(10n));
            expect(hub.getEvents()).toHaveLength(0);
        });

        test('should not fail a trade because a listener throws', async () => {
            const { curve, reserve, hub } = await createCurveFixture();
            await reserve.deposit(ALICE, units(10n));
            hub.on('token:traded', () => { throw new Error('listener down'); });

            await expect(curve.buy(ALICE, units(10n))).resolves.toMatchObject({ trader: ALICE });
            expect(hub.getEvents('token:traded')).toHaveLength(1);
        });
    });

    describe('concurrency', () => {
        test('should reject a reentrant call from a recipient hook', async () => {
            const { curve, reserve } = await createCurveFixture();
            await reserve.deposit(ALICE, units(1_000n));
            await reserve.deposit(BOB, units(1_000n));

            let reentry: unknown;
            reserve.registerReceiver(TREASURY, async () => {
                try {
                    await curve.buy(BOB, units(10n));
                } catch (err) {
                    reentry = err;
                }
            });

            const receipt = await curve.buy(ALICE, units(1_000n));
            expect(receipt.unitsOut).toBe(FIRST_BUY_UNITS);
            expect(isCurveError(reentry, 'REENTRANCY')).toBe(true);
            expect(await reserve.balanceOf(BOB)).toBe(units(1_000n));
        });

        test('should accept a buy a listener schedules for after the trade commits', async () => {
            const { curve, reserve, hub } = await createCurveFixture();
            await reserve.deposit(ALICE, units(1_000n));
            await reserve.deposit(BOB, units(1_000n));

            let followUp: Promise<unknown> | undefined;
            hub.on('token:traded', (event) => {
                if (event.trader !== ALICE) return;
                followUp = new Promise((resolve, reject) => {
                    setTimeout(() => {
                        curve.buy(BOB, units(1_000n)).then(resolve, reject);
                    }, 5);
                });
            });

            await curve.buy(ALICE, units(1_000n));
            expect(followUp).toBeDefined();
            await expect(followUp).resolves.toMatchObject({
                trader: BOB,
                unitsOut: 9_549_262_020_739_615_200_000_000n,
            });
            expect(curve.getTotalRaised()).toBe(units(1_980n));
        });

        test('should serialize independent buys in arrival order', async () => {
            const { curve, reserve } = await createCurveFixture();
            await reserve.deposit(ALICE, units(1_000n));
            await reserve.deposit(BOB, units(1_000n));

            const [alice, bob] = await Promise.all([
                curve.buy(ALICE, units(1_000n)),
                curve.buy(BOB, units(1_000n)),
            ]);

            expect(alice.unitsOut).toBe(FIRST_BUY_UNITS);
            expect(bob.unitsOut).toBe(9_549_262_020_739_615_200_000_000n);
            expect(curve.getUnitsSold()).toBe(19_329_215_457_138_380_800_000_000n);
            expect(curve.getTotalRaised()).toBe(units(1_980n));
        });
    });

    describe('sellout', () => {
        // Cheap enough that the whole supply sells for far less than the graduation threshold
        const CHEAP_BASE = 10n ** 10n;
        const STEP = 400_000_000_000_000_000n;

        test('should clamp the last buy to the remaining supply and charge the fee on the full input', async () => {
            const { curve, token, reserve, hub } = await createCurveFixture({ basePrice: CHEAP_BASE });

            let buyers = 0;
            while (TOTAL_SELLABLE_SUPPLY - curve.getUnitsSold() > MAX_PURCHASE_PER_WALLET) {
                const buyer = wallet(buyers++);
                await reserve.deposit(buyer, STEP);
                const receipt = await curve.buy(buyer, STEP);
                expect(receipt.clamped).toBe(false);
            }
            expect(buyers).toBe(44);
            expect(curve.getUnitsSold()).toBe(768_309_809_670_068_401_600_000_000n);

            const last = wallet(buyers);
            await reserve.deposit(last, units(10n));
            const treasuryBefore = await reserve.balanceOf(TREASURY);

            const receipt = await curve.buy(last, units(10n));

            expect(receipt.clamped).toBe(true);
            expect(receipt.unitsOut).toBe(31_690_190_329_931_598_400_000_000n);
            expect(receipt.fee).toBe(100_000_000_000_000_000n);
            expect(receipt.reserveAfterFee).toBe(9_900_000_000_000_000_000n);
            expect(receipt.newPrice).toBe(0n);
            expect(receipt.graduated).toBe(false);

            expect(curve.getUnitsSold()).toBe(TOTAL_SELLABLE_SUPPLY);
            expect(curve.getCurrentPrice()).toBe(0n);
            expect(curve.getTotalRaised()).toBe(27_324_000_000_000_000_000n);
            expect(await token.balanceOf(last)).toBe(31_690_190_329_931_598_400_000_000n);
            expect(await token.balanceOf(CURVE)).toBe(TOTAL_ISSUANCE - TOTAL_SELLABLE_SUPPLY);
            expect(await reserve.balanceOf(last)).toBe(0n);
            expect(await reserve.balanceOf(TREASURY) - treasuryBefore).toBe(100_000_000_000_000_000n);
            expect(hub.getEvents('token:graduated')).toHaveLength(0);

            const next = wallet(buyers + 1);
            await reserve.deposit(next, units(1n));
            await expect(curve.buy(next, units(1n))).rejects.toMatchObject({ code: 'INVALID_AMOUNT' });
            expect(await reserve.balanceOf(next)).toBe(units(1n));
        });
    });

    test('should keep reserve and supply accounting consistent over a random sequence', async () => {
        const { curve, token, reserve } = await createCurveFixture();
        const wallets = [ALICE, BOB, CAROL, DAVE];
        for (const wallet of wallets) {
            await reserve.deposit(wallet, units(5_000n));
        }

        let seed = 42;
        const next = (): number => {
            seed = (seed * 16_807) % 2_147_483_647;
            return seed;
        };

        let raised = 0n;
        for (let step = 0; step < 24; step++) {
            const wallet = wallets[next() % wallets.length];
            const held = await token.balanceOf(wallet);

            if (held > 0n && next() % 3 === 0) {
                const amount = held / 2n;
                await token.approve(wallet, CURVE, amount);
                await curve.sell(wallet, amount);
            } else {
                await curve.buy(wallet, units(BigInt(10 + (next() % 500))));
            }

            const state = curve.getDetailedState();
            expect(state.totalRaised >= raised).toBe(true);
            expect(state.totalRaised >= state.currentReserve).toBe(true);
            expect(await reserve.balanceOf(CURVE)).toBe(state.currentReserve);
            raised = state.totalRaised;

            let circulating = 0n;
            for (const w of wallets) circulating += await token.balanceOf(w);
            expect(circulating).toBe(state.unitsSold);
            expect(await token.balanceOf(CURVE)).toBe(TOTAL_ISSUANCE - state.unitsSold);
        }
    });
});
