import type winston from 'winston';
import { getAddress, type Address } from 'viem';
import {
    DEFAULT_BASE_PRICE,
    GRADUATION_THRESHOLD,
    MAX_PURCHASE_PER_WALLET,
} from './constants.js';
import { CurveError } from './CurveError.js';
import { CurvePricer } from './CurvePricer.js';
import {
    CurvePhase,
    applyBuy,
    applySell,
    initialCurveState,
    isTrading,
    type CurveState,
    type TradingCurveState,
} from './CurveState.js';
import { GraduationHandler, type GraduationReceipt } from './GraduationHandler.js';
import { ReentrancyGuard } from './ReentrancyGuard.js';
import { SettlementJournal } from './SettlementJournal.js';
import { TradeSizer, type BuyQuote, type SellQuote } from './TradeSizer.js';
import type { EventHub } from '../events/EventHub.js';
import { EventNotifier } from '../events/EventNotifier.js';
import { DeferredLiquiditySeeder, type LiquiditySeeder } from '../liquidity/LiquiditySeeder.js';
import { LedgerError } from '../token/LedgerError.js';
import type { ReserveBank } from '../token/ReserveBank.js';
import type { TokenLedger } from '../token/TokenLedger.js';
import { createLogger } from '../utils/logger.js';
import { nowSeconds } from '../utils/timestamp.js';

export interface BondingCurveOptions {
    address: Address;
    tokenAddress: Address;
    token: TokenLedger;
    reserve: ReserveBank;
    creator: Address;
    treasury: Address;
    /** Platform owner; the only caller allowed to pause. */
    owner: Address;
    basePrice?: bigint;
    eventHub?: EventHub;
    liquiditySeeder?: LiquiditySeeder;
    logger?: winston.Logger;
}

export interface BuyReceipt extends BuyQuote {
    trader: Address;
    newPrice: bigint;
    totalRaised: bigint;
    graduated: boolean;
    graduation?: GraduationReceipt;
}

export interface SellReceipt extends SellQuote {
    trader: Address;
    newPrice: bigint;
}

export interface DetailedCurveState {
    currentPrice: bigint;
    totalRaised: bigint;
    currentReserve: bigint;
    unitsSold: bigint;
    graduated: boolean;
    graduationProgress: bigint;
}

/**
 * BondingCurve — executes buys and sells of one launched token against the
 * reserve asset and graduates the curve when enough has been raised.
 *
 * Each trade validates everything it can up front, commits the new state,
 * then moves assets through a SettlementJournal. Any failure on the way
 * reverses the movements, restores the previous state and rethrows, so a
 * trade either fully happens or leaves no trace.
 */
export class BondingCurve {
    readonly address: Address;
    readonly tokenAddress: Address;
    readonly creator: Address;
    readonly treasury: Address;
    readonly owner: Address;

    private readonly token: TokenLedger;
    private readonly reserve: ReserveBank;
    private readonly pricer: CurvePricer;
    private readonly sizer: TradeSizer;
    private readonly graduation: GraduationHandler;
    private readonly notifier: EventNotifier;
    private readonly guard = new ReentrancyGuard();
    private readonly logger: winston.Logger;

    private state: CurveState = initialCurveState();
    private purchaseAmounts = new Map<Address, bigint>();
    private paused = false;

    constructor(options: BondingCurveOptions) {
        this.address = options.address;
        this.tokenAddress = options.tokenAddress;
        this.creator = options.creator;
        this.treasury = options.treasury;
        this.owner = options.owner;
        this.token = options.token;
        this.reserve = options.reserve;
        this.logger = options.logger ?? createLogger('info', `curve:${options.token.symbol}`);

        this.pricer = new CurvePricer(options.basePrice ?? DEFAULT_BASE_PRICE);
        this.sizer = new TradeSizer(this.pricer);
        this.notifier = new EventNotifier(options.eventHub, this.address, this.logger);
        this.graduation = new GraduationHandler(
            { curve: this.address, token: this.tokenAddress, creator: this.creator, treasury: this.treasury },
            this.reserve,
            this.token,
            options.liquiditySeeder ?? new DeferredLiquiditySeeder(this.logger),
            this.notifier,
            this.logger,
        );
    }

    // ── Trading ─────────────────────────────────────────────

    /**
     * Spend `reserveIn` (fee included) on tokens. Graduates the curve when
     * this buy takes the cumulative raise to the threshold.
     */
    async buy(trader: Address, reserveIn: bigint): Promise<BuyReceipt> {
        return this.guard.run('buy', async () => {
            if (reserveIn <= 0n) {
                throw new CurveError('INVALID_AMOUNT', `Buy amount must be positive, got ${reserveIn}`);
            }
            const state = this.assertTradable();

            const balance = await this.reserve.balanceOf(trader);
            if (balance < reserveIn) {
                throw new CurveError(
                    'INSUFFICIENT_BALANCE',
                    `Insufficient ${this.reserve.symbol} for ${trader}: has ${balance}, needs ${reserveIn}`,
                );
            }

            const quote = this.sizer.quoteBuy(state.unitsSold, reserveIn);
            if (quote.unitsOut === 0n) {
                throw new CurveError('INVALID_AMOUNT', `Buy of ${reserveIn} is too small to receive any tokens`);
            }

            const holdings = this.getPurchaseAmount(trader);
            if (holdings + quote.unitsOut > MAX_PURCHASE_PER_WALLET) {
                this.notifier.largePurchaseAttempted({
                    token: this.tokenAddress,
                    buyer: trader,
                    curve: this.address,
                    attemptedAmount: quote.unitsOut,
                    currentHoldings: holdings,
                    maxAllowed: MAX_PURCHASE_PER_WALLET,
                    timestamp: nowSeconds(),
                });
                this.logger.warn('Purchase exceeds per-wallet limit', {
                    trader,
                    attempted: quote.unitsOut,
                    holdings,
                });
                throw new CurveError(
                    'PURCHASE_LIMIT',
                    `Purchase exceeds 4% limit: ${trader} holds ${holdings}, attempted ${quote.unitsOut}, max ${MAX_PURCHASE_PER_WALLET}`,
                );
            }

            return this.settle('buy', async (journal) => {
                this.state = applyBuy(state, quote.unitsOut, quote.reserveAfterFee);
                this.purchaseAmounts.set(getAddress(trader), holdings + quote.unitsOut);

                await this.moveReserve(journal, trader, this.address, reserveIn, 'buy payment');
                await this.moveTokens(journal, trader, quote.unitsOut);
                await this.moveReserve(journal, this.address, this.treasury, quote.fee, 'trading fee');

                const newPrice = this.pricer.priceAt(this.state.unitsSold);
                const timestamp = nowSeconds();
                journal.defer(() => {
                    this.notifier.tokenTraded({
                        token: this.tokenAddress,
                        trader,
                        curve: this.address,
                        isBuy: true,
                        reserveAmount: reserveIn,
                        tokenAmount: quote.unitsOut,
                        newPrice,
                        fee: quote.fee,
                        timestamp,
                    });
                    this.reportFee(quote.fee, timestamp);
                });

                const receipt: BuyReceipt = {
                    ...quote,
                    trader,
                    newPrice,
                    totalRaised: this.state.totalRaised,
                    graduated: false,
                };

                if (this.state.totalRaised >= GRADUATION_THRESHOLD) {
                    const result = await this.graduation.graduate(this.state, journal);
                    this.state = result.state;
                    receipt.graduated = true;
                    receipt.graduation = result.receipt;
                }

                this.logger.info('Buy executed', {
                    trader,
                    reserveIn,
                    unitsOut: quote.unitsOut,
                    clamped: quote.clamped,
                    newPrice,
                });
                return receipt;
            });
        });
    }

    /**
     * Sell `unitsIn` tokens back to the curve. The trader must have approved
     * the curve for at least that amount. The cumulative raise is untouched.
     */
    async sell(trader: Address, unitsIn: bigint): Promise<SellReceipt> {
        return this.guard.run('sell', async () => {
            if (unitsIn <= 0n) {
                throw new CurveError('INVALID_AMOUNT', `Sell amount must be positive, got ${unitsIn}`);
            }
            const state = this.assertTradable();

            const balance = await this.token.balanceOf(trader);
            if (balance < unitsIn) {
                throw new CurveError(
                    'INSUFFICIENT_BALANCE',
                    `Insufficient ${this.token.symbol} for ${trader}: has ${balance}, needs ${unitsIn}`,
                );
            }

            const quote = this.sizer.quoteSell(state.unitsSold, unitsIn);
            if (quote.reserveOut === 0n) {
                throw new CurveError('INVALID_AMOUNT', `Sell of ${unitsIn} units is too small to pay out`);
            }
            if (quote.grossReserve > state.reserveCurrent) {
                throw new CurveError(
                    'INVARIANT',
                    `Sell would pay ${quote.grossReserve} from a reserve of ${state.reserveCurrent}`,
                );
            }
            const held = await this.reserve.balanceOf(this.address);
            if (held < quote.grossReserve) {
                throw new CurveError(
                    'INSUFFICIENT_RESERVE',
                    `Curve holds ${held} ${this.reserve.symbol}, sell needs ${quote.grossReserve}`,
                );
            }

            return this.settle('sell', async (journal) => {
                this.state = applySell(state, unitsIn, quote.grossReserve);

                await this.pullTokens(journal, trader, unitsIn);
                await this.moveReserve(journal, this.address, trader, quote.reserveOut, 'sell payout');
                await this.moveReserve(journal, this.address, this.treasury, quote.fee, 'trading fee');

                const newPrice = this.pricer.priceAt(this.state.unitsSold);
                const timestamp = nowSeconds();
                journal.defer(() => {
                    this.notifier.tokenTraded({
                        token: this.tokenAddress,
                        trader,
                        curve: this.address,
                        isBuy: false,
                        reserveAmount: quote.reserveOut,
                        tokenAmount: unitsIn,
                        newPrice,
                        fee: quote.fee,
                        timestamp,
                    });
                    this.reportFee(quote.fee, timestamp);
                });

                this.logger.info('Sell executed', { trader, unitsIn, reserveOut: quote.reserveOut, newPrice });
                return { ...quote, trader, newPrice };
            });
        });
    }

    // ── Administration ──────────────────────────────────────

    pause(caller: Address): void {
        this.assertOwner(caller);
        this.paused = true;
        this.logger.warn('Trading paused', { curve: this.address });
    }

    unpause(caller: Address): void {
        this.assertOwner(caller);
        this.paused = false;
        this.logger.info('Trading resumed', { curve: this.address });
    }

    // ── Queries ─────────────────────────────────────────────

    getCurrentPrice(): bigint {
        return this.pricer.priceAt(this.state.unitsSold);
    }

    getBasePrice(): bigint {
        return this.pricer.basePrice;
    }

    getTotalRaised(): bigint {
        return this.state.totalRaised;
    }

    getCurrentReserve(): bigint {
        return this.state.reserveCurrent;
    }

    getUnitsSold(): bigint {
        return this.state.unitsSold;
    }

    isGraduated(): boolean {
        return this.state.phase === CurvePhase.GRADUATED;
    }

    isPaused(): boolean {
        return this.paused;
    }

    getGraduationThreshold(): bigint {
        return GRADUATION_THRESHOLD;
    }

    /** Percent of the threshold raised so far, truncated; may exceed 100. */
    getGraduationProgress(): bigint {
        return (this.state.totalRaised * 100n) / GRADUATION_THRESHOLD;
    }

    getPurchaseAmount(trader: Address): bigint {
        return this.purchaseAmounts.get(getAddress(trader)) ?? 0n;
    }

    getState(): CurveState {
        return this.state;
    }

    getDetailedState(): DetailedCurveState {
        return {
            currentPrice: this.getCurrentPrice(),
            totalRaised: this.state.totalRaised,
            currentReserve: this.state.reserveCurrent,
            unitsSold: this.state.unitsSold,
            graduated: this.isGraduated(),
            graduationProgress: this.getGraduationProgress(),
        };
    }

    calculateTokensForReserve(reserveIn: bigint): BuyQuote {
        return this.sizer.quoteBuy(this.state.unitsSold, reserveIn);
    }

    calculateReserveForTokens(unitsIn: bigint): SellQuote {
        return this.sizer.quoteSell(this.state.unitsSold, unitsIn);
    }

    // ── Internals ───────────────────────────────────────────

    private assertTradable(): TradingCurveState {
        if (this.paused) {
            throw new CurveError('PAUSED', `Trading on ${this.address} is paused`);
        }
        if (!isTrading(this.state)) {
            throw new CurveError('GRADUATED', `Curve ${this.address} has graduated; trading is closed`);
        }
        return this.state;
    }

    private assertOwner(caller: Address): void {
        if (getAddress(caller) !== getAddress(this.owner)) {
            throw new CurveError('UNAUTHORIZED', `${caller} is not the platform owner`);
        }
    }

    /**
     * Run the mutating half of a trade. On failure, reverse every recorded
     * movement, restore state and purchase totals, and rethrow.
     */
    private async settle<T>(operation: string, apply: (journal: SettlementJournal) => Promise<T>): Promise<T> {
        const previousState = this.state;
        const previousPurchases = new Map(this.purchaseAmounts);
        const journal = new SettlementJournal(this.logger);

        try {
            const result = await apply(journal);
            journal.commit();
            return result;
        } catch (err) {
            this.logger.error(`${operation} failed; rolling back`, {
                steps: journal.size(),
                error: err instanceof Error ? err.message : String(err),
            });
            this.state = previousState;
            this.purchaseAmounts = previousPurchases;
            await journal.rollback();
            throw toCurveError(err);
        }
    }

    private async moveReserve(
        journal: SettlementJournal,
        from: Address,
        to: Address,
        amount: bigint,
        label: string,
    ): Promise<void> {
        if (amount === 0n) return;
        await this.reserve.transfer(from, to, amount, { metadata: { curve: this.address, label } });
        journal.record(label, async () => {
            await this.reserve.transfer(to, from, amount, {
                notify: false,
                metadata: { curve: this.address, label: `undo ${label}` },
            });
        });
    }

    private async moveTokens(journal: SettlementJournal, to: Address, amount: bigint): Promise<void> {
        await this.token.transfer(this.address, to, amount, 'transfer', { curve: this.address });
        journal.record('token delivery', async () => {
            await this.token.transfer(to, this.address, amount, 'reversal', { curve: this.address });
        });
    }

    private async pullTokens(journal: SettlementJournal, from: Address, amount: bigint): Promise<void> {
        const allowance = await this.token.allowance(from, this.address);
        await this.token.transferFrom(this.address, from, this.address, amount, { curve: this.address });
        journal.record('token pull', async () => {
            await this.token.transfer(this.address, from, amount, 'reversal', { curve: this.address });
            await this.token.approve(from, this.address, allowance);
        });
    }

    private reportFee(fee: bigint, timestamp: number): void {
        if (fee === 0n) return;
        this.notifier.feeCollected({ source: this.address, feeType: 'trading', amount: fee, timestamp });
    }
}

function toCurveError(err: unknown): CurveError {
    if (err instanceof CurveError) return err;
    if (err instanceof LedgerError) {
        return new CurveError('TRANSFER_FAILED', `Transfer failed: ${err.message}`, err);
    }
    const cause = err instanceof Error ? err : new Error(String(err));
    return new CurveError('TRANSFER_FAILED', `Settlement failed: ${cause.message}`, cause);
}
