import type winston from 'winston';
import type { Address } from 'viem';
import { CREATOR_SHARE_PERCENT, LIQUIDITY_SHARE_PERCENT } from './constants.js';
import { CurveError } from './CurveError.js';
import { graduateState, isTrading } from './CurveState.js';
import type { CurveState, GraduatedCurveState, GraduationSplit } from './CurveState.js';
import type { SettlementJournal } from './SettlementJournal.js';
import type { EventNotifier } from '../events/EventNotifier.js';
import type { LiquiditySeeder } from '../liquidity/LiquiditySeeder.js';
import type { ReserveBank } from '../token/ReserveBank.js';
import type { TokenLedger } from '../token/TokenLedger.js';
import { nowSeconds } from '../utils/timestamp.js';

export interface GraduationParties {
    curve: Address;
    token: Address;
    creator: Address;
    treasury: Address;
}

export interface GraduationReceipt {
    totalRaised: bigint;
    distributed: bigint;
    split: GraduationSplit;
    tokensForLiquidity: bigint;
    graduatedAt: number;
}

/**
 * 50% liquidity, 30% creator, both truncated; the treasury takes the rest,
 * so rounding dust never goes missing.
 */
export function splitGraduationReserve(available: bigint): GraduationSplit {
    const liquidity = (available * LIQUIDITY_SHARE_PERCENT) / 100n;
    const creator = (available * CREATOR_SHARE_PERCENT) / 100n;
    return { liquidity, creator, treasury: available - liquidity - creator };
}

/**
 * GraduationHandler — ends trading on a curve, once.
 *
 * Distributes the reserve the curve actually holds (not the cumulative
 * raised figure), zeroes it, and flips the curve to GRADUATED. Runs inside
 * the triggering buy's journal, so a failed payout undoes the buy as well.
 */
export class GraduationHandler {
    constructor(
        private readonly parties: GraduationParties,
        private readonly reserve: ReserveBank,
        private readonly token: TokenLedger,
        private readonly liquidity: LiquiditySeeder,
        private readonly notifier: EventNotifier,
        private readonly logger: winston.Logger,
    ) { }

    async graduate(
        state: CurveState,
        journal: SettlementJournal,
    ): Promise<{ state: GraduatedCurveState; receipt: GraduationReceipt }> {
        if (!isTrading(state)) {
            throw new CurveError('INVARIANT', `Curve ${this.parties.curve} has already graduated`);
        }

        const { curve, token, creator, treasury } = this.parties;
        const split = splitGraduationReserve(state.reserveCurrent);
        const graduatedAt = nowSeconds();
        const graduated = graduateState(state, split, graduatedAt);

        await this.pay(journal, creator, split.creator, 'creator bonus');
        await this.pay(journal, treasury, split.treasury, 'graduation treasury share');

        const tokensForLiquidity = await this.token.balanceOf(curve);
        await this.liquidity.seed({
            token,
            curve,
            reserveAmount: split.liquidity,
            tokenAmount: tokensForLiquidity,
        });

        journal.defer(() => {
            this.notifier.tokenGraduated({
                token,
                creator,
                curve,
                totalRaised: state.totalRaised,
                liquidityReserve: split.liquidity,
                creatorBonus: split.creator,
                treasuryShare: split.treasury,
                timestamp: graduatedAt,
            });
            if (split.treasury > 0n) {
                this.notifier.feeCollected({
                    source: curve,
                    feeType: 'graduation',
                    amount: split.treasury,
                    timestamp: graduatedAt,
                });
            }
        });

        this.logger.info('Curve graduated', {
            curve,
            totalRaised: state.totalRaised,
            distributed: state.reserveCurrent,
            ...split,
        });

        return {
            state: graduated,
            receipt: {
                totalRaised: state.totalRaised,
                distributed: state.reserveCurrent,
                split,
                tokensForLiquidity,
                graduatedAt,
            },
        };
    }

    private async pay(journal: SettlementJournal, to: Address, amount: bigint, label: string): Promise<void> {
        if (amount === 0n) return;
        const from = this.parties.curve;
        await this.reserve.transfer(from, to, amount, { metadata: { label } });
        journal.record(label, async () => {
            await this.reserve.transfer(to, from, amount, { notify: false, metadata: { label: `undo ${label}` } });
        });
    }
}
