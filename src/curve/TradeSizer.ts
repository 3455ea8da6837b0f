import { BASIS_POINTS, PLATFORM_FEE_BPS, SCALE, TOTAL_SELLABLE_SUPPLY } from './constants.js';
import { CurveError } from './CurveError.js';
import type { CurvePricer } from './CurvePricer.js';
import { MAX_CUBE, cubeRoot } from './FixedPoint.js';

export interface BuyQuote {
    reserveIn: bigint;
    fee: bigint;
    reserveAfterFee: bigint;
    unitsOut: bigint;
    /** True when the order asked for more than the remaining sellable supply. */
    clamped: boolean;
    priceBefore: bigint;
    priceAfter: bigint;
}

export interface SellQuote {
    unitsIn: bigint;
    grossReserve: bigint;
    fee: bigint;
    reserveOut: bigint;
    priceBefore: bigint;
    priceAfter: bigint;
}

export interface UnitsForReserve {
    unitsOut: bigint;
    clamped: boolean;
}

/**
 * TradeSizer — sizes trades by integrating the price curve instead of
 * multiplying by the spot price.
 *
 *   Integral(p) = curveArea * (1 + p)^3 / 3
 *
 * Buys invert the integral through a cube root; sells evaluate it at both
 * known endpoints. Both directions round in the curve's favour.
 */
export class TradeSizer {
    constructor(
        private readonly pricer: CurvePricer,
        private readonly feeBps: bigint = PLATFORM_FEE_BPS,
    ) { }

    feeOn(amount: bigint): bigint {
        return (amount * this.feeBps) / BASIS_POINTS;
    }

    /**
     * Units bought by `reserveIn` (already net of fee), starting from `unitsSold`.
     * Orders that would run past the sellable supply fill only what remains.
     */
    tokensForReserve(unitsSold: bigint, reserveIn: bigint): UnitsForReserve {
        const remaining = unitsSold >= TOTAL_SELLABLE_SUPPLY ? 0n : TOTAL_SELLABLE_SUPPLY - unitsSold;
        if (reserveIn <= 0n || remaining === 0n) {
            return { unitsOut: 0n, clamped: false };
        }

        const startProgress = this.pricer.progressOf(unitsSold);
        const cubeIncrease = (reserveIn * 3n * SCALE) / this.pricer.curveArea;
        const targetCube = this.pricer.cubicTerm(startProgress) + cubeIncrease;

        if (targetCube >= MAX_CUBE) {
            return { unitsOut: remaining, clamped: true };
        }

        const endProgress = cubeRoot(targetCube) - SCALE;
        const reached = this.pricer.unitsAt(endProgress);
        const unitsOut = reached > unitsSold ? reached - unitsSold : 0n;

        if (unitsOut > remaining) {
            return { unitsOut: remaining, clamped: true };
        }
        return { unitsOut, clamped: false };
    }

    /**
     * Gross reserve released by selling `unitsIn` back into a curve that has
     * sold `unitsSold`.
     */
    reserveForTokens(unitsSold: bigint, unitsIn: bigint): bigint {
        if (unitsIn < 0n) {
            throw new CurveError('INVALID_AMOUNT', `Sell amount must not be negative, got ${unitsIn}`);
        }
        if (unitsIn > unitsSold) {
            throw new CurveError(
                'INVALID_AMOUNT',
                `Cannot sell ${unitsIn} units: only ${unitsSold} have been sold through the curve`,
            );
        }
        return this.pricer.areaBetween(
            this.pricer.progressOf(unitsSold - unitsIn),
            this.pricer.progressOf(unitsSold),
        );
    }

    /**
     * Full buy quote. The fee is taken from the whole input, even when the
     * order is clamped at sellout.
     */
    quoteBuy(unitsSold: bigint, reserveIn: bigint): BuyQuote {
        const fee = this.feeOn(reserveIn);
        const reserveAfterFee = reserveIn - fee;
        const { unitsOut, clamped } = this.tokensForReserve(unitsSold, reserveAfterFee);
        return {
            reserveIn,
            fee,
            reserveAfterFee,
            unitsOut,
            clamped,
            priceBefore: this.pricer.priceAt(unitsSold),
            priceAfter: this.pricer.priceAt(unitsSold + unitsOut),
        };
    }

    quoteSell(unitsSold: bigint, unitsIn: bigint): SellQuote {
        const grossReserve = this.reserveForTokens(unitsSold, unitsIn);
        const fee = this.feeOn(grossReserve);
        return {
            unitsIn,
            grossReserve,
            fee,
            reserveOut: grossReserve - fee,
            priceBefore: this.pricer.priceAt(unitsSold),
            priceAfter: this.pricer.priceAt(unitsSold - unitsIn),
        };
    }
}
