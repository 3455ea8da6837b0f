import { SCALE, SELLABLE_WHOLE_TOKENS, TOTAL_SELLABLE_SUPPLY } from './constants.js';
import { cube } from './FixedPoint.js';

/**
 * CurvePricer — quadratic bonding curve.
 *
 *   price(sold) = basePrice * (1 + sold / SELLABLE)^2
 *
 * Starts at basePrice and approaches 4 * basePrice at sellout. Prices are
 * the reserve cost of one whole token. Every division truncates.
 */
export class CurvePricer {
    /** basePrice * SELLABLE_WHOLE_TOKENS: the area's constant factor. */
    readonly curveArea: bigint;

    constructor(readonly basePrice: bigint) {
        if (basePrice <= 0n) {
            throw new RangeError(`Base price must be positive, got ${basePrice}`);
        }
        this.curveArea = basePrice * SELLABLE_WHOLE_TOKENS;
    }

    /**
     * Fraction of the sellable supply already sold, in fixed point, capped at 1.
     */
    progressOf(unitsSold: bigint): bigint {
        if (unitsSold >= TOTAL_SELLABLE_SUPPLY) return SCALE;
        return (unitsSold * SCALE) / TOTAL_SELLABLE_SUPPLY;
    }

    /**
     * Units sold at a given progress; exact, since SELLABLE / SCALE is whole.
     */
    unitsAt(progress: bigint): bigint {
        return (progress * TOTAL_SELLABLE_SUPPLY) / SCALE;
    }

    /**
     * Instantaneous price. Fails closed to 0 once the sellable supply is gone.
     */
    priceAt(unitsSold: bigint): bigint {
        if (unitsSold >= TOTAL_SELLABLE_SUPPLY) return 0n;
        const onePlusProgress = SCALE + this.progressOf(unitsSold);
        const multiplier = (onePlusProgress * onePlusProgress) / SCALE;
        return (this.basePrice * multiplier) / SCALE;
    }

    /**
     * (1 + progress)^3 in fixed point, the only progress-dependent part of
     * the area under the curve.
     */
    cubicTerm(progress: bigint): bigint {
        return cube(SCALE + progress);
    }

    /**
     * Reserve under the curve between two progress points:
     * curveArea * ((1 + to)^3 - (1 + from)^3) / 3, with a single truncating
     * division over the cube difference.
     */
    areaBetween(fromProgress: bigint, toProgress: bigint): bigint {
        if (toProgress < fromProgress) {
            throw new RangeError(`Area bounds out of order: ${fromProgress} > ${toProgress}`);
        }
        const cubeDelta = this.cubicTerm(toProgress) - this.cubicTerm(fromProgress);
        return (this.curveArea * cubeDelta) / (3n * SCALE);
    }
}
