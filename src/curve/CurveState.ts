export enum CurvePhase {
    TRADING = 'TRADING',
    GRADUATED = 'GRADUATED',
}

export interface GraduationSplit {
    liquidity: bigint;
    creator: bigint;
    treasury: bigint;
}

interface CurveCounters {
    readonly unitsSold: bigint;
    /** High-water mark of reserve inflow; sells never lower it. */
    readonly totalRaised: bigint;
    readonly reserveCurrent: bigint;
}

export interface TradingCurveState extends CurveCounters {
    readonly phase: CurvePhase.TRADING;
}

export interface GraduatedCurveState extends CurveCounters {
    readonly phase: CurvePhase.GRADUATED;
    readonly graduatedAt: number;
    readonly distribution: GraduationSplit;
}

/**
 * Curve state record. Trading states only ever move to graduated ones
 * through {@link graduateState}; nothing maps a graduated state back.
 */
export type CurveState = TradingCurveState | GraduatedCurveState;

export function initialCurveState(): TradingCurveState {
    return { phase: CurvePhase.TRADING, unitsSold: 0n, totalRaised: 0n, reserveCurrent: 0n };
}

export function isTrading(state: CurveState): state is TradingCurveState {
    return state.phase === CurvePhase.TRADING;
}

export function applyBuy(state: TradingCurveState, unitsOut: bigint, reserveIn: bigint): TradingCurveState {
    return {
        phase: CurvePhase.TRADING,
        unitsSold: state.unitsSold + unitsOut,
        totalRaised: state.totalRaised + reserveIn,
        reserveCurrent: state.reserveCurrent + reserveIn,
    };
}

export function applySell(state: TradingCurveState, unitsIn: bigint, reserveOut: bigint): TradingCurveState {
    return {
        phase: CurvePhase.TRADING,
        unitsSold: state.unitsSold - unitsIn,
        totalRaised: state.totalRaised,
        reserveCurrent: state.reserveCurrent - reserveOut,
    };
}

export function graduateState(
    state: TradingCurveState,
    distribution: GraduationSplit,
    graduatedAt: number,
): GraduatedCurveState {
    return {
        phase: CurvePhase.GRADUATED,
        unitsSold: state.unitsSold,
        totalRaised: state.totalRaised,
        reserveCurrent: 0n,
        graduatedAt,
        distribution,
    };
}
