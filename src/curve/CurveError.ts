/**
 * Errors raised by the curve. Every rejected trade leaves the curve and the
 * ledgers exactly as they were before the call.
 */

export type CurveErrorCode =
    | 'INVALID_AMOUNT'
    | 'INSUFFICIENT_BALANCE'
    | 'INSUFFICIENT_RESERVE'
    | 'GRADUATED'
    | 'PAUSED'
    | 'PURCHASE_LIMIT'
    | 'TRANSFER_FAILED'
    | 'REENTRANCY'
    | 'INVARIANT'
    | 'UNAUTHORIZED';

export type CurveErrorCategory = 'validation' | 'limit' | 'transfer' | 'invariant';

const CATEGORY_BY_CODE: Record<CurveErrorCode, CurveErrorCategory> = {
    INVALID_AMOUNT: 'validation',
    INSUFFICIENT_BALANCE: 'validation',
    INSUFFICIENT_RESERVE: 'validation',
    GRADUATED: 'validation',
    PAUSED: 'validation',
    PURCHASE_LIMIT: 'limit',
    TRANSFER_FAILED: 'transfer',
    REENTRANCY: 'invariant',
    INVARIANT: 'invariant',
    UNAUTHORIZED: 'invariant',
};

export class CurveError extends Error {
    public readonly code: CurveErrorCode;
    public readonly category: CurveErrorCategory;
    public override readonly cause?: Error;

    constructor(code: CurveErrorCode, message: string, cause?: Error) {
        super(message);
        this.name = 'CurveError';
        this.code = code;
        this.category = CATEGORY_BY_CODE[code];
        this.cause = cause;
    }
}

export function isCurveError(err: unknown, code?: CurveErrorCode): err is CurveError {
    return err instanceof CurveError && (code === undefined || err.code === code);
}
