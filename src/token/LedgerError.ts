export type LedgerErrorCode =
    | 'INVALID_AMOUNT'
    | 'INSUFFICIENT_BALANCE'
    | 'INSUFFICIENT_ALLOWANCE'
    | 'RECIPIENT_REJECTED';

/**
 * Raised by TokenLedger and ReserveBank when an asset movement cannot happen.
 * Nothing has moved when this is thrown.
 */
export class LedgerError extends Error {
    public readonly code: LedgerErrorCode;
    public override readonly cause?: Error;

    constructor(code: LedgerErrorCode, message: string, cause?: Error) {
        super(message);
        this.name = 'LedgerError';
        this.code = code;
        this.cause = cause;
    }
}
